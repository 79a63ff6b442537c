/**
 * SyncEngine - one reconciliation cycle
 *
 * Runs the phases in a fixed order; each later phase relies on the state the
 * earlier ones left behind:
 *   leases -> delinquency -> drift -> tickets
 *
 * A phase that throws is logged and recorded, and the next phase still runs.
 * Only one cycle runs at a time; a call made while one is in flight returns
 * immediately with `skipped: true`.
 *
 * @module services/sync/SyncEngine
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage, logError } from '../../utils/errors.js';
import { LeaseLifecyclePhase } from './LeaseLifecyclePhase.js';
import { DelinquencyPhase } from './DelinquencyPhase.js';
import { BillingDriftPhase } from './BillingDriftPhase.js';
import { TicketForwardingPhase } from './TicketForwardingPhase.js';
import type { PhaseName, PhaseResult, SyncDependencies, SyncPhase } from './context.js';

export interface PhaseReport extends PhaseResult {
  name: PhaseName;
  /** Set when the phase itself failed */
  error?: string;
}

export interface SyncCycleReport {
  /** True when another cycle was already running */
  skipped: boolean;
  startedAt: Date;
  durationMs: number;
  phases: PhaseReport[];
}

export interface SyncEngineOptions {
  /** Clock, for tests and for the grace-day check */
  clock?: () => Date;
  /** Replace the default phases */
  phases?: SyncPhase[];
  logger?: Logger;
}

export class SyncEngine {
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly phases: SyncPhase[];
  private readonly store: SyncDependencies['store'];
  private running = false;

  constructor(deps: SyncDependencies, options: SyncEngineOptions = {}) {
    this.logger = options.logger ?? createChildLogger({ component: 'SyncEngine' });
    this.clock = options.clock ?? (() => new Date());
    this.phases = options.phases ?? [
      new LeaseLifecyclePhase(deps, this.logger.child({ phase: 'leases' })),
      new DelinquencyPhase(deps, this.logger.child({ phase: 'delinquency' })),
      new BillingDriftPhase(deps, this.logger.child({ phase: 'drift' })),
      new TicketForwardingPhase(deps, this.logger.child({ phase: 'tickets' })),
    ];
    this.store = deps.store;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async runSyncCycle(): Promise<SyncCycleReport> {
    const startedAt = this.clock();

    if (this.running) {
      this.logger.warn('Sync cycle already running, skipping');
      return { skipped: true, startedAt, durationMs: 0, phases: [] };
    }

    this.running = true;
    const started = Date.now();
    const phases: PhaseReport[] = [];

    try {
      this.logger.info('Sync cycle started');
      this.store.logEvent('cycle_started', { startedAt: startedAt.toISOString() });

      for (const phase of this.phases) {
        phases.push(await this.runPhase(phase, startedAt));
      }

      const durationMs = Date.now() - started;
      this.store.logEvent('cycle_completed', {
        durationMs,
        phases: Object.fromEntries(phases.map((p) => [p.name, summarize(p)])),
      });
      this.logger.info({ durationMs, phases: phases.map(summarize) }, 'Sync cycle completed');

      return { skipped: false, startedAt, durationMs, phases };
    } finally {
      this.running = false;
    }
  }

  private async runPhase(phase: SyncPhase, now: Date): Promise<PhaseReport> {
    try {
      const result = await phase.run(now);
      this.logger.debug({ phase: phase.name, ...result }, 'Phase finished');
      return { name: phase.name, ...result };
    } catch (error) {
      logError(this.logger, error, { phase: phase.name }, 'Sync phase failed');
      this.store.logEvent('phase_failed', { phase: phase.name, error: errorMessage(error) });
      return { name: phase.name, processed: 0, changed: 0, failed: 0, error: errorMessage(error) };
    }
  }
}

function summarize(report: PhaseReport): string {
  if (report.error) return `${report.name}: error`;
  if (report.skipped) return `${report.name}: skipped`;
  return `${report.name}: ${report.processed} processed, ${report.changed} changed, ${report.failed} failed`;
}
