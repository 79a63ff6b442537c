/**
 * Sync Job
 *
 * Runs a sync cycle immediately and then on a fixed interval. Cycles never
 * overlap: a tick that fires while a cycle is still running is skipped by
 * the engine and logged.
 *
 * @module jobs/SyncJob
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { SyncCycleReport } from '../services/sync/SyncEngine.js';

// =============================================================================
// Job Constants
// =============================================================================

/** Default job interval (5 minutes) */
export const DEFAULT_JOB_INTERVAL_MS = 5 * 60 * 1000;

/** Job name for logging */
export const JOB_NAME = 'lease-network-sync';

/**
 * What the job drives; satisfied by SyncEngine
 */
export interface SyncRunner {
  runSyncCycle(): Promise<SyncCycleReport>;
}

export interface SyncJobConfig {
  intervalMs?: number;
}

export class SyncJob {
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private intervalHandle: NodeJS.Timeout | null = null;
  /** Ticks still running, skipped ones included */
  private readonly inFlight = new Set<Promise<SyncCycleReport | null>>();

  constructor(
    private readonly engine: SyncRunner,
    config: SyncJobConfig = {},
    logger?: Logger
  ) {
    this.logger = logger ?? createChildLogger({ component: 'SyncJob', job: JOB_NAME });
    this.intervalMs = config.intervalMs ?? DEFAULT_JOB_INTERVAL_MS;
  }

  get isStarted(): boolean {
    return this.intervalHandle !== null;
  }

  /**
   * Start the scheduled job
   */
  start(): void {
    if (this.intervalHandle) {
      this.logger.warn('Job already started');
      return;
    }

    this.logger.info({ intervalMs: this.intervalMs }, 'Starting sync job');

    // Run immediately on start
    void this.tick();

    this.intervalHandle = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  /**
   * Stop scheduling and wait for every cycle in flight to finish
   */
  async stop(): Promise<void> {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      this.logger.info('Sync job stopped');
    }
    await Promise.all(this.inFlight);
  }

  /**
   * Run one cycle. Errors are logged; the job keeps its schedule.
   */
  async run(): Promise<SyncCycleReport | null> {
    try {
      return await this.engine.runSyncCycle();
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Sync cycle failed');
      return null;
    }
  }

  private tick(): Promise<SyncCycleReport | null> {
    const run = this.run();
    this.inFlight.add(run);
    return run.finally(() => {
      this.inFlight.delete(run);
    });
  }
}
