/**
 * Delinquency Phase
 *
 * Suspends service for leases with an outstanding balance and restores it
 * once the balance is paid. Nothing happens before the grace day of the
 * month. Transitions fire only when a lease crosses between current and
 * delinquent, so a lease that stays delinquent is not suspended again.
 * Paying up does not lift a suspension the billing system still holds.
 *
 * @module services/sync/DelinquencyPhase
 */

import type { Logger } from 'pino';
import type { LeaseRecord } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage, logError } from '../../utils/errors.js';
import { leasePackage } from './charges.js';
import { emptyResult, type PhaseResult, type SyncDependencies, type SyncPhase } from './context.js';

export function delinquencyReason(balance: number): string {
  return `Rent delinquent - balance $${balance.toFixed(2)}`;
}

export class DelinquencyPhase implements SyncPhase {
  readonly name = 'delinquency' as const;
  private readonly logger: Logger;

  constructor(
    private readonly deps: SyncDependencies,
    logger?: Logger
  ) {
    this.logger = logger ?? createChildLogger({ component: 'DelinquencyPhase' });
  }

  async run(now: Date): Promise<PhaseResult> {
    const { config, store } = this.deps;
    const result = emptyResult();

    const graceDay = config.billing.gracePeriodDay;
    if (now.getUTCDate() < graceDay) {
      this.logger.debug({ day: now.getUTCDate(), graceDay }, 'Before grace day; delinquency not enforced');
      return { ...result, skipped: true };
    }

    for (const record of store.listLeases('active')) {
      result.processed++;
      try {
        if (await this.checkLease(record, now)) result.changed++;
      } catch (error) {
        result.failed++;
        logError(this.logger, error, { leaseId: record.leaseId, endpoint: record.endpointName }, 'Delinquency check failed');
        store.logEvent('delinquency_failed', { leaseId: record.leaseId, error: errorMessage(error) });
      }
    }

    return result;
  }

  /**
   * @returns true when the lease crossed the delinquent/current boundary
   */
  private async checkLease(record: LeaseRecord, now: Date): Promise<boolean> {
    const { propertyManagement, endpoints, store, config } = this.deps;
    const balance = await propertyManagement.getLeaseBalance(record.leaseId);

    if (balance > 0 && record.rentStatus !== 'delinquent') {
      const reason = delinquencyReason(balance);
      await endpoints.suspend(record.propertyAddress, record.unitId, reason);
      store.updateLease(
        record.leaseId,
        { rentStatus: 'delinquent', serviceStatus: 'suspended', lastBalance: balance },
        now
      );
      store.logEvent('delinquency_suspend', { leaseId: record.leaseId, unitId: record.unitId, balance });
      this.logger.info({ leaseId: record.leaseId, unitId: record.unitId, balance }, 'Suspended for delinquency');

      await this.notifySuspension(record, balance);
      return true;
    }

    if (balance <= 0 && record.rentStatus === 'delinquent') {
      if (record.billingSuspended) {
        store.updateLease(record.leaseId, { rentStatus: 'current', lastBalance: balance }, now);
        store.logEvent('delinquency_cleared', { leaseId: record.leaseId, unitId: record.unitId, balance, billingHold: true });
        this.logger.info({ leaseId: record.leaseId, unitId: record.unitId }, 'Delinquency cleared; billing system still holds service');
        return true;
      }

      const pkg = leasePackage(config, record, this.logger);
      await endpoints.activate(record.propertyAddress, record.unitId, pkg);
      store.updateLease(
        record.leaseId,
        { rentStatus: 'current', serviceStatus: 'active', lastBalance: balance },
        now
      );
      store.logEvent('delinquency_cleared', { leaseId: record.leaseId, unitId: record.unitId, balance });
      this.logger.info({ leaseId: record.leaseId, unitId: record.unitId }, 'Delinquency cleared; service restored');
      return true;
    }

    if (record.lastBalance !== balance) {
      store.updateLease(record.leaseId, { lastBalance: balance }, now);
    }
    return false;
  }

  private async notifySuspension(record: LeaseRecord, balance: number): Promise<void> {
    const { notifier, propertyManagement } = this.deps;
    if (!notifier) return;

    try {
      const tenants = await propertyManagement.getTenantsByLease(record.leaseId);
      for (const tenant of tenants) {
        await notifier.sendSuspensionNotice({ tenant, unitId: record.unitId, balance });
      }
    } catch (error) {
      logError(this.logger, error, { leaseId: record.leaseId }, 'Failed to send suspension notice');
    }
  }
}
