/**
 * Billing Drift Phase
 *
 * The billing system's service status is authoritative. For every lease
 * registered there:
 * - billing suspended, not yet held: suspend the endpoint, credit the tenant
 *   for the rest of the month, then record the hold
 * - billing active, local suspended or held: release the hold and reactivate,
 *   unless rent is delinquent (the delinquency phase owns that suspension)
 *
 * The hold is what makes the suspension and credit happen once per billing
 * suspension, whatever the delinquency phase does to the lease meanwhile.
 *
 * @module services/sync/BillingDriftPhase
 */

import type { Logger } from 'pino';
import type { LeaseRecord } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage, logError } from '../../utils/errors.js';
import { computeProratedCredit, daysInMonthOf } from '../billing/BillingCalculator.js';
import { leasePackage } from './charges.js';
import { emptyResult, type PhaseResult, type SyncDependencies, type SyncPhase } from './context.js';

export const DRIFT_SUSPEND_REASON = 'Suspended in billing system';

export class BillingDriftPhase implements SyncPhase {
  readonly name = 'drift' as const;
  private readonly logger: Logger;

  constructor(
    private readonly deps: SyncDependencies,
    logger?: Logger
  ) {
    this.logger = logger ?? createChildLogger({ component: 'BillingDriftPhase' });
  }

  async run(now: Date): Promise<PhaseResult> {
    const { store } = this.deps;
    const result = emptyResult();

    const registered = store
      .listLeases('active')
      .filter((record) => record.billingClientId !== null && record.billingServiceId !== null);

    for (const record of registered) {
      result.processed++;
      try {
        if (await this.reconcile(record, now)) result.changed++;
      } catch (error) {
        result.failed++;
        logError(this.logger, error, { leaseId: record.leaseId, serviceId: record.billingServiceId }, 'Drift check failed');
        store.logEvent('drift_failed', { leaseId: record.leaseId, error: errorMessage(error) });
      }
    }

    return result;
  }

  private async reconcile(record: LeaseRecord, now: Date): Promise<boolean> {
    const { billing } = this.deps;
    if (!record.billingClientId || !record.billingServiceId) return false;

    const services = await billing.getServices(record.billingClientId);
    const service = services.find((s) => s.id === record.billingServiceId);
    if (!service) {
      this.logger.warn(
        { leaseId: record.leaseId, serviceId: record.billingServiceId },
        'Billing service not found for lease'
      );
      return false;
    }

    if (service.status === 'suspended') {
      if (record.billingSuspended) return false;
      await this.suspendForBilling(record, now);
      return true;
    }

    if (!record.billingSuspended && record.serviceStatus === 'active') return false;

    if (record.rentStatus === 'delinquent') {
      if (!record.billingSuspended) {
        this.logger.debug({ leaseId: record.leaseId }, 'Billing active but rent delinquent; leaving suspended');
        return false;
      }
      this.deps.store.updateLease(record.leaseId, { billingSuspended: false }, now);
      this.logger.info({ leaseId: record.leaseId }, 'Billing hold released; rent still delinquent');
      return true;
    }

    await this.reactivate(record, now);
    return true;
  }

  private async suspendForBilling(record: LeaseRecord, now: Date): Promise<void> {
    const { config, endpoints, propertyManagement, store } = this.deps;

    await endpoints.suspend(record.propertyAddress, record.unitId, DRIFT_SUSPEND_REASON);

    const pkg = leasePackage(config, record, this.logger);
    const monthlyRate = config.billing.baseRate + pkg.addonPrice;
    const credit = computeProratedCredit(
      monthlyRate,
      now.getUTCDate(),
      daysInMonthOf(now),
      config.billing.creditFloor
    );

    if (credit > 0) {
      if (record.tenantId) {
        const invoiceId = await propertyManagement.createInvoice(record.tenantId, [
          { description: `Internet service credit - suspended ${now.toISOString().slice(0, 10)}`, amount: -credit },
        ]);
        store.logEvent('credit_applied', { leaseId: record.leaseId, tenantId: record.tenantId, credit, invoiceId });
        this.logger.info({ leaseId: record.leaseId, credit }, 'Prorated credit applied');
      } else {
        this.logger.warn({ leaseId: record.leaseId, credit }, 'Lease has no tenant on record; credit not applied');
      }
    }

    store.updateLease(record.leaseId, { serviceStatus: 'suspended', billingSuspended: true }, now);
    store.logEvent('drift_suspend', { leaseId: record.leaseId, unitId: record.unitId, credit });
    this.logger.info({ leaseId: record.leaseId, unitId: record.unitId }, 'Suspended to match billing system');
  }

  private async reactivate(record: LeaseRecord, now: Date): Promise<void> {
    const { config, endpoints, store } = this.deps;
    const pkg = leasePackage(config, record, this.logger);

    await endpoints.activate(record.propertyAddress, record.unitId, pkg);
    store.updateLease(record.leaseId, { serviceStatus: 'active', billingSuspended: false }, now);
    store.logEvent('drift_reactivate', { leaseId: record.leaseId, unitId: record.unitId });
    this.logger.info({ leaseId: record.leaseId, unitId: record.unitId }, 'Reactivated to match billing system');
  }
}
