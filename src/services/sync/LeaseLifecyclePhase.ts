/**
 * Lease Lifecycle Phase
 *
 * Brings endpoints in line with the set of active leases:
 * - a lease we have not seen activates its unit on the default package
 * - a new lease on a unit held by another active record is a turnover: the
 *   old record is ended first
 * - an active record whose lease is gone is ended and its endpoint suspended
 *
 * @module services/sync/LeaseLifecyclePhase
 */

import type { Logger } from 'pino';
import type { PmLease, PmTenant } from '../../packages/core/ports/index.js';
import type { LeaseRecord, ServicePackage } from '../../types/index.js';
import { getDefaultPackage } from '../../config.js';
import { createChildLogger } from '../../utils/logger.js';
import {
  EndpointNotFoundError,
  EndpointNotProvisionedError,
  errorMessage,
  logError,
} from '../../utils/errors.js';
import { deriveEndpointName } from '../endpoint/naming.js';
import { applyPackageCharge, leasePackage, registerTenantService, removePackageCharge } from './charges.js';
import { resolveLeaseUnit, resolvePropertyAddress } from './resolution.js';
import { emptyResult, type PhaseResult, type SyncDependencies, type SyncPhase } from './context.js';

export const LEASE_ENDED_REASON = 'Lease ended';

interface ResolvedLease {
  lease: PmLease;
  unitId: string;
  propertyAddress: string;
  endpointName: string;
}

type LeaseOutcome = 'unchanged' | 'activated';

export class LeaseLifecyclePhase implements SyncPhase {
  readonly name = 'leases' as const;
  private readonly logger: Logger;

  constructor(
    private readonly deps: SyncDependencies,
    logger?: Logger
  ) {
    this.logger = logger ?? createChildLogger({ component: 'LeaseLifecyclePhase' });
  }

  async run(now: Date): Promise<PhaseResult> {
    const { config, propertyManagement, store } = this.deps;
    const result = emptyResult();

    const leases = await propertyManagement.getActiveLeases(config.propertyManagement.propertyId);
    const activeLeaseIds = new Set(leases.map((l) => l.id));

    for (const resolved of this.resolveAll(leases, result)) {
      result.processed++;
      try {
        const outcome = await this.processLease(resolved, now);
        if (outcome === 'activated') result.changed++;
      } catch (error) {
        result.failed++;
        logError(this.logger, error, { leaseId: resolved.lease.id, endpoint: resolved.endpointName }, 'Failed to process lease');
        store.logEvent('lease_failed', { leaseId: resolved.lease.id, error: errorMessage(error) });
      }
    }

    // Re-read after activations: turnovers have already ended their records
    for (const record of store.listLeases('active')) {
      if (activeLeaseIds.has(record.leaseId)) continue;

      result.processed++;
      try {
        await this.endLease(record, now);
        result.changed++;
      } catch (error) {
        result.failed++;
        logError(this.logger, error, { leaseId: record.leaseId, endpoint: record.endpointName }, 'Failed to end lease');
        store.logEvent('lease_failed', { leaseId: record.leaseId, error: errorMessage(error) });
      }
    }

    return result;
  }

  /**
   * Resolve unit, address and endpoint for each lease. When two leases land
   * on the same endpoint the later one wins.
   */
  private resolveAll(leases: PmLease[], result: PhaseResult): ResolvedLease[] {
    const { config, store } = this.deps;
    const byEndpoint = new Map<string, ResolvedLease>();

    for (const lease of leases) {
      try {
        const unitId = resolveLeaseUnit(lease, this.logger);
        const propertyAddress = resolvePropertyAddress(lease, config.propertyManagement.defaultPropertyAddress);
        const endpointName = deriveEndpointName(propertyAddress, unitId);

        const previous = byEndpoint.get(endpointName);
        if (previous) {
          this.logger.warn(
            { endpoint: endpointName, replacedLeaseId: previous.lease.id, leaseId: lease.id },
            'Duplicate endpoint mapping; the later lease wins'
          );
          // Keep insertion order following the most recent lease
          byEndpoint.delete(endpointName);
        }
        byEndpoint.set(endpointName, { lease, unitId, propertyAddress, endpointName });
      } catch (error) {
        result.processed++;
        result.failed++;
        logError(this.logger, error, { leaseId: lease.id }, 'Skipping lease');
        store.logEvent('lease_failed', { leaseId: lease.id, error: errorMessage(error) });
      }
    }

    return [...byEndpoint.values()];
  }

  private async processLease(resolved: ResolvedLease, now: Date): Promise<LeaseOutcome> {
    const { store } = this.deps;
    const existing = store.getLease(resolved.lease.id);

    if (existing?.lifecycleStatus === 'ended') {
      this.logger.warn(
        { leaseId: existing.leaseId, endpoint: resolved.endpointName },
        'Lease reported active again after it was ended; ignoring'
      );
      return 'unchanged';
    }

    if (existing) {
      await this.ensureLeaseExtras(existing, null, now);
      return 'unchanged';
    }

    await this.activateLease(resolved, now);
    return 'activated';
  }

  private async activateLease(resolved: ResolvedLease, now: Date): Promise<void> {
    const { config, endpoints, store } = this.deps;
    const { lease, unitId, propertyAddress, endpointName } = resolved;
    const pkg = getDefaultPackage(config);

    const occupant = store.findActiveLeaseByEndpoint(endpointName);
    if (occupant && occupant.leaseId !== lease.id) {
      this.logger.info(
        { endpoint: endpointName, previousLeaseId: occupant.leaseId, leaseId: lease.id },
        'Tenant turnover'
      );
      await this.endLease(occupant, now);
      store.logEvent('tenant_turnover', {
        endpoint: endpointName,
        previousLeaseId: occupant.leaseId,
        leaseId: lease.id,
      });
    }

    await endpoints.activate(propertyAddress, unitId, pkg);

    const record = store.upsertLease(
      {
        leaseId: lease.id,
        tenantId: lease.tenantIds[0] ?? null,
        unitId,
        propertyAddress,
        endpointName,
        packageName: pkg.name,
      },
      now
    );
    store.logEvent('unit_activated', { leaseId: lease.id, unitId, endpoint: endpointName, package: pkg.name });
    this.logger.info({ leaseId: lease.id, unitId, endpoint: endpointName }, 'Unit activated for new lease');

    const tenants = await this.fetchTenants(record.leaseId);
    await this.ensureLeaseExtras(record, tenants, now);
    await this.sendWelcome(record, lease, pkg, tenants);
  }

  /**
   * Suspend the endpoint, drop the upgrade charge and mark the record ended.
   * A remote failure leaves the record active so the next cycle retries.
   */
  async endLease(record: LeaseRecord, now: Date): Promise<void> {
    const { endpoints, store } = this.deps;

    try {
      await endpoints.suspend(record.propertyAddress, record.unitId, LEASE_ENDED_REASON);
    } catch (error) {
      if (!(error instanceof EndpointNotFoundError || error instanceof EndpointNotProvisionedError)) {
        throw error;
      }
      // Nothing on the network to switch off
      this.logger.warn(
        { leaseId: record.leaseId, endpoint: record.endpointName, error: error.message },
        'No provisioned endpoint for ended lease'
      );
    }

    await removePackageCharge(this.deps, record, now, this.logger);

    if (store.markLeaseEnded(record.leaseId, now)) {
      store.logEvent('lease_ended', { leaseId: record.leaseId, unitId: record.unitId, endpoint: record.endpointName });
      this.logger.info({ leaseId: record.leaseId, endpoint: record.endpointName }, 'Lease ended');
    }
  }

  /**
   * Follow-up work that is retried every cycle until done: billing
   * registration and the upgrade charge. Failures here never undo the
   * activation.
   */
  private async ensureLeaseExtras(record: LeaseRecord, tenants: PmTenant[] | null, now: Date): Promise<void> {
    const { config } = this.deps;
    const pkg = leasePackage(config, record, this.logger);
    let current = record;

    if (config.uisp.registerTenantServices && pkg.servicePlanId && !current.billingServiceId) {
      try {
        const primary = (tenants ?? (await this.deps.propertyManagement.getTenantsByLease(current.leaseId)))[0];
        if (primary) {
          current = await registerTenantService(this.deps, current, primary, pkg.servicePlanId, now, this.logger);
        } else {
          this.logger.warn({ leaseId: current.leaseId }, 'Lease has no tenants; cannot register billing service');
        }
      } catch (error) {
        logError(this.logger, error, { leaseId: current.leaseId }, 'Failed to register tenant in billing system');
      }
    }

    if (pkg.addonPrice > 0 && !current.recurringChargeId) {
      try {
        await applyPackageCharge(this.deps, current, pkg, now, this.logger);
      } catch (error) {
        logError(this.logger, error, { leaseId: current.leaseId }, 'Failed to create recurring charge');
      }
    }
  }

  private async fetchTenants(leaseId: string): Promise<PmTenant[] | null> {
    try {
      return await this.deps.propertyManagement.getTenantsByLease(leaseId);
    } catch (error) {
      logError(this.logger, error, { leaseId }, 'Failed to fetch tenants');
      return null;
    }
  }

  private async sendWelcome(
    record: LeaseRecord,
    lease: PmLease,
    pkg: ServicePackage,
    tenants: PmTenant[] | null
  ): Promise<void> {
    const { notifier, config } = this.deps;
    if (!notifier || !tenants) return;

    const upgradeOptions = config.packages.filter((p) => p.name !== pkg.name && p.addonPrice > 0);
    for (const tenant of tenants) {
      try {
        await notifier.sendWelcome({
          tenant,
          unitId: record.unitId,
          startDate: lease.startDate,
          servicePackage: pkg,
          upgradeOptions,
        });
      } catch (error) {
        logError(this.logger, error, { leaseId: record.leaseId, tenantId: tenant.id }, 'Failed to send welcome email');
      }
    }
  }
}
