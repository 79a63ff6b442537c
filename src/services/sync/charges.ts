/**
 * Recurring upgrade charges and tenant billing registration
 *
 * Internet at the default package is included in rent. A lease on a paid
 * package carries one recurring charge in the property-management system;
 * the charge id lives on the lease record so it can be updated or removed.
 */

import type { Logger } from 'pino';
import type { LeaseRecord, ServicePackage } from '../../types/index.js';
import type { PmTenant } from '../../packages/core/ports/index.js';
import { formatDate } from '../../packages/adapters/uisp/UispCrmClient.js';
import { getDefaultPackage, getPackageByName, type AppConfig } from '../../config.js';
import type { SyncDependencies } from './context.js';

/**
 * The package a lease record is on. Falls back to the default package when
 * the recorded one has been removed from the catalog.
 */
export function leasePackage(config: AppConfig, lease: LeaseRecord, logger: Logger): ServicePackage {
  const pkg = getPackageByName(config, lease.packageName);
  if (pkg) return pkg;

  logger.warn(
    { leaseId: lease.leaseId, package: lease.packageName },
    'Lease package is no longer configured; using the default package'
  );
  return getDefaultPackage(config);
}

export function upgradeChargeDescription(pkg: ServicePackage): string {
  return `Internet upgrade - ${pkg.name}`;
}

/**
 * Make the lease's recurring charge match the package: create, update or
 * remove it. Returns the updated record.
 */
export async function applyPackageCharge(
  deps: Pick<SyncDependencies, 'propertyManagement' | 'store'>,
  lease: LeaseRecord,
  pkg: ServicePackage,
  now: Date,
  logger: Logger
): Promise<LeaseRecord> {
  const { propertyManagement, store } = deps;

  if (pkg.addonPrice > 0) {
    const description = upgradeChargeDescription(pkg);

    if (lease.recurringChargeId) {
      await propertyManagement.updateRecurringCharge(lease.recurringChargeId, pkg.addonPrice, description);
      store.logEvent('recurring_charge_updated', {
        leaseId: lease.leaseId,
        chargeId: lease.recurringChargeId,
        amount: pkg.addonPrice,
      });
      logger.info({ leaseId: lease.leaseId, package: pkg.name }, 'Recurring charge updated');
      return lease;
    }

    const chargeId = await propertyManagement.createRecurringCharge(lease.leaseId, description, pkg.addonPrice);
    store.logEvent('recurring_charge_created', { leaseId: lease.leaseId, chargeId, amount: pkg.addonPrice });
    logger.info({ leaseId: lease.leaseId, chargeId, package: pkg.name }, 'Recurring charge created');
    return store.updateLease(lease.leaseId, { recurringChargeId: chargeId }, now);
  }

  return removePackageCharge(deps, lease, now, logger);
}

/**
 * Delete the lease's recurring charge, if it has one
 */
export async function removePackageCharge(
  deps: Pick<SyncDependencies, 'propertyManagement' | 'store'>,
  lease: LeaseRecord,
  now: Date,
  logger: Logger
): Promise<LeaseRecord> {
  if (!lease.recurringChargeId) {
    return lease;
  }

  await deps.propertyManagement.deleteRecurringCharge(lease.recurringChargeId);
  deps.store.logEvent('recurring_charge_removed', { leaseId: lease.leaseId, chargeId: lease.recurringChargeId });
  logger.info({ leaseId: lease.leaseId, chargeId: lease.recurringChargeId }, 'Recurring charge removed');
  return deps.store.updateLease(lease.leaseId, { recurringChargeId: null }, now);
}

/**
 * Register the lease's primary tenant as a CRM client with a service on the
 * package's plan. The client id is stored before the service is created so
 * a failed service call does not create a second client on retry.
 */
export async function registerTenantService(
  deps: Pick<SyncDependencies, 'billing' | 'store'>,
  lease: LeaseRecord,
  tenant: PmTenant,
  servicePlanId: string,
  now: Date,
  logger: Logger
): Promise<LeaseRecord> {
  let record = lease;

  if (!record.billingClientId) {
    const clientId = await deps.billing.createClient({
      firstName: tenant.firstName,
      lastName: tenant.lastName,
      email: tenant.email ?? undefined,
      street: `${record.propertyAddress} Unit ${record.unitId}`,
      note: `Lease ${record.leaseId}`,
    });
    record = deps.store.updateLease(record.leaseId, { billingClientId: clientId }, now);
  }

  const clientId = record.billingClientId;
  if (!clientId) {
    return record;
  }

  const serviceId = await deps.billing.createService(clientId, servicePlanId, formatDate(now));
  record = deps.store.updateLease(record.leaseId, { billingServiceId: serviceId }, now);

  deps.store.logEvent('billing_registered', { leaseId: record.leaseId, clientId, serviceId });
  logger.info({ leaseId: record.leaseId, clientId, serviceId }, 'Tenant registered in billing system');
  return record;
}
