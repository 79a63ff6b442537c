/**
 * Domain types shared by the sync engine, the state store and the CLI.
 */

// =============================================================================
// Lease Records
// =============================================================================

export type LeaseLifecycleStatus = 'active' | 'ended';

export type ServiceStatus = 'active' | 'suspended';

export type RentStatus = 'current' | 'delinquent';

/**
 * One tenancy-to-service binding. Keyed by lease id; never deleted.
 */
export interface LeaseRecord {
  leaseId: string;
  tenantId: string | null;
  unitId: string;
  propertyAddress: string;
  endpointName: string;
  packageName: string;
  billingClientId: string | null;
  billingServiceId: string | null;
  recurringChargeId: string | null;
  lifecycleStatus: LeaseLifecycleStatus;
  serviceStatus: ServiceStatus;
  rentStatus: RentStatus;
  /** The billing system holds the service suspended */
  billingSuspended: boolean;
  lastBalance: number | null;
  createdAt: Date;
  lastSyncedAt: Date;
  endedAt: Date | null;
}

/**
 * Fields that may change after a lease record is created
 */
export type LeaseRecordPatch = Partial<
  Pick<
    LeaseRecord,
    | 'tenantId'
    | 'packageName'
    | 'billingClientId'
    | 'billingServiceId'
    | 'recurringChargeId'
    | 'serviceStatus'
    | 'rentStatus'
    | 'billingSuspended'
    | 'lastBalance'
  >
>;

// =============================================================================
// Ticket Forwarding
// =============================================================================

export type TicketClassification = 'support' | 'upgrade';

export interface TicketForwardRecord {
  inboundTicketId: string;
  outboundTicketId: string;
  classification: TicketClassification;
  forwardedAt: Date;
}

// =============================================================================
// Event Log
// =============================================================================

export const SYNC_EVENT_TYPES = [
  'cycle_started',
  'cycle_completed',
  'phase_failed',
  'unit_activated',
  'lease_ended',
  'lease_failed',
  'tenant_turnover',
  'billing_registered',
  'recurring_charge_created',
  'recurring_charge_updated',
  'recurring_charge_removed',
  'delinquency_suspend',
  'delinquency_cleared',
  'delinquency_failed',
  'drift_suspend',
  'drift_reactivate',
  'drift_failed',
  'credit_applied',
  'ticket_forwarded',
  'ticket_upgrade',
  'ticket_failed',
  'endpoint_provisioned',
  'endpoint_activated',
  'endpoint_suspended',
  'billing_report',
  'invoice_created',
] as const;

export type SyncEventType = (typeof SYNC_EVENT_TYPES)[number];

export function isSyncEventType(value: string): value is SyncEventType {
  return SYNC_EVENT_TYPES.some((type) => type === value);
}

export interface SyncEvent {
  id: number;
  eventType: SyncEventType;
  details: Record<string, unknown>;
  createdAt: Date;
}

// =============================================================================
// Endpoints (ONUs)
// =============================================================================

export const ENDPOINT_STATUSES = ['pending', 'unprovisioned', 'suspended', 'active'] as const;

export type EndpointStatus = (typeof ENDPOINT_STATUSES)[number];

/**
 * One physical network termination unit bound to a property + unit
 */
export interface EndpointRecord {
  name: string;
  serialNumber: string;
  macAddress: string;
  property: string;
  unit: string;
  dateAdded: string;
  status: EndpointStatus;
  deviceId: string;
}

export interface Bandwidth {
  downloadMbps: number;
  uploadMbps: number;
}

// =============================================================================
// Packages & Billing
// =============================================================================

export interface ServicePackage {
  name: string;
  downloadMbps: number;
  uploadMbps: number;
  /** Monthly add-on over the included base service */
  addonPrice: number;
  /** CRM service plan, when tenants are registered in the billing system */
  servicePlanId?: string;
  default: boolean;
}

export interface MonthlyBill {
  baseTotal: number;
  upgradeTotal: number;
  grandTotal: number;
}

/**
 * Derived billing snapshot; appended to history, never mutated
 */
export interface BillingSnapshot {
  month: number;
  year: number;
  occupiedUnits: number;
  totalUnits: number;
  vacantUnits: number;
  baseRate: number;
  upgradeCounts: Record<string, number>;
  bill: MonthlyBill;
  units: string[];
  generatedAt: Date;
}

export interface BillingHistoryEntry {
  id: number;
  month: number;
  year: number;
  occupiedUnits: number;
  upgradeTotal: number;
  totalAmount: number;
  generatedAt: Date;
}
