/**
 * Property Management Client Interface
 *
 * Contract for the property-management system (leases, balances, tenants,
 * maintenance tickets, recurring charges and tenant invoices). Adapters parse
 * remote payloads into these records before they reach the engine.
 *
 * @module packages/core/ports/IPropertyManagementClient
 */

/**
 * An active lease as reported by the property-management system
 */
export interface PmLease {
  id: string;
  /** Structured unit number, when the system provides one */
  unitNumber: string | null;
  /** Free-text unit name (e.g. "Apt 12B") */
  unitName: string | null;
  propertyAddress: string | null;
  tenantIds: string[];
  startDate: string | null;
}

export interface PmTenant {
  id: string;
  firstName: string;
  lastName: string;
  email: string | null;
}

export interface PmMaintenanceTicket {
  id: string;
  subject: string;
  description: string;
  status: string;
  unitNumber: string | null;
  unitName: string | null;
}

export interface PmInvoiceLineItem {
  description: string;
  amount: number;
}

export type TicketStatusFilter = 'open' | 'in_progress' | 'closed';

export interface IPropertyManagementClient {
  getActiveLeases(propertyId: string): Promise<PmLease[]>;
  /** Outstanding balance; > 0 means the tenant owes money */
  getLeaseBalance(leaseId: string): Promise<number>;
  getTenantsByLease(leaseId: string): Promise<PmTenant[]>;
  getMaintenanceTickets(propertyId: string, status: TicketStatusFilter): Promise<PmMaintenanceTicket[]>;
  /** @returns the new charge id */
  createRecurringCharge(leaseId: string, description: string, amount: number): Promise<string>;
  updateRecurringCharge(chargeId: string, amount: number, description?: string): Promise<void>;
  deleteRecurringCharge(chargeId: string): Promise<void>;
  /** @returns the new invoice id */
  createInvoice(tenantId: string, lineItems: PmInvoiceLineItem[]): Promise<string>;
}
