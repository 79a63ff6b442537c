/**
 * Billing (CRM) Client Interface
 *
 * @module packages/core/ports/IBillingClient
 */

export type BillingServiceStatus = 'active' | 'suspended' | 'other';

export interface BillingService {
  id: string;
  clientId: string;
  status: BillingServiceStatus;
  servicePlanId: string | null;
}

export interface BillingClientRecord {
  id: string;
  companyName: string | null;
  firstName: string | null;
  lastName: string | null;
}

export interface CreateBillingClientParams {
  firstName: string;
  lastName: string;
  email?: string;
  companyName?: string;
  street?: string;
  note?: string;
  sendInvoiceByEmail?: boolean;
}

export interface BillingServicePatch {
  servicePlanId?: string;
  note?: string;
}

export interface BillingInvoiceItem {
  description: string;
  quantity: number;
  price: number;
}

export interface IBillingClient {
  /** @returns the new client id */
  createClient(params: CreateBillingClientParams): Promise<string>;
  /** @returns the new service id */
  createService(clientId: string, servicePlanId: string, activeFrom: string): Promise<string>;
  updateService(serviceId: string, patch: BillingServicePatch): Promise<void>;
  getServices(clientId: string): Promise<BillingService[]>;
  /** @returns the new ticket id */
  createTicket(clientId: string, subject: string, message: string, deviceId?: string): Promise<string>;
  listClients(): Promise<BillingClientRecord[]>;
  /** @returns the new invoice id */
  createInvoice(clientId: string, items: BillingInvoiceItem[], dueDays: number): Promise<string>;
}
