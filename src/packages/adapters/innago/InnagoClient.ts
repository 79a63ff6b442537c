/**
 * InnagoClient - Property management API adapter
 *
 * Implements IPropertyManagementClient over the Innago REST API. Payloads are
 * parsed into port records here; nothing downstream sees raw JSON.
 *
 * @module packages/adapters/innago/InnagoClient
 */

import type { Logger } from 'pino';
import type {
  IPropertyManagementClient,
  PmLease,
  PmTenant,
  PmMaintenanceTicket,
  PmInvoiceLineItem,
  TicketStatusFilter,
} from '../../core/ports/index.js';
import { createChildLogger } from '../../../utils/logger.js';
import { ResilientHttpClient, parseResponse, type FetchLike } from '../http/ResilientHttpClient.js';
import {
  leaseSchema,
  leaseListSchema,
  tenantListSchema,
  maintenanceTicketListSchema,
  invoiceListSchema,
  createdSchema,
  type RawLease,
} from './schemas.js';

const SERVICE = 'innago';

/** Invoice states that still count toward the amount owed */
const UNPAID_INVOICE_STATUSES = new Set(['unpaid', 'partially_paid', 'overdue']);

/** Category the recurring upgrade charge is filed under */
const RECURRING_CHARGE_CATEGORY = 'Utilities';

export interface InnagoClientOptions {
  apiUrl: string;
  apiKey: string;
  timeoutMs?: number;
  errorThresholdPercentage?: number;
  resetTimeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

function optionalString(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return text === '' ? null : text;
}

function toLease(raw: RawLease): PmLease {
  const tenantIds = raw.tenantIds ?? raw.tenants?.map((t) => t.id) ?? [];
  const propertyAddress =
    optionalString(raw.property?.address) ??
    optionalString(raw.property?.name) ??
    optionalString(raw.unit?.property?.address) ??
    optionalString(raw.unit?.property?.name);

  return {
    id: raw.id,
    unitNumber: optionalString(raw.unitNumber) ?? optionalString(raw.unit?.number),
    unitName: optionalString(raw.unit?.name),
    propertyAddress,
    tenantIds,
    startDate: optionalString(raw.startDate),
  };
}

export class InnagoClient implements IPropertyManagementClient {
  private readonly http: ResilientHttpClient;
  private readonly logger: Logger;

  constructor(options: InnagoClientOptions) {
    this.logger = options.logger ?? createChildLogger({ component: 'InnagoClient' });
    this.http = new ResilientHttpClient({
      service: SERVICE,
      baseUrl: options.apiUrl,
      headers: {
        'x-api-key': options.apiKey,
        'Content-Type': 'application/json',
      },
      timeoutMs: options.timeoutMs,
      errorThresholdPercentage: options.errorThresholdPercentage,
      resetTimeoutMs: options.resetTimeoutMs,
      fetchImpl: options.fetchImpl,
      logger: this.logger,
    });
  }

  async getActiveLeases(propertyId: string): Promise<PmLease[]> {
    const data = await this.http.get('/v1/leases', { propertyId, status: 'active' });
    return parseResponse(SERVICE, 'lease list', leaseListSchema, data).map(toLease);
  }

  /**
   * Balance from the lease itself when reported, otherwise the sum of
   * outstanding invoice amounts.
   */
  async getLeaseBalance(leaseId: string): Promise<number> {
    const lease = parseResponse(
      SERVICE,
      'lease',
      leaseSchema,
      await this.http.get(`/v1/leases/${encodeURIComponent(leaseId)}`)
    );

    const reported = lease.balance ?? lease.outstandingBalance;
    if (reported !== null && reported !== undefined) {
      return reported;
    }

    this.logger.debug({ leaseId }, 'Lease has no balance field, summing unpaid invoices');
    const invoices = parseResponse(
      SERVICE,
      'invoice list',
      invoiceListSchema,
      await this.http.get('/v1/invoices', { leaseId })
    );

    let owed = 0;
    for (const invoice of invoices) {
      if (invoice.status && UNPAID_INVOICE_STATUSES.has(invoice.status)) {
        owed += (invoice.amount ?? 0) - (invoice.amountPaid ?? 0);
      }
    }
    return Math.round(owed * 100) / 100;
  }

  async getTenantsByLease(leaseId: string): Promise<PmTenant[]> {
    const data = await this.http.get('/v1/tenants', { leaseId });
    return parseResponse(SERVICE, 'tenant list', tenantListSchema, data).map((t) => ({
      id: t.id,
      firstName: t.firstName ?? '',
      lastName: t.lastName ?? '',
      email: optionalString(t.email),
    }));
  }

  async getMaintenanceTickets(propertyId: string, status: TicketStatusFilter): Promise<PmMaintenanceTicket[]> {
    const data = await this.http.get('/v1/maintenance', { propertyId, status });
    return parseResponse(SERVICE, 'maintenance ticket list', maintenanceTicketListSchema, data).map((t) => ({
      id: t.id,
      subject: t.subject ?? '',
      description: t.description ?? '',
      status: t.status ?? status,
      unitNumber: optionalString(t.unitNumber) ?? optionalString(t.unit?.number),
      unitName: optionalString(t.unit?.name),
    }));
  }

  async createRecurringCharge(leaseId: string, description: string, amount: number): Promise<string> {
    const data = await this.http.post('/v1/recurring-charges', {
      leaseId,
      description,
      amount,
      category: RECURRING_CHARGE_CATEGORY,
    });
    return parseResponse(SERVICE, 'recurring charge', createdSchema, data).id;
  }

  async updateRecurringCharge(chargeId: string, amount: number, description?: string): Promise<void> {
    const body: Record<string, unknown> = { amount };
    if (description) body.description = description;
    await this.http.patch(`/v1/recurring-charges/${encodeURIComponent(chargeId)}`, body);
  }

  async deleteRecurringCharge(chargeId: string): Promise<void> {
    await this.http.delete(`/v1/recurring-charges/${encodeURIComponent(chargeId)}`);
  }

  async createInvoice(tenantId: string, lineItems: PmInvoiceLineItem[]): Promise<string> {
    const data = await this.http.post('/v1/invoices', { tenantId, lineItems });
    return parseResponse(SERVICE, 'invoice', createdSchema, data).id;
  }

  shutdown(): void {
    this.http.shutdown();
  }
}
