/**
 * UispCrmClient - Billing/CRM adapter
 *
 * Clients, services, tickets and invoices in UISP CRM.
 *
 * @module packages/adapters/uisp/UispCrmClient
 */

import type { Logger } from 'pino';
import type {
  IBillingClient,
  BillingService,
  BillingServiceStatus,
  BillingClientRecord,
  CreateBillingClientParams,
  BillingServicePatch,
  BillingInvoiceItem,
} from '../../core/ports/index.js';
import { createChildLogger } from '../../../utils/logger.js';
import { ResilientHttpClient, parseResponse, type FetchLike } from '../http/ResilientHttpClient.js';
import {
  CRM_SERVICE_STATUS,
  crmClientListSchema,
  crmServiceListSchema,
  createdSchema,
} from './schemas.js';

const SERVICE = 'uisp-crm';

export interface UispClientOptions {
  host: string;
  protocol: 'http' | 'https';
  apiKey: string;
  timeoutMs?: number;
  errorThresholdPercentage?: number;
  resetTimeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
  /** Clock for invoice dates */
  now?: () => Date;
}

function toServiceStatus(code: number): BillingServiceStatus {
  if (code === CRM_SERVICE_STATUS.ACTIVE) return 'active';
  if (code === CRM_SERVICE_STATUS.SUSPENDED) return 'suspended';
  return 'other';
}

/** CRM ids are integers on the wire */
function toWireId(id: string): number | string {
  return /^\d+$/.test(id) ? Number.parseInt(id, 10) : id;
}

/**
 * Format a date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class UispCrmClient implements IBillingClient {
  private readonly http: ResilientHttpClient;
  private readonly now: () => Date;

  constructor(options: UispClientOptions) {
    const logger = options.logger ?? createChildLogger({ component: 'UispCrmClient' });
    this.now = options.now ?? (() => new Date());
    this.http = new ResilientHttpClient({
      service: SERVICE,
      baseUrl: `${options.protocol}://${options.host}/crm/api/v1.0`,
      headers: {
        'X-Auth-App-Key': options.apiKey,
        'Content-Type': 'application/json',
      },
      timeoutMs: options.timeoutMs,
      errorThresholdPercentage: options.errorThresholdPercentage,
      resetTimeoutMs: options.resetTimeoutMs,
      fetchImpl: options.fetchImpl,
      logger,
    });
  }

  async createClient(params: CreateBillingClientParams): Promise<string> {
    const body: Record<string, unknown> = {
      firstName: params.firstName,
      lastName: params.lastName,
      isLead: false,
    };
    if (params.email) body.email = params.email;
    if (params.companyName) body.companyName = params.companyName;
    if (params.street) body.street1 = params.street;
    if (params.note) body.note = params.note;
    if (params.sendInvoiceByEmail !== undefined) body.sendInvoiceByEmail = params.sendInvoiceByEmail;

    const data = await this.http.post('/clients', body);
    return parseResponse(SERVICE, 'client', createdSchema, data).id;
  }

  async createService(clientId: string, servicePlanId: string, activeFrom: string): Promise<string> {
    const data = await this.http.post('/services', {
      clientId: toWireId(clientId),
      servicePlanId: toWireId(servicePlanId),
      activeFrom,
      status: CRM_SERVICE_STATUS.ACTIVE,
    });
    return parseResponse(SERVICE, 'service', createdSchema, data).id;
  }

  async updateService(serviceId: string, patch: BillingServicePatch): Promise<void> {
    const body: Record<string, unknown> = {};
    if (patch.servicePlanId !== undefined) body.servicePlanId = toWireId(patch.servicePlanId);
    if (patch.note !== undefined) body.note = patch.note;
    await this.http.patch(`/services/${encodeURIComponent(serviceId)}`, body);
  }

  async getServices(clientId: string): Promise<BillingService[]> {
    const data = await this.http.get('/services', { clientId });
    return parseResponse(SERVICE, 'service list', crmServiceListSchema, data).map((s) => ({
      id: s.id,
      clientId: s.clientId,
      status: toServiceStatus(s.status),
      servicePlanId: s.servicePlanId ?? null,
    }));
  }

  async createTicket(clientId: string, subject: string, message: string, deviceId?: string): Promise<string> {
    const body: Record<string, unknown> = {
      clientId: toWireId(clientId),
      subject,
      message,
    };
    if (deviceId) body.deviceId = deviceId;

    const data = await this.http.post('/tickets', body);
    return parseResponse(SERVICE, 'ticket', createdSchema, data).id;
  }

  async listClients(): Promise<BillingClientRecord[]> {
    const data = await this.http.get('/clients');
    return parseResponse(SERVICE, 'client list', crmClientListSchema, data).map((c) => ({
      id: c.id,
      companyName: c.companyName ?? null,
      firstName: c.firstName ?? null,
      lastName: c.lastName ?? null,
    }));
  }

  async createInvoice(clientId: string, items: BillingInvoiceItem[], dueDays: number): Promise<string> {
    const created = this.now();
    const due = new Date(created.getTime() + dueDays * 24 * 60 * 60 * 1000);
    const data = await this.http.post('/invoices', {
      clientId: toWireId(clientId),
      createdDate: formatDate(created),
      dueDate: formatDate(due),
      items,
    });
    return parseResponse(SERVICE, 'invoice', createdSchema, data).id;
  }

  shutdown(): void {
    this.http.shutdown();
  }
}
