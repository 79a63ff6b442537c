/**
 * BillingReportService - monthly bill for the complex
 *
 * The complex is billed for every occupied unit at the base rate plus the
 * add-on for each upgraded unit. Snapshots are appended to billing history;
 * the invoice itself is only created on request.
 *
 * @module services/billing/BillingReportService
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../../config.js';
import type { IBillingClient, ISyncStateStore, BillingInvoiceItem } from '../../packages/core/ports/index.js';
import type { BillingSnapshot } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import { computeMonthlyBill } from './BillingCalculator.js';
import { findOrCreateCompanyClient } from './companyClient.js';

export interface BillingReportDeps {
  config: AppConfig;
  store: ISyncStateStore;
  billing: IBillingClient;
  clock?: () => Date;
  logger?: Logger;
}

export interface InvoiceResult {
  clientId: string;
  invoiceId: string;
  items: BillingInvoiceItem[];
}

function compareUnits(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true });
}

export class BillingReportService {
  private readonly config: AppConfig;
  private readonly store: ISyncStateStore;
  private readonly billing: IBillingClient;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(deps: BillingReportDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.billing = deps.billing;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? createChildLogger({ component: 'BillingReportService' });
  }

  /**
   * Build the snapshot for a month (default: the current one) and append it
   * to billing history
   */
  generate(month?: number, year?: number): BillingSnapshot {
    const now = this.clock();
    const reportMonth = month ?? now.getUTCMonth() + 1;
    const reportYear = year ?? now.getUTCFullYear();
    if (!Number.isInteger(reportMonth) || reportMonth < 1 || reportMonth > 12) {
      throw new ValidationError(`Invalid month: ${reportMonth}`, 'month');
    }

    const { billing } = this.config;
    const active = this.store.listLeases('active');
    const occupiedUnits = active.length;

    const addonPrices: Record<string, number> = {};
    const upgradeCounts: Record<string, number> = {};
    for (const pkg of this.config.packages) {
      if (pkg.addonPrice > 0) {
        addonPrices[pkg.name] = pkg.addonPrice;
        upgradeCounts[pkg.name] = 0;
      }
    }
    for (const lease of active) {
      const count = upgradeCounts[lease.packageName];
      if (count !== undefined) {
        upgradeCounts[lease.packageName] = count + 1;
      }
    }

    const snapshot: BillingSnapshot = {
      month: reportMonth,
      year: reportYear,
      occupiedUnits,
      totalUnits: billing.totalUnits,
      vacantUnits: Math.max(billing.totalUnits - occupiedUnits, 0),
      baseRate: billing.baseRate,
      upgradeCounts,
      bill: computeMonthlyBill(occupiedUnits, billing.baseRate, upgradeCounts, addonPrices),
      units: active.map((l) => l.unitId).sort(compareUnits),
      generatedAt: now,
    };

    this.store.saveBillingSnapshot(snapshot);
    this.store.logEvent('billing_report', {
      month: reportMonth,
      year: reportYear,
      occupiedUnits,
      grandTotal: snapshot.bill.grandTotal,
    });
    this.logger.info(
      { month: reportMonth, year: reportYear, occupiedUnits, grandTotal: snapshot.bill.grandTotal },
      'Billing report generated'
    );

    return snapshot;
  }

  /**
   * Invoice lines for a snapshot: base service plus one line per upgrade
   * package in use
   */
  invoiceItems(snapshot: BillingSnapshot): BillingInvoiceItem[] {
    const items: BillingInvoiceItem[] = [];

    if (snapshot.occupiedUnits > 0) {
      items.push({
        description: `Internet Service - ${snapshot.occupiedUnits} occupied units @ $${snapshot.baseRate.toFixed(2)}/unit`,
        quantity: snapshot.occupiedUnits,
        price: snapshot.baseRate,
      });
    }

    for (const pkg of this.config.packages) {
      const count = snapshot.upgradeCounts[pkg.name] ?? 0;
      if (count > 0 && pkg.addonPrice > 0) {
        items.push({ description: `${pkg.name} Upgrade Add-on`, quantity: count, price: pkg.addonPrice });
      }
    }

    return items;
  }

  /**
   * Create the month's invoice against the complex's CRM client
   */
  async createInvoice(snapshot: BillingSnapshot): Promise<InvoiceResult> {
    const items = this.invoiceItems(snapshot);
    if (items.length === 0) {
      throw new ValidationError('Nothing to invoice: no occupied units', 'occupiedUnits');
    }

    const { billing } = this.config;
    const clientId = await findOrCreateCompanyClient(this.billing, billing.complexClientName, {
      email: billing.complexEmail,
      sendInvoiceByEmail: true,
      note: 'Apartment complex billing - monthly internet service',
    });
    const invoiceId = await this.billing.createInvoice(clientId, items, billing.invoiceDueDays);

    this.store.logEvent('invoice_created', {
      clientId,
      invoiceId,
      month: snapshot.month,
      year: snapshot.year,
      total: snapshot.bill.grandTotal,
    });
    this.logger.info({ clientId, invoiceId, total: snapshot.bill.grandTotal }, 'Complex invoice created');

    return { clientId, invoiceId, items };
  }
}
