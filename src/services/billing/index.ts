export {
  computeMonthlyBill,
  computeProratedCredit,
  daysInMonthOf,
  roundCents,
  DEFAULT_CREDIT_FLOOR,
} from './BillingCalculator.js';
export { BillingReportService } from './BillingReportService.js';
export type { BillingReportDeps, InvoiceResult } from './BillingReportService.js';
export { findOrCreateCompanyClient } from './companyClient.js';
