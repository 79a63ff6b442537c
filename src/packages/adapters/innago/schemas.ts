/**
 * Zod schemas for property-management API payloads
 *
 * Only the fields the sync reads are declared; everything else passes through.
 */

import { z } from 'zod';

/** Ids arrive as numbers or strings depending on the endpoint */
export const idSchema = z.union([z.string().min(1), z.number()]).transform((v) => String(v));

const numericSchema = z.union([z.number(), z.string()]).transform((v, ctx) => {
  const n = typeof v === 'number' ? v : Number.parseFloat(v);
  if (Number.isNaN(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${String(v)}` });
    return z.NEVER;
  }
  return n;
});

const placeSchema = z
  .object({
    address: z.string().nullish(),
    name: z.string().nullish(),
  })
  .passthrough();

const unitSchema = z
  .object({
    number: z.union([z.string(), z.number()]).nullish(),
    name: z.string().nullish(),
    property: placeSchema.nullish(),
  })
  .passthrough();

export const leaseSchema = z
  .object({
    id: idSchema,
    unitNumber: z.union([z.string(), z.number()]).nullish(),
    unit: unitSchema.nullish(),
    property: placeSchema.nullish(),
    tenantIds: z.array(idSchema).nullish(),
    tenants: z.array(z.object({ id: idSchema }).passthrough()).nullish(),
    startDate: z.string().nullish(),
    balance: numericSchema.nullish(),
    outstandingBalance: numericSchema.nullish(),
  })
  .passthrough();

export type RawLease = z.infer<typeof leaseSchema>;

export const leaseListSchema = z.array(leaseSchema);

export const tenantSchema = z
  .object({
    id: idSchema,
    firstName: z.string().nullish(),
    lastName: z.string().nullish(),
    email: z.string().nullish(),
  })
  .passthrough();

export const tenantListSchema = z.array(tenantSchema);

export const maintenanceTicketSchema = z
  .object({
    id: idSchema,
    subject: z.string().nullish(),
    description: z.string().nullish(),
    status: z.string().nullish(),
    unitNumber: z.union([z.string(), z.number()]).nullish(),
    unit: unitSchema.nullish(),
  })
  .passthrough();

export const maintenanceTicketListSchema = z.array(maintenanceTicketSchema);

export const invoiceSchema = z
  .object({
    id: idSchema.optional(),
    status: z.string().nullish(),
    amount: numericSchema.nullish(),
    amountPaid: numericSchema.nullish(),
  })
  .passthrough();

export const invoiceListSchema = z.array(invoiceSchema);

/** Response to a create call: only the new id matters */
export const createdSchema = z.object({ id: idSchema }).passthrough();
