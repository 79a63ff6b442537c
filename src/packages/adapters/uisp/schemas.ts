/**
 * Zod schemas for UISP CRM and NMS payloads
 */

import { z } from 'zod';
import { idSchema } from '../innago/schemas.js';

/** CRM service status codes */
export const CRM_SERVICE_STATUS = {
  ACTIVE: 1,
  SUSPENDED: 3,
} as const;

export const crmClientSchema = z
  .object({
    id: idSchema,
    companyName: z.string().nullish(),
    firstName: z.string().nullish(),
    lastName: z.string().nullish(),
  })
  .passthrough();

export const crmClientListSchema = z.array(crmClientSchema);

export const crmServiceSchema = z
  .object({
    id: idSchema,
    clientId: idSchema,
    status: z.coerce.number().int(),
    servicePlanId: idSchema.nullish(),
  })
  .passthrough();

export const crmServiceListSchema = z.array(crmServiceSchema);

export const createdSchema = z.object({ id: idSchema }).passthrough();

export const nmsDeviceSchema = z
  .object({
    identification: z
      .object({
        id: idSchema,
        name: z.string().nullish(),
        serialNumber: z.string().nullish(),
        mac: z.string().nullish(),
        model: z.string().nullish(),
        authorized: z.boolean().nullish(),
        type: z.string().nullish(),
      })
      .passthrough(),
    overview: z
      .object({
        status: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type RawNmsDevice = z.infer<typeof nmsDeviceSchema>;

export const nmsDeviceListSchema = z.array(nmsDeviceSchema);
