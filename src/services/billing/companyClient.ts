/**
 * Find-or-create for company-level CRM clients (the complex's billing
 * client and the client tickets are filed under)
 */

import type { IBillingClient, CreateBillingClientParams } from '../../packages/core/ports/index.js';

/**
 * Id of the client whose company name (or full contact name) equals
 * `companyName`, creating the client when none exists
 */
export async function findOrCreateCompanyClient(
  billing: IBillingClient,
  companyName: string,
  defaults: Omit<CreateBillingClientParams, 'companyName' | 'firstName' | 'lastName'> & {
    contactName?: string;
  } = {}
): Promise<string> {
  const wanted = companyName.trim().toLowerCase();
  const clients = await billing.listClients();

  const existing = clients.find((client) => {
    const company = (client.companyName ?? '').trim().toLowerCase();
    const person = `${client.firstName ?? ''} ${client.lastName ?? ''}`.trim().toLowerCase();
    return company === wanted || person === wanted;
  });
  if (existing) {
    return existing.id;
  }

  const { contactName, ...rest } = defaults;
  const [firstName = 'Property', ...lastParts] = (contactName ?? 'Property Management').split(' ');

  return billing.createClient({
    ...rest,
    companyName,
    firstName,
    lastName: lastParts.join(' '),
  });
}
