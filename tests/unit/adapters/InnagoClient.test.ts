/**
 * InnagoClient Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { InnagoClient } from '../../../src/packages/adapters/innago/InnagoClient.js';
import { RemoteCallError } from '../../../src/utils/errors.js';
import { silentLogger } from '../../helpers/fakes.js';
import { createFakeFetch, json, type FetchHandler } from '../../helpers/http.js';

describe('InnagoClient', () => {
  let client: InnagoClient | null = null;

  function createClient(handler: FetchHandler) {
    const fake = createFakeFetch(handler);
    client = new InnagoClient({
      apiUrl: 'https://pm.test',
      apiKey: 'test-secret',
      fetchImpl: fake.fetchImpl,
      logger: silentLogger,
    });
    return { client, calls: fake.calls };
  }

  afterEach(() => {
    client?.shutdown();
    client = null;
  });

  describe('getActiveLeases', () => {
    it('maps nested unit and property data into lease records', async () => {
      const { client, calls } = createClient(() =>
        json([
          {
            id: 101,
            unit: { number: 12, property: { address: '350 S Harper' } },
            tenants: [{ id: 7 }],
            startDate: '2026-03-01',
          },
          {
            id: '102',
            unitNumber: '',
            unit: { name: 'Apt 3B' },
            property: { name: 'Harper Court' },
            tenantIds: ['8'],
          },
        ])
      );

      const leases = await client.getActiveLeases('prop-1');

      expect(calls[0]?.url).toBe('https://pm.test/v1/leases?propertyId=prop-1&status=active');
      expect(calls[0]?.headers['x-api-key']).toBe('test-secret');
      expect(leases).toEqual([
        {
          id: '101',
          unitNumber: '12',
          unitName: null,
          propertyAddress: '350 S Harper',
          tenantIds: ['7'],
          startDate: '2026-03-01',
        },
        {
          id: '102',
          unitNumber: null,
          unitName: 'Apt 3B',
          propertyAddress: 'Harper Court',
          tenantIds: ['8'],
          startDate: null,
        },
      ]);
    });

    it('rejects a payload that is not a lease list', async () => {
      const { client } = createClient(() => json({ error: 'unexpected' }));

      await expect(client.getActiveLeases('prop-1')).rejects.toBeInstanceOf(RemoteCallError);
    });
  });

  describe('getLeaseBalance', () => {
    it('uses the balance reported on the lease', async () => {
      const { client, calls } = createClient(() => json({ id: 101, balance: '125.50' }));

      await expect(client.getLeaseBalance('101')).resolves.toBe(125.5);
      expect(calls).toHaveLength(1);
      expect(calls[0]?.url).toBe('https://pm.test/v1/leases/101');
    });

    it('sums unpaid invoices when the lease has no balance', async () => {
      const { client, calls } = createClient((request) =>
        request.url.includes('/v1/invoices')
          ? json([
              { id: 1, status: 'unpaid', amount: 100 },
              { id: 2, status: 'partially_paid', amount: 50, amountPaid: 20 },
              { id: 3, status: 'paid', amount: 75, amountPaid: 75 },
            ])
          : json({ id: 101 })
      );

      await expect(client.getLeaseBalance('101')).resolves.toBe(130);
      expect(calls[1]?.url).toBe('https://pm.test/v1/invoices?leaseId=101');
    });

    it('propagates a failed balance lookup', async () => {
      const { client } = createClient(() => new Response('', { status: 502, statusText: 'Bad Gateway' }));

      await expect(client.getLeaseBalance('101')).rejects.toThrow('innago: GET /v1/leases/101 failed: 502 Bad Gateway');
    });
  });

  it('maps tenants with an empty email to null', async () => {
    const { client } = createClient(() => json([{ id: 7, firstName: 'Ana', lastName: 'Diaz', email: '' }]));

    await expect(client.getTenantsByLease('101')).resolves.toEqual([
      { id: '7', firstName: 'Ana', lastName: 'Diaz', email: null },
    ]);
  });

  it('maps maintenance tickets', async () => {
    const { client, calls } = createClient(() =>
      json([{ id: 900, subject: 'Wifi down', unit: { number: '4' } }, { id: 901 }])
    );

    const tickets = await client.getMaintenanceTickets('prop-1', 'open');

    expect(calls[0]?.url).toBe('https://pm.test/v1/maintenance?propertyId=prop-1&status=open');
    expect(tickets).toEqual([
      { id: '900', subject: 'Wifi down', description: '', status: 'open', unitNumber: '4', unitName: null },
      { id: '901', subject: '', description: '', status: 'open', unitNumber: null, unitName: null },
    ]);
  });

  it('creates a recurring charge and returns its id', async () => {
    const { client, calls } = createClient(() => json({ id: 55 }, 201));

    await expect(client.createRecurringCharge('101', 'Internet upgrade - Fiber 1G', 10)).resolves.toBe('55');
    expect(calls[0]).toMatchObject({
      method: 'POST',
      url: 'https://pm.test/v1/recurring-charges',
      body: { leaseId: '101', description: 'Internet upgrade - Fiber 1G', amount: 10, category: 'Utilities' },
    });
  });

  it('updates and deletes recurring charges', async () => {
    const { client, calls } = createClient(() => new Response(null, { status: 204 }));

    await client.updateRecurringCharge('55', 20, 'Internet upgrade - Fiber 2G');
    await client.deleteRecurringCharge('55');

    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      'PATCH https://pm.test/v1/recurring-charges/55',
      'DELETE https://pm.test/v1/recurring-charges/55',
    ]);
    expect(calls[0]?.body).toEqual({ amount: 20, description: 'Internet upgrade - Fiber 2G' });
  });

  it('creates a tenant invoice', async () => {
    const { client, calls } = createClient(() => json({ id: 'inv-3' }));

    await expect(
      client.createInvoice('7', [{ description: 'Internet service credit - suspended 2026-03-20', amount: -15.97 }])
    ).resolves.toBe('inv-3');
    expect(calls[0]?.body).toEqual({
      tenantId: '7',
      lineItems: [{ description: 'Internet service credit - suspended 2026-03-20', amount: -15.97 }],
    });
  });
});
