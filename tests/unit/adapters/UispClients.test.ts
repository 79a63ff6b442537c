/**
 * UISP CRM and NMS adapter Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { UispCrmClient, formatDate } from '../../../src/packages/adapters/uisp/UispCrmClient.js';
import { UispNmsClient, normalizeHardwareId } from '../../../src/packages/adapters/uisp/UispNmsClient.js';
import { silentLogger } from '../../helpers/fakes.js';
import { createFakeFetch, json, type FetchHandler } from '../../helpers/http.js';

const NOW = new Date('2026-03-10T12:00:00Z');

describe('UispCrmClient', () => {
  let client: UispCrmClient | null = null;

  function createClient(handler: FetchHandler) {
    const fake = createFakeFetch(handler);
    client = new UispCrmClient({
      host: 'uisp.test',
      protocol: 'https',
      apiKey: 'test-secret',
      fetchImpl: fake.fetchImpl,
      logger: silentLogger,
      now: () => NOW,
    });
    return { client, calls: fake.calls };
  }

  afterEach(() => {
    client?.shutdown();
    client = null;
  });

  it('maps service status codes', async () => {
    const { client, calls } = createClient(() =>
      json([
        { id: 1, clientId: 9, status: 1, servicePlanId: 20 },
        { id: 2, clientId: 9, status: 3 },
        { id: 3, clientId: 9, status: 2 },
      ])
    );

    const services = await client.getServices('9');

    expect(calls[0]?.url).toBe('https://uisp.test/crm/api/v1.0/services?clientId=9');
    expect(calls[0]?.headers['x-auth-app-key']).toBe('test-secret');
    expect(services).toEqual([
      { id: '1', clientId: '9', status: 'active', servicePlanId: '20' },
      { id: '2', clientId: '9', status: 'suspended', servicePlanId: null },
      { id: '3', clientId: '9', status: 'other', servicePlanId: null },
    ]);
  });

  it('creates an active service with integer ids', async () => {
    const { client, calls } = createClient(() => json({ id: 77 }));

    await expect(client.createService('9', '20', '2026-03-10')).resolves.toBe('77');
    expect(calls[0]?.body).toEqual({ clientId: 9, servicePlanId: 20, activeFrom: '2026-03-10', status: 1 });
  });

  it('creates a client with only the fields given', async () => {
    const { client, calls } = createClient(() => json({ id: 5 }));

    await client.createClient({ firstName: 'Ana', lastName: 'Diaz', email: 'ana@example.com' });

    expect(calls[0]?.body).toEqual({ firstName: 'Ana', lastName: 'Diaz', isLead: false, email: 'ana@example.com' });
  });

  it('attaches the device to a ticket', async () => {
    const { client, calls } = createClient(() => json({ id: 301 }));

    await expect(client.createTicket('9', '[Unit 4] Wifi down', 'body', 'dev-4')).resolves.toBe('301');
    expect(calls[0]?.body).toEqual({ clientId: 9, subject: '[Unit 4] Wifi down', message: 'body', deviceId: 'dev-4' });
  });

  it('dates invoices from the clock', async () => {
    const { client, calls } = createClient(() => json({ id: 12 }));

    await client.createInvoice('9', [{ description: 'Internet Service', quantity: 3, price: 45 }], 14);

    expect(calls[0]?.body).toEqual({
      clientId: 9,
      createdDate: '2026-03-10',
      dueDate: '2026-03-24',
      items: [{ description: 'Internet Service', quantity: 3, price: 45 }],
    });
  });

  it('lists clients', async () => {
    const { client } = createClient(() => json([{ id: 4, companyName: 'Harper Apartments' }]));

    await expect(client.listClients()).resolves.toEqual([
      { id: '4', companyName: 'Harper Apartments', firstName: null, lastName: null },
    ]);
  });
});

describe('UispNmsClient', () => {
  let client: UispNmsClient | null = null;

  function createClient(handler: FetchHandler) {
    const fake = createFakeFetch(handler);
    client = new UispNmsClient({
      host: 'uisp.test',
      protocol: 'https',
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

  it('finds a device by serial or MAC', async () => {
    const { client, calls } = createClient(() =>
      json([
        { identification: { id: 'a', serialNumber: 'UBNT001', mac: 'AA:BB:CC:00:00:01' }, overview: { status: 'active' } },
        { identification: { id: 'b', serialNumber: 'UBNT002', mac: 'AA:BB:CC:00:00:02', authorized: true } },
      ])
    );

    expect((await client.findDeviceBySerial('ubnt001'))?.id).toBe('a');
    expect(await client.findDeviceBySerial('aabbcc000002')).toMatchObject({ id: 'b', authorized: true, status: null });
    expect(await client.findDeviceBySerial('missing')).toBeNull();
    expect(calls[0]?.url).toBe('https://uisp.test/nms/api/v2.1/devices');
    expect(calls[0]?.headers['x-auth-token']).toBe('test-secret');
  });

  it('patches the device for each operation', async () => {
    const { client, calls } = createClient(() => new Response(null, { status: 200 }));

    await client.authorizeDevice('dev-1', '350-s-harper-1', 'site-1');
    await client.activateDevice('dev-1');
    await client.suspendDevice('dev-1', 'Lease ended');
    await client.setDeviceBandwidth('dev-1', 1000, 500);

    expect(calls.every((c) => c.method === 'PATCH' && c.url === 'https://uisp.test/nms/api/v2.1/devices/dev-1')).toBe(
      true
    );
    expect(calls.map((c) => c.body)).toEqual([
      { identification: { name: '350-s-harper-1', authorized: true, siteId: 'site-1' } },
      { enabled: true, attributes: { suspended: false, suspendedReason: null } },
      { enabled: false, attributes: { suspended: true, suspendedReason: 'Lease ended' } },
      { qos: { enabled: true, downloadSpeed: 1_000_000_000, uploadSpeed: 500_000_000 } },
    ]);
  });
});

describe('hardware id helpers', () => {
  it('normalizes serials and MACs', () => {
    expect(normalizeHardwareId(' AA:BB:CC:DD ')).toBe('aabbccdd');
  });

  it('formats dates as YYYY-MM-DD', () => {
    expect(formatDate(NOW)).toBe('2026-03-10');
  });
});
