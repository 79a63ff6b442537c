/**
 * SqliteSyncStore Tests
 *
 * Runs against an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SqliteSyncStore } from '../../../src/db/SqliteSyncStore.js';
import { DatabaseError } from '../../../src/utils/errors.js';
import type { NewLeaseRecord } from '../../../src/packages/core/ports/index.js';
import type { BillingSnapshot } from '../../../src/types/index.js';
import { silentLogger } from '../../helpers/fakes.js';

const MARCH_1 = new Date('2026-03-01T10:00:00Z');
const MARCH_2 = new Date('2026-03-02T10:00:00Z');

function newLease(leaseId: string, unitId: string, overrides: Partial<NewLeaseRecord> = {}): NewLeaseRecord {
  return {
    leaseId,
    tenantId: `t-${leaseId}`,
    unitId,
    propertyAddress: '350 S Harper',
    endpointName: `350-s-harper-${unitId}`,
    packageName: 'Fiber 500',
    ...overrides,
  };
}

function snapshot(month: number, year: number, occupiedUnits: number): BillingSnapshot {
  return {
    month,
    year,
    occupiedUnits,
    totalUnits: 10,
    vacantUnits: 10 - occupiedUnits,
    baseRate: 45,
    upgradeCounts: { 'Fiber 1G': 1 },
    bill: { baseTotal: occupiedUnits * 45, upgradeTotal: 10, grandTotal: occupiedUnits * 45 + 10 },
    units: [],
    generatedAt: new Date(Date.UTC(year, month - 1, 28)),
  };
}

describe('SqliteSyncStore', () => {
  let store: SqliteSyncStore;

  beforeEach(() => {
    store = new SqliteSyncStore(':memory:', silentLogger);
  });

  afterEach(() => {
    store.close();
  });

  describe('lease records', () => {
    it('inserts a new lease as active, in service and current', () => {
      const record = store.upsertLease(newLease('L1', '1'), MARCH_1);

      expect(record).toMatchObject({
        leaseId: 'L1',
        tenantId: 't-L1',
        unitId: '1',
        endpointName: '350-s-harper-1',
        packageName: 'Fiber 500',
        lifecycleStatus: 'active',
        serviceStatus: 'active',
        rentStatus: 'current',
        billingSuspended: false,
        billingClientId: null,
        recurringChargeId: null,
        lastBalance: null,
        endedAt: null,
      });
      expect(record.createdAt.toISOString()).toBe(MARCH_1.toISOString());
    });

    it('refreshes an active record without touching its status or package', () => {
      store.upsertLease(newLease('L1', '1'), MARCH_1);
      store.updateLease('L1', { packageName: 'Fiber 1G', rentStatus: 'delinquent' }, MARCH_1);

      const refreshed = store.upsertLease(newLease('L1', '1', { tenantId: null }), MARCH_2);

      expect(refreshed.packageName).toBe('Fiber 1G');
      expect(refreshed.rentStatus).toBe('delinquent');
      expect(refreshed.tenantId).toBe('t-L1');
      expect(refreshed.lastSyncedAt.toISOString()).toBe(MARCH_2.toISOString());
    });

    it('never resurrects an ended record', () => {
      store.upsertLease(newLease('L1', '1'), MARCH_1);
      store.markLeaseEnded('L1', MARCH_1);

      const after = store.upsertLease(newLease('L1', '1'), MARCH_2);

      expect(after.lifecycleStatus).toBe('ended');
      expect(after.lastSyncedAt.toISOString()).toBe(MARCH_1.toISOString());
    });

    it('ends a lease exactly once', () => {
      store.upsertLease(newLease('L1', '1'), MARCH_1);

      expect(store.markLeaseEnded('L1', MARCH_2)).toBe(true);
      expect(store.markLeaseEnded('L1', MARCH_2)).toBe(false);

      const ended = store.getLease('L1');
      expect(ended?.lifecycleStatus).toBe('ended');
      expect(ended?.serviceStatus).toBe('suspended');
      expect(ended?.endedAt?.toISOString()).toBe(MARCH_2.toISOString());
    });

    it('applies partial patches', () => {
      store.upsertLease(newLease('L1', '1'), MARCH_1);

      const updated = store.updateLease(
        'L1',
        { billingClientId: 'c-9', lastBalance: 120.5, serviceStatus: 'suspended' },
        MARCH_2
      );

      expect(updated.billingClientId).toBe('c-9');
      expect(updated.lastBalance).toBe(120.5);
      expect(updated.serviceStatus).toBe('suspended');
      expect(updated.billingServiceId).toBeNull();
    });

    it('clears a field patched to null', () => {
      store.upsertLease(newLease('L1', '1'), MARCH_1);
      store.updateLease('L1', { recurringChargeId: 'ch-1' }, MARCH_1);

      expect(store.updateLease('L1', { recurringChargeId: null }, MARCH_2).recurringChargeId).toBeNull();
    });

    it('throws when patching an unknown lease', () => {
      expect(() => store.updateLease('missing', { lastBalance: 0 }, MARCH_1)).toThrow(DatabaseError);
    });

    it('filters by lifecycle', () => {
      store.upsertLease(newLease('L1', '1'), MARCH_1);
      store.upsertLease(newLease('L2', '2'), MARCH_2);
      store.markLeaseEnded('L1', MARCH_2);

      expect(store.listLeases('active').map((l) => l.leaseId)).toEqual(['L2']);
      expect(store.listLeases('ended').map((l) => l.leaseId)).toEqual(['L1']);
      expect(store.listLeases().map((l) => l.leaseId)).toEqual(['L1', 'L2']);
    });

    it('finds the active lease bound to an endpoint', () => {
      store.upsertLease(newLease('L1', '1'), MARCH_1);
      store.markLeaseEnded('L1', MARCH_2);
      store.upsertLease(newLease('L2', '1'), MARCH_2);

      expect(store.findActiveLeaseByEndpoint('350-s-harper-1')?.leaseId).toBe('L2');
      expect(store.findActiveLeaseByEndpoint('350-s-harper-2')).toBeNull();
    });
  });

  describe('billing hold', () => {
    it('stores the flag as a boolean', () => {
      store.upsertLease(newLease('L1', '1'), MARCH_1);

      expect(store.updateLease('L1', { billingSuspended: true }, MARCH_2).billingSuspended).toBe(true);
      expect(store.getLease('L1')?.billingSuspended).toBe(true);
      expect(store.updateLease('L1', { billingSuspended: false }, MARCH_2).billingSuspended).toBe(false);
    });
  });

  describe('ticket forwards', () => {
    it('records a forward once', () => {
      expect(store.isTicketForwarded('T1')).toBe(false);
      expect(store.recordTicketForward('T1', 'crm-1', 'support')).toBe(true);
      expect(store.recordTicketForward('T1', 'crm-2', 'support')).toBe(false);

      expect(store.isTicketForwarded('T1')).toBe(true);
      expect(store.getTicketForward('T1')).toMatchObject({
        inboundTicketId: 'T1',
        outboundTicketId: 'crm-1',
        classification: 'support',
      });
    });

    it('keeps the classification', () => {
      store.recordTicketForward('T2', 'ch-1', 'upgrade');
      expect(store.getTicketForward('T2')?.classification).toBe('upgrade');
    });
  });

  describe('clock', () => {
    it('stamps forwards and events with the injected clock', () => {
      const clocked = new SqliteSyncStore(':memory:', silentLogger, () => MARCH_2);

      clocked.recordTicketForward('T1', 'crm-1', 'support');
      clocked.logEvent('cycle_started', {});

      expect(clocked.getTicketForward('T1')?.forwardedAt.toISOString()).toBe('2026-03-02T10:00:00.000Z');
      expect(clocked.getRecentEvents(1)[0]?.createdAt.toISOString()).toBe('2026-03-02T10:00:00.000Z');
      clocked.close();
    });
  });

  describe('event log', () => {
    it('returns the newest events first with parsed details', () => {
      store.logEvent('unit_activated', { unit: '1' });
      store.logEvent('lease_ended', { unit: '2' });

      const events = store.getRecentEvents(10);

      expect(events.map((e) => e.eventType)).toEqual(['lease_ended', 'unit_activated']);
      expect(events[0]?.details).toEqual({ unit: '2' });
    });

    it('honours the limit', () => {
      store.logEvent('cycle_started', {});
      store.logEvent('cycle_completed', {});
      store.logEvent('cycle_started', {});

      expect(store.getRecentEvents(2)).toHaveLength(2);
    });
  });

  describe('billing history', () => {
    it('returns snapshots newest month first', () => {
      store.saveBillingSnapshot(snapshot(1, 2026, 8));
      store.saveBillingSnapshot(snapshot(2, 2026, 9));
      store.saveBillingSnapshot(snapshot(12, 2025, 7));

      const history = store.getBillingHistory();

      expect(history.map((h) => `${h.year}-${h.month}`)).toEqual(['2026-2', '2026-1', '2025-12']);
      expect(history[0]).toMatchObject({ occupiedUnits: 9, upgradeTotal: 10, totalAmount: 415 });
    });

    it('returns the new row id', () => {
      const first = store.saveBillingSnapshot(snapshot(1, 2026, 8));
      const second = store.saveBillingSnapshot(snapshot(2, 2026, 8));
      expect(second).toBe(first + 1);
    });
  });

  describe('migrations', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'lease-sync-db-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('adds the billing hold column and backfills drift suspensions', () => {
      const path = join(dir, 'sync.db');
      const legacy = new Database(path);
      legacy.exec(`
        CREATE TABLE leases (
          lease_id TEXT PRIMARY KEY,
          tenant_id TEXT,
          unit_id TEXT NOT NULL,
          property_address TEXT NOT NULL,
          endpoint_name TEXT NOT NULL,
          package_name TEXT NOT NULL,
          billing_client_id TEXT,
          billing_service_id TEXT,
          recurring_charge_id TEXT,
          lifecycle_status TEXT NOT NULL DEFAULT 'active',
          service_status TEXT NOT NULL DEFAULT 'active',
          rent_status TEXT NOT NULL DEFAULT 'current',
          last_balance REAL,
          created_at TEXT NOT NULL,
          last_synced_at TEXT NOT NULL,
          ended_at TEXT
        );
        INSERT INTO leases (lease_id, unit_id, property_address, endpoint_name, package_name,
                            service_status, rent_status, created_at, last_synced_at)
        VALUES
          ('L1', '1', '350 S Harper', '350-s-harper-1', 'Fiber 500', 'suspended', 'current', '2026-03-01', '2026-03-01'),
          ('L2', '2', '350 S Harper', '350-s-harper-2', 'Fiber 500', 'suspended', 'delinquent', '2026-03-01', '2026-03-01'),
          ('L3', '3', '350 S Harper', '350-s-harper-3', 'Fiber 500', 'active', 'current', '2026-03-01', '2026-03-01');
      `);
      legacy.close();

      const migrated = new SqliteSyncStore(path, silentLogger);

      expect(migrated.getLease('L1')?.billingSuspended).toBe(true);
      expect(migrated.getLease('L2')?.billingSuspended).toBe(false);
      expect(migrated.getLease('L3')?.billingSuspended).toBe(false);
      migrated.close();

      const reopened = new SqliteSyncStore(path, silentLogger);
      expect(reopened.getLease('L1')?.billingSuspended).toBe(true);
      reopened.close();
    });
  });
});
