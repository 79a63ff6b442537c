/**
 * SQLite Sync State Store
 *
 * better-sqlite3 implementation of ISyncStateStore. Statements are
 * synchronous; each mutation is a single statement so no explicit
 * transactions are needed outside of column migrations.
 *
 * @module db/SqliteSyncStore
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger.js';
import { DatabaseError } from '../utils/errors.js';
import { COLUMN_MIGRATIONS, SCHEMA_SQL } from './schema.js';
import type { ISyncStateStore, NewLeaseRecord } from '../packages/core/ports/index.js';
import type {
  LeaseRecord,
  LeaseRecordPatch,
  LeaseLifecycleStatus,
  ServiceStatus,
  RentStatus,
  TicketForwardRecord,
  TicketClassification,
  SyncEvent,
  SyncEventType,
  BillingSnapshot,
  BillingHistoryEntry,
} from '../types/index.js';
import { isSyncEventType } from '../types/index.js';

// =============================================================================
// Row Type Definitions
// =============================================================================

interface LeaseRow {
  lease_id: string;
  tenant_id: string | null;
  unit_id: string;
  property_address: string;
  endpoint_name: string;
  package_name: string;
  billing_client_id: string | null;
  billing_service_id: string | null;
  recurring_charge_id: string | null;
  lifecycle_status: string;
  service_status: string;
  rent_status: string;
  billing_suspended: number;
  last_balance: number | null;
  created_at: string;
  last_synced_at: string;
  ended_at: string | null;
}

interface TicketRow {
  inbound_ticket_id: string;
  outbound_ticket_id: string;
  classification: string;
  forwarded_at: string;
}

interface EventRow {
  id: number;
  event_type: string;
  details: string;
  created_at: string;
}

interface BillingHistoryRow {
  id: number;
  month: number;
  year: number;
  occupied_units: number;
  upgrade_total: number;
  total_amount: number;
  generated_at: string;
}

// =============================================================================
// Row to Object Converters
// =============================================================================

function toLifecycle(value: string): LeaseLifecycleStatus {
  return value === 'ended' ? 'ended' : 'active';
}

function toServiceStatus(value: string): ServiceStatus {
  return value === 'suspended' ? 'suspended' : 'active';
}

function toRentStatus(value: string): RentStatus {
  return value === 'delinquent' ? 'delinquent' : 'current';
}

function rowToLease(row: LeaseRow): LeaseRecord {
  return {
    leaseId: row.lease_id,
    tenantId: row.tenant_id,
    unitId: row.unit_id,
    propertyAddress: row.property_address,
    endpointName: row.endpoint_name,
    packageName: row.package_name,
    billingClientId: row.billing_client_id,
    billingServiceId: row.billing_service_id,
    recurringChargeId: row.recurring_charge_id,
    lifecycleStatus: toLifecycle(row.lifecycle_status),
    serviceStatus: toServiceStatus(row.service_status),
    rentStatus: toRentStatus(row.rent_status),
    billingSuspended: row.billing_suspended === 1,
    lastBalance: row.last_balance,
    createdAt: new Date(row.created_at),
    lastSyncedAt: new Date(row.last_synced_at),
    endedAt: row.ended_at ? new Date(row.ended_at) : null,
  };
}

function rowToTicket(row: TicketRow): TicketForwardRecord {
  return {
    inboundTicketId: row.inbound_ticket_id,
    outboundTicketId: row.outbound_ticket_id,
    classification: row.classification === 'upgrade' ? 'upgrade' : 'support',
    forwardedAt: new Date(row.forwarded_at),
  };
}

function parseDetails(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? { ...parsed }
      : { value: parsed };
  } catch {
    return { raw };
  }
}

function rowToEvent(row: EventRow): SyncEvent | null {
  if (!isSyncEventType(row.event_type)) return null;
  return {
    id: row.id,
    eventType: row.event_type,
    details: parseDetails(row.details),
    createdAt: new Date(row.created_at),
  };
}

function rowToBillingHistory(row: BillingHistoryRow): BillingHistoryEntry {
  return {
    id: row.id,
    month: row.month,
    year: row.year,
    occupiedUnits: row.occupied_units,
    upgradeTotal: row.upgrade_total,
    totalAmount: row.total_amount,
    generatedAt: new Date(row.generated_at),
  };
}

/** Columns a LeaseRecordPatch may touch, mapped to SQL column names */
const PATCH_COLUMNS: Record<keyof LeaseRecordPatch, string> = {
  tenantId: 'tenant_id',
  packageName: 'package_name',
  billingClientId: 'billing_client_id',
  billingServiceId: 'billing_service_id',
  recurringChargeId: 'recurring_charge_id',
  serviceStatus: 'service_status',
  rentStatus: 'rent_status',
  billingSuspended: 'billing_suspended',
  lastBalance: 'last_balance',
};

function isPatchKey(key: string): key is keyof LeaseRecordPatch {
  return key in PATCH_COLUMNS;
}

// =============================================================================
// Store
// =============================================================================

export class SqliteSyncStore implements ISyncStateStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  /**
   * @param path - database file, or ':memory:'
   * @param clock - stamps event log entries and ticket forwards
   */
  constructor(path: string, logger?: Logger, clock: () => Date = () => new Date()) {
    this.logger = logger ?? createChildLogger({ component: 'SqliteSyncStore' });
    this.clock = clock;

    if (path !== ':memory:') {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        this.logger.info({ path: dir }, 'Created database directory');
      }
    }

    try {
      this.db = new Database(path);
      this.db.exec(SCHEMA_SQL);
      this.migrate();
    } catch (error) {
      throw new DatabaseError(
        `Failed to open state database at ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    this.logger.debug({ path }, 'State database ready');
  }

  private migrate(): void {
    for (const migration of COLUMN_MIGRATIONS) {
      const columns = this.db
        .prepare('SELECT name FROM pragma_table_info(?)')
        .all(migration.table) as Array<{ name: string }>;
      if (columns.some((c) => c.name === migration.column)) continue;

      this.db.transaction(() => {
        for (const statement of migration.sql) this.db.exec(statement);
      })();
      this.logger.info({ table: migration.table, column: migration.column }, 'Added column');
    }
  }

  // ---------------------------------------------------------------------------
  // Lease records
  // ---------------------------------------------------------------------------

  getLease(leaseId: string): LeaseRecord | null {
    const row = this.db
      .prepare('SELECT * FROM leases WHERE lease_id = ?')
      .get(leaseId) as LeaseRow | undefined;
    return row ? rowToLease(row) : null;
  }

  listLeases(lifecycle?: LeaseLifecycleStatus): LeaseRecord[] {
    const rows = lifecycle
      ? (this.db
          .prepare('SELECT * FROM leases WHERE lifecycle_status = ? ORDER BY created_at, lease_id')
          .all(lifecycle) as LeaseRow[])
      : (this.db.prepare('SELECT * FROM leases ORDER BY created_at, lease_id').all() as LeaseRow[]);
    return rows.map(rowToLease);
  }

  findActiveLeaseByEndpoint(endpointName: string): LeaseRecord | null {
    const row = this.db
      .prepare(
        `SELECT * FROM leases
         WHERE endpoint_name = ? AND lifecycle_status = 'active'
         ORDER BY created_at DESC
         LIMIT 1`
      )
      .get(endpointName) as LeaseRow | undefined;
    return row ? rowToLease(row) : null;
  }

  upsertLease(record: NewLeaseRecord, now: Date): LeaseRecord {
    const timestamp = now.toISOString();

    // Ended records are left untouched by the WHERE on the update branch
    this.db
      .prepare(
        `INSERT INTO leases (
           lease_id, tenant_id, unit_id, property_address, endpoint_name, package_name,
           lifecycle_status, service_status, rent_status, created_at, last_synced_at
         ) VALUES (?, ?, ?, ?, ?, ?, 'active', 'active', 'current', ?, ?)
         ON CONFLICT(lease_id) DO UPDATE SET
           tenant_id = COALESCE(excluded.tenant_id, leases.tenant_id),
           property_address = excluded.property_address,
           endpoint_name = excluded.endpoint_name,
           last_synced_at = excluded.last_synced_at
         WHERE leases.lifecycle_status = 'active'`
      )
      .run(
        record.leaseId,
        record.tenantId,
        record.unitId,
        record.propertyAddress,
        record.endpointName,
        record.packageName,
        timestamp,
        timestamp
      );

    const stored = this.getLease(record.leaseId);
    if (!stored) {
      throw new DatabaseError(`Lease record missing after upsert: ${record.leaseId}`);
    }
    return stored;
  }

  updateLease(leaseId: string, patch: LeaseRecordPatch, now: Date): LeaseRecord {
    const assignments: string[] = ['last_synced_at = ?'];
    const values: Array<string | number | null> = [now.toISOString()];

    for (const [key, value] of Object.entries(patch)) {
      if (!isPatchKey(key) || value === undefined) continue;
      assignments.push(`${PATCH_COLUMNS[key]} = ?`);
      values.push(typeof value === 'boolean' ? Number(value) : value);
    }

    const result = this.db
      .prepare(`UPDATE leases SET ${assignments.join(', ')} WHERE lease_id = ?`)
      .run(...values, leaseId);

    if (result.changes === 0) {
      throw new DatabaseError(`Lease record not found: ${leaseId}`);
    }

    const stored = this.getLease(leaseId);
    if (!stored) {
      throw new DatabaseError(`Lease record not found: ${leaseId}`);
    }
    return stored;
  }

  markLeaseEnded(leaseId: string, now: Date): boolean {
    const timestamp = now.toISOString();
    const result = this.db
      .prepare(
        `UPDATE leases
         SET lifecycle_status = 'ended', service_status = 'suspended',
             ended_at = ?, last_synced_at = ?
         WHERE lease_id = ? AND lifecycle_status = 'active'`
      )
      .run(timestamp, timestamp, leaseId);
    return result.changes > 0;
  }

  // ---------------------------------------------------------------------------
  // Ticket forwards
  // ---------------------------------------------------------------------------

  isTicketForwarded(inboundTicketId: string): boolean {
    const row = this.db
      .prepare('SELECT 1 AS found FROM synced_tickets WHERE inbound_ticket_id = ?')
      .get(inboundTicketId);
    return row !== undefined;
  }

  getTicketForward(inboundTicketId: string): TicketForwardRecord | null {
    const row = this.db
      .prepare('SELECT * FROM synced_tickets WHERE inbound_ticket_id = ?')
      .get(inboundTicketId) as TicketRow | undefined;
    return row ? rowToTicket(row) : null;
  }

  recordTicketForward(
    inboundTicketId: string,
    outboundTicketId: string,
    classification: TicketClassification
  ): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO synced_tickets
           (inbound_ticket_id, outbound_ticket_id, classification, forwarded_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(inboundTicketId, outboundTicketId, classification, this.clock().toISOString());
    return result.changes > 0;
  }

  // ---------------------------------------------------------------------------
  // Event log
  // ---------------------------------------------------------------------------

  logEvent(eventType: SyncEventType, details: Record<string, unknown>): void {
    this.db
      .prepare('INSERT INTO sync_log (event_type, details, created_at) VALUES (?, ?, ?)')
      .run(eventType, JSON.stringify(details), this.clock().toISOString());
  }

  getRecentEvents(limit = 50): SyncEvent[] {
    const rows = this.db
      .prepare('SELECT * FROM sync_log ORDER BY id DESC LIMIT ?')
      .all(limit) as EventRow[];
    return rows.map(rowToEvent).filter((event): event is SyncEvent => event !== null);
  }

  // ---------------------------------------------------------------------------
  // Billing history
  // ---------------------------------------------------------------------------

  saveBillingSnapshot(snapshot: BillingSnapshot): number {
    const result = this.db
      .prepare(
        `INSERT INTO billing_history
           (month, year, occupied_units, upgrade_total, total_amount, snapshot, generated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        snapshot.month,
        snapshot.year,
        snapshot.occupiedUnits,
        snapshot.bill.upgradeTotal,
        snapshot.bill.grandTotal,
        JSON.stringify(snapshot),
        snapshot.generatedAt.toISOString()
      );
    return Number(result.lastInsertRowid);
  }

  getBillingHistory(limit = 12): BillingHistoryEntry[] {
    const rows = this.db
      .prepare('SELECT * FROM billing_history ORDER BY year DESC, month DESC, id DESC LIMIT ?')
      .all(limit) as BillingHistoryRow[];
    return rows.map(rowToBillingHistory);
  }

  close(): void {
    this.db.close();
    this.logger.debug('State database closed');
  }
}
