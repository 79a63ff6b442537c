/**
 * SQLite schema for the sync state store
 *
 * leases          - one row per lease id, updated in place, never deleted
 * synced_tickets  - dedup guard for forwarded maintenance tickets
 * sync_log        - append-only event log
 * billing_history - append-only monthly billing snapshots
 */

export const SCHEMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA foreign_keys = ON;

CREATE TABLE IF NOT EXISTS leases (
  lease_id TEXT PRIMARY KEY,
  tenant_id TEXT,
  unit_id TEXT NOT NULL,
  property_address TEXT NOT NULL,
  endpoint_name TEXT NOT NULL,
  package_name TEXT NOT NULL,
  billing_client_id TEXT,
  billing_service_id TEXT,
  recurring_charge_id TEXT,
  lifecycle_status TEXT NOT NULL DEFAULT 'active'
    CHECK (lifecycle_status IN ('active', 'ended')),
  service_status TEXT NOT NULL DEFAULT 'active'
    CHECK (service_status IN ('active', 'suspended')),
  rent_status TEXT NOT NULL DEFAULT 'current'
    CHECK (rent_status IN ('current', 'delinquent')),
  billing_suspended INTEGER NOT NULL DEFAULT 0,
  last_balance REAL,
  created_at TEXT NOT NULL,
  last_synced_at TEXT NOT NULL,
  ended_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_leases_endpoint_lifecycle
  ON leases (endpoint_name, lifecycle_status);

CREATE TABLE IF NOT EXISTS synced_tickets (
  inbound_ticket_id TEXT PRIMARY KEY,
  outbound_ticket_id TEXT NOT NULL,
  classification TEXT NOT NULL
    CHECK (classification IN ('support', 'upgrade')),
  forwarded_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sync_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  event_type TEXT NOT NULL,
  details TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_log_created
  ON sync_log (created_at);

CREATE TABLE IF NOT EXISTS billing_history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  month INTEGER NOT NULL,
  year INTEGER NOT NULL,
  occupied_units INTEGER NOT NULL,
  upgrade_total REAL NOT NULL DEFAULT 0,
  total_amount REAL NOT NULL,
  snapshot TEXT NOT NULL,
  generated_at TEXT NOT NULL
);
`;

/**
 * Columns added after the first release. Applied when missing; the backfill
 * runs once, right after the column is added.
 */
export const COLUMN_MIGRATIONS: Array<{ table: string; column: string; sql: string[] }> = [
  {
    table: 'leases',
    column: 'billing_suspended',
    sql: [
      'ALTER TABLE leases ADD COLUMN billing_suspended INTEGER NOT NULL DEFAULT 0',
      // Before the flag existed only the drift phase suspended a lease with current rent
      `UPDATE leases SET billing_suspended = 1
       WHERE lifecycle_status = 'active' AND service_status = 'suspended' AND rent_status = 'current'`,
    ],
  },
];
