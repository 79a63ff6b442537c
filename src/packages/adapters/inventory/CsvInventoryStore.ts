/**
 * CSV Inventory Store
 *
 * Device registry backed by onu-inventory.csv. Rows are pre-populated from
 * inventory (property + unit known before anyone moves in); the serial is
 * filled in at installation; status and device id are written back here as
 * endpoints are provisioned, activated and suspended.
 *
 * Columns: onu_name, serial_number, mac_address, property, unit,
 *          date_added, status, uisp_id
 *
 * @module packages/adapters/inventory/CsvInventoryStore
 */

import { existsSync, readFileSync, writeFileSync, renameSync } from 'fs';
import Papa from 'papaparse';
import type { Logger } from 'pino';
import { createChildLogger } from '../../../utils/logger.js';
import { ValidationError } from '../../../utils/errors.js';
import { deriveEndpointName, normalizeProperty } from '../../../services/endpoint/naming.js';
import type { IDeviceRegistry, EndpointUpdate } from '../../core/ports/index.js';
import type { EndpointRecord, EndpointStatus } from '../../../types/index.js';

export const INVENTORY_FIELDS = [
  'onu_name',
  'serial_number',
  'mac_address',
  'property',
  'unit',
  'date_added',
  'status',
  'uisp_id',
] as const;

type InventoryField = (typeof INVENTORY_FIELDS)[number];

type InventoryRow = Record<InventoryField, string>;

/**
 * Derive the effective status from what the row actually carries.
 * No serial is always pending; a serial without a device id can be at
 * most unprovisioned.
 */
function effectiveStatus(row: InventoryRow): EndpointStatus {
  const raw = row.status.trim().toLowerCase();
  if (!row.serial_number) return 'pending';
  if (!row.uisp_id) return 'unprovisioned';
  if (raw === 'active' || raw === 'suspended') return raw;
  return 'suspended';
}

function rowToEndpoint(row: InventoryRow): EndpointRecord {
  return {
    name: row.onu_name,
    serialNumber: row.serial_number,
    macAddress: row.mac_address,
    property: row.property,
    unit: row.unit,
    dateAdded: row.date_added,
    status: effectiveStatus(row),
    deviceId: row.uisp_id,
  };
}

function endpointToRow(endpoint: EndpointRecord): InventoryRow {
  return {
    onu_name: endpoint.name,
    serial_number: endpoint.serialNumber,
    mac_address: endpoint.macAddress,
    property: endpoint.property,
    unit: endpoint.unit,
    date_added: endpoint.dateAdded,
    status: endpoint.status,
    uisp_id: endpoint.deviceId,
  };
}

function normalizeRow(raw: Partial<Record<string, string>>): InventoryRow {
  const get = (field: InventoryField): string => (raw[field] ?? '').trim();
  const row: InventoryRow = {
    onu_name: get('onu_name'),
    serial_number: get('serial_number'),
    mac_address: get('mac_address'),
    property: get('property'),
    unit: get('unit'),
    date_added: get('date_added'),
    status: get('status'),
    uisp_id: get('uisp_id'),
  };
  if (!row.onu_name && row.property && row.unit) {
    row.onu_name = deriveEndpointName(row.property, row.unit);
  }
  return row;
}

/**
 * Index of the row an endpoint name refers to. With duplicate names the
 * last row wins, as it does for unit lookups.
 */
function lastIndexByName(rows: InventoryRow[], name: string): number {
  for (let i = rows.length - 1; i >= 0; i--) {
    if (rows[i]?.onu_name === name) return i;
  }
  return -1;
}

function today(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Check the endpoint invariants before a write
 */
function assertEndpointInvariants(endpoint: EndpointRecord): void {
  if (endpoint.status === 'active' && !endpoint.serialNumber) {
    throw new ValidationError(`Endpoint ${endpoint.name} cannot be active without a serial number`, 'serial_number');
  }
  if ((endpoint.status === 'active' || endpoint.status === 'suspended') && !endpoint.deviceId) {
    throw new ValidationError(
      `Endpoint ${endpoint.name} cannot be ${endpoint.status} without a registered device id`,
      'uisp_id'
    );
  }
}

export class CsvInventoryStore implements IDeviceRegistry {
  private readonly logger: Logger;

  constructor(
    private readonly path: string,
    logger?: Logger,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.logger = logger ?? createChildLogger({ component: 'CsvInventoryStore' });
  }

  private load(): InventoryRow[] {
    if (!existsSync(this.path)) {
      this.logger.warn({ path: this.path }, 'Inventory file not found, treating as empty');
      return [];
    }

    const result = Papa.parse<Partial<Record<string, string>>>(readFileSync(this.path, 'utf8'), {
      header: true,
      skipEmptyLines: true,
      transformHeader: (header) => header.trim().toLowerCase(),
    });

    if (result.errors.length > 0) {
      this.logger.warn(
        { path: this.path, errors: result.errors.slice(0, 5).map((e) => `row ${e.row}: ${e.message}`) },
        'Inventory file has malformed rows'
      );
    }

    const rows = result.data.map(normalizeRow);
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const row of rows) {
      if (!row.onu_name) continue;
      if (seen.has(row.onu_name)) duplicates.add(row.onu_name);
      seen.add(row.onu_name);
    }
    if (duplicates.size > 0) {
      this.logger.warn(
        { path: this.path, endpoints: [...duplicates] },
        'Inventory has duplicate endpoint names; the last row of each is used'
      );
    }

    return rows;
  }

  private save(rows: InventoryRow[]): void {
    const csv = Papa.unparse(rows, { columns: [...INVENTORY_FIELDS], newline: '\n' });
    const tmpPath = `${this.path}.tmp`;
    writeFileSync(tmpPath, `${csv}\n`, 'utf8');
    renameSync(tmpPath, this.path);
  }

  list(): EndpointRecord[] {
    return this.load().map(rowToEndpoint);
  }

  findByName(name: string): EndpointRecord | null {
    const rows = this.load();
    const index = lastIndexByName(rows, name);
    const row = index >= 0 ? rows[index] : undefined;
    return row ? rowToEndpoint(row) : null;
  }

  findByUnit(property: string, unit: string): EndpointRecord | null {
    const propertyKey = normalizeProperty(property);
    const unitKey = unit.trim().toLowerCase();
    const expectedName = deriveEndpointName(property, unit);

    const matches = this.load().filter(
      (row) =>
        row.onu_name === expectedName ||
        (normalizeProperty(row.property) === propertyKey && row.unit.toLowerCase() === unitKey)
    );

    if (matches.length === 0) return null;

    if (matches.length > 1) {
      this.logger.warn(
        { property, unit, endpoints: matches.map((m) => m.onu_name) },
        'Multiple inventory rows resolve to the same unit; using the last one'
      );
    }

    const last = matches[matches.length - 1];
    return last ? rowToEndpoint(last) : null;
  }

  update(name: string, update: EndpointUpdate): EndpointRecord {
    const rows = this.load();
    const index = lastIndexByName(rows, name);
    const current = index >= 0 ? rows[index] : undefined;
    if (!current) {
      throw new ValidationError(`Endpoint not found in inventory: ${name}`, 'onu_name');
    }

    const before = rowToEndpoint(current);
    const next: EndpointRecord = {
      ...before,
      status: update.status ?? before.status,
      deviceId: update.deviceId ?? before.deviceId,
      serialNumber: update.serialNumber ?? before.serialNumber,
      macAddress: update.macAddress ?? before.macAddress,
    };

    // A newly added serial moves a pending row to unprovisioned
    if (next.status === 'pending' && next.serialNumber && !next.deviceId) {
      next.status = 'unprovisioned';
    }

    if ((next.status === 'active' || next.status === 'suspended') && !next.dateAdded) {
      next.dateAdded = today(this.clock());
    }

    assertEndpointInvariants(next);

    rows[index] = endpointToRow(next);
    this.save(rows);

    this.logger.debug({ endpoint: name, from: before.status, to: next.status }, 'Inventory row updated');
    return next;
  }
}
