/**
 * Device Registry Interface
 *
 * Inventory of ONUs keyed by endpoint name. Hardware lifecycle is tracked
 * here independently of tenancy.
 *
 * @module packages/core/ports/IDeviceRegistry
 */

import type { EndpointRecord, EndpointStatus } from '../../../types/index.js';

export interface EndpointUpdate {
  status?: EndpointStatus;
  deviceId?: string;
  serialNumber?: string;
  macAddress?: string;
}

export interface IDeviceRegistry {
  list(): EndpointRecord[];
  findByName(name: string): EndpointRecord | null;
  /**
   * Resolve by (property, unit). When two rows resolve to the same endpoint
   * name the last one in inventory order wins and a warning is logged.
   */
  findByUnit(property: string, unit: string): EndpointRecord | null;
  /** @throws ValidationError if the update would break an endpoint invariant */
  update(name: string, update: EndpointUpdate): EndpointRecord;
}
