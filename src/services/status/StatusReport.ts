/**
 * Status snapshot for the `status` command
 *
 * @module services/status/StatusReport
 */

import type { AppConfig } from '../../config.js';
import { isEmailEnabled } from '../../config.js';
import type { IDeviceRegistry, ISyncStateStore } from '../../packages/core/ports/index.js';
import type { EndpointStatus, SyncEvent } from '../../types/index.js';

export const RECENT_EVENT_LIMIT = 10;

export interface StatusReport {
  occupied: number;
  vacant: number;
  delinquent: number;
  suspended: number;
  endedLeases: number;
  inventory: Record<EndpointStatus, number>;
  notificationsEnabled: boolean;
  recentEvents: SyncEvent[];
}

export function buildStatusReport(
  config: AppConfig,
  store: ISyncStateStore,
  registry: IDeviceRegistry
): StatusReport {
  const active = store.listLeases('active');
  const inventory: Record<EndpointStatus, number> = {
    pending: 0,
    unprovisioned: 0,
    suspended: 0,
    active: 0,
  };
  for (const endpoint of registry.list()) {
    inventory[endpoint.status]++;
  }

  return {
    occupied: active.length,
    vacant: Math.max(config.billing.totalUnits - active.length, 0),
    delinquent: active.filter((l) => l.rentStatus === 'delinquent').length,
    suspended: active.filter((l) => l.serviceStatus === 'suspended').length,
    endedLeases: store.listLeases('ended').length,
    inventory,
    notificationsEnabled: isEmailEnabled(config),
    recentEvents: store.getRecentEvents(RECENT_EVENT_LIMIT),
  };
}
