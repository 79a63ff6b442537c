/**
 * Shared dependencies and result types for the sync phases
 *
 * @module services/sync/context
 */

import type { AppConfig } from '../../config.js';
import type {
  IPropertyManagementClient,
  IBillingClient,
  ISyncStateStore,
  INotifier,
} from '../../packages/core/ports/index.js';
import type { EndpointService } from '../endpoint/EndpointService.js';

export interface SyncDependencies {
  config: AppConfig;
  propertyManagement: IPropertyManagementClient;
  billing: IBillingClient;
  endpoints: EndpointService;
  store: ISyncStateStore;
  /** null when notifications are not configured */
  notifier: INotifier | null;
}

export type PhaseName = 'leases' | 'delinquency' | 'drift' | 'tickets';

export interface PhaseResult {
  /** Items examined */
  processed: number;
  /** Items whose state changed */
  changed: number;
  /** Items that failed and are left for the next cycle */
  failed: number;
  /** Phase did not run (e.g. before the grace day) */
  skipped?: boolean;
}

export interface SyncPhase {
  readonly name: PhaseName;
  run(now: Date): Promise<PhaseResult>;
}

export function emptyResult(): PhaseResult {
  return { processed: 0, changed: 0, failed: 0 };
}

