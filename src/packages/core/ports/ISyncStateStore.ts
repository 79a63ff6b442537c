/**
 * Sync State Store Interface
 *
 * What we believe we've already done: lease sync records, ticket forward
 * records, the event log and billing history. Every mutation is a single
 * atomic upsert/update keyed by lease id or ticket id.
 *
 * @module packages/core/ports/ISyncStateStore
 */

import type {
  LeaseRecord,
  LeaseRecordPatch,
  LeaseLifecycleStatus,
  TicketForwardRecord,
  TicketClassification,
  SyncEvent,
  SyncEventType,
  BillingSnapshot,
  BillingHistoryEntry,
} from '../../../types/index.js';

export interface NewLeaseRecord {
  leaseId: string;
  tenantId: string | null;
  unitId: string;
  propertyAddress: string;
  endpointName: string;
  packageName: string;
}

export interface ISyncStateStore {
  // Lease records
  getLease(leaseId: string): LeaseRecord | null;
  listLeases(lifecycle?: LeaseLifecycleStatus): LeaseRecord[];
  /** The active record currently bound to an endpoint (property + unit), if any */
  findActiveLeaseByEndpoint(endpointName: string): LeaseRecord | null;
  /**
   * Insert a lease record as active/active/current, or refresh an existing
   * active record. Never resurrects an ended record.
   */
  upsertLease(record: NewLeaseRecord, now: Date): LeaseRecord;
  updateLease(leaseId: string, patch: LeaseRecordPatch, now: Date): LeaseRecord;
  /** Transition active → ended. Returns false if it was already ended. */
  markLeaseEnded(leaseId: string, now: Date): boolean;

  // Ticket forwards
  isTicketForwarded(inboundTicketId: string): boolean;
  getTicketForward(inboundTicketId: string): TicketForwardRecord | null;
  /** Returns false if the ticket was already recorded (no-op). */
  recordTicketForward(inboundTicketId: string, outboundTicketId: string, classification: TicketClassification): boolean;

  // Event log
  logEvent(eventType: SyncEventType, details: Record<string, unknown>): void;
  getRecentEvents(limit?: number): SyncEvent[];

  // Billing history
  saveBillingSnapshot(snapshot: BillingSnapshot): number;
  getBillingHistory(limit?: number): BillingHistoryEntry[];

  close(): void;
}
