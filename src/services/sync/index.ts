export { SyncEngine } from './SyncEngine.js';
export type { SyncCycleReport, PhaseReport, SyncEngineOptions } from './SyncEngine.js';
export { LeaseLifecyclePhase, LEASE_ENDED_REASON } from './LeaseLifecyclePhase.js';
export { DelinquencyPhase, delinquencyReason } from './DelinquencyPhase.js';
export { BillingDriftPhase, DRIFT_SUSPEND_REASON } from './BillingDriftPhase.js';
export { TicketForwardingPhase, forwardedSubject, forwardedMessage } from './TicketForwardingPhase.js';
export { classifyTicket, extractSpeedTokens, resolveRequestedPackage } from './classification.js';
export type { KeywordSets, TicketIntent } from './classification.js';
export type { SyncDependencies, SyncPhase, PhaseName, PhaseResult } from './context.js';
