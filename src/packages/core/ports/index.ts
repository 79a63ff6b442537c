/**
 * Core Ports
 *
 * Interfaces for the external collaborators and the state the engine owns.
 *
 * @module packages/core/ports
 */

export type {
  PmLease,
  PmTenant,
  PmMaintenanceTicket,
  PmInvoiceLineItem,
  TicketStatusFilter,
  IPropertyManagementClient,
} from './IPropertyManagementClient.js';
export type {
  BillingServiceStatus,
  BillingService,
  BillingClientRecord,
  CreateBillingClientParams,
  BillingServicePatch,
  BillingInvoiceItem,
  IBillingClient,
} from './IBillingClient.js';
export type { NetworkDevice, INetworkClient } from './INetworkClient.js';
export type { EndpointUpdate, IDeviceRegistry } from './IDeviceRegistry.js';
export type { NewLeaseRecord, ISyncStateStore } from './ISyncStateStore.js';
export type { WelcomeNotice, SuspensionNotice, INotifier } from './INotifier.js';
