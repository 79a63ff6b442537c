/**
 * Runtime wiring
 *
 * Builds every component from a validated AppConfig. Business code never
 * reads configuration or the environment itself; everything it needs is
 * handed to it here.
 *
 * @module bootstrap
 */

import type { Logger } from 'pino';
import type { AppConfig } from './config.js';
import { logger as rootLogger } from './utils/logger.js';
import { SqliteSyncStore } from './db/SqliteSyncStore.js';
import { CsvInventoryStore } from './packages/adapters/inventory/CsvInventoryStore.js';
import { InnagoClient } from './packages/adapters/innago/InnagoClient.js';
import { UispCrmClient } from './packages/adapters/uisp/UispCrmClient.js';
import { UispNmsClient } from './packages/adapters/uisp/UispNmsClient.js';
import type { FetchLike } from './packages/adapters/http/ResilientHttpClient.js';
import type { INotifier } from './packages/core/ports/index.js';
import { EndpointService } from './services/endpoint/EndpointService.js';
import { EmailNotifier } from './services/notification/EmailNotifier.js';
import { BillingReportService } from './services/billing/BillingReportService.js';
import { SyncEngine } from './services/sync/SyncEngine.js';

export interface RuntimeOverrides {
  fetchImpl?: FetchLike;
  logger?: Logger;
  clock?: () => Date;
  /** Replace the notifier built from config (null disables notifications) */
  notifier?: INotifier | null;
}

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  store: SqliteSyncStore;
  registry: CsvInventoryStore;
  propertyManagement: InnagoClient;
  billing: UispCrmClient;
  network: UispNmsClient;
  endpoints: EndpointService;
  notifier: INotifier | null;
  engine: SyncEngine;
  billingReport: BillingReportService;
  /** Release the database and breaker timers */
  close(): void;
}

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? rootLogger;
  const clock = overrides.clock ?? (() => new Date());
  const child = (component: string): Logger => logger.child({ component });

  const httpOptions = {
    timeoutMs: config.http.timeoutMs,
    errorThresholdPercentage: config.http.errorThresholdPercentage,
    resetTimeoutMs: config.http.resetTimeoutMs,
    fetchImpl: overrides.fetchImpl,
  };

  const store = new SqliteSyncStore(config.database.path, child('SqliteSyncStore'), clock);
  const registry = new CsvInventoryStore(config.inventory.path, child('CsvInventoryStore'), clock);

  const propertyManagement = new InnagoClient({
    ...httpOptions,
    apiUrl: config.propertyManagement.apiUrl,
    apiKey: config.propertyManagement.apiKey,
    logger: child('InnagoClient'),
  });
  const billing = new UispCrmClient({
    ...httpOptions,
    host: config.uisp.host,
    protocol: config.uisp.protocol,
    apiKey: config.uisp.crmApiKey,
    logger: child('UispCrmClient'),
    now: clock,
  });
  const network = new UispNmsClient({
    ...httpOptions,
    host: config.uisp.host,
    protocol: config.uisp.protocol,
    apiKey: config.uisp.nmsApiKey,
    logger: child('UispNmsClient'),
  });

  const endpoints = new EndpointService({
    registry,
    network,
    parentSiteId: config.uisp.parentSiteId,
    events: store,
    logger: child('EndpointService'),
  });

  let notifier: INotifier | null = null;
  if (overrides.notifier !== undefined) {
    notifier = overrides.notifier;
  } else if (config.email) {
    notifier = new EmailNotifier(config.email, child('EmailNotifier'));
  }

  const engine = new SyncEngine(
    { config, propertyManagement, billing, endpoints, store, notifier },
    { clock, logger: child('SyncEngine') }
  );

  const billingReport = new BillingReportService({
    config,
    store,
    billing,
    clock,
    logger: child('BillingReportService'),
  });

  return {
    config,
    logger,
    store,
    registry,
    propertyManagement,
    billing,
    network,
    endpoints,
    notifier,
    engine,
    billingReport,
    close() {
      propertyManagement.shutdown();
      billing.shutdown();
      network.shutdown();
      store.close();
    },
  };
}
