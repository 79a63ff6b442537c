/**
 * Adapters
 *
 * Implementations of the core ports against real systems.
 *
 * @module packages/adapters
 */

export { ResilientHttpClient, parseResponse } from './http/ResilientHttpClient.js';
export type { FetchLike, HttpRequest, ResilientHttpClientOptions } from './http/ResilientHttpClient.js';
export { InnagoClient } from './innago/InnagoClient.js';
export type { InnagoClientOptions } from './innago/InnagoClient.js';
export { UispCrmClient, formatDate } from './uisp/UispCrmClient.js';
export type { UispClientOptions } from './uisp/UispCrmClient.js';
export { UispNmsClient, normalizeHardwareId } from './uisp/UispNmsClient.js';
export { CsvInventoryStore } from './inventory/CsvInventoryStore.js';
