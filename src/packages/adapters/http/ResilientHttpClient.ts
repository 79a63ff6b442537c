/**
 * ResilientHttpClient - JSON over HTTP with timeout and circuit breaker
 *
 * Every call carries an AbortController timeout and goes through an opossum
 * circuit breaker, so an API that is down fails fast for the rest of the
 * cycle instead of stalling it. There is no retry: items that fail are left
 * in their prior state and picked up again by the next cycle.
 *
 * All failures surface as RemoteCallError.
 *
 * @module packages/adapters/http/ResilientHttpClient
 */

import CircuitBreaker from 'opossum';
import type { Logger } from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';
import { createChildLogger } from '../../../utils/logger.js';
import { RemoteCallError } from '../../../utils/errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ResilientHttpClientOptions {
  /** Service name for logs and errors (e.g. "innago") */
  service: string;
  baseUrl: string;
  headers: Record<string, string>;
  /** Per-request timeout (default 10s) */
  timeoutMs?: number;
  /** Error percentage at which the breaker opens (default 50) */
  errorThresholdPercentage?: number;
  /** Time before the breaker half-opens (default 30s) */
  resetTimeoutMs?: number;
  /** Minimum requests before the breaker may open (default 5) */
  volumeThreshold?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Default circuit breaker configuration
 * - Opens at 50% error rate
 * - Resets after 30 seconds
 * - 10 second timeout for requests
 */
const DEFAULT_BREAKER_OPTIONS = {
  errorThresholdPercentage: 50,
  resetTimeout: 30000,
  timeout: 10000,
  volumeThreshold: 5,
};

export class ResilientHttpClient {
  private readonly service: string;
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly breaker: CircuitBreaker<[HttpRequest], unknown>;

  constructor(options: ResilientHttpClientOptions) {
    this.service = options.service;
    this.baseUrl = options.baseUrl.replace(/\/$/, ''); // Remove trailing slash
    this.headers = options.headers;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BREAKER_OPTIONS.timeout;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createChildLogger({ component: 'ResilientHttpClient', service: options.service });

    this.breaker = new CircuitBreaker((request: HttpRequest) => this.send(request), {
      ...DEFAULT_BREAKER_OPTIONS,
      errorThresholdPercentage:
        options.errorThresholdPercentage ?? DEFAULT_BREAKER_OPTIONS.errorThresholdPercentage,
      resetTimeout: options.resetTimeoutMs ?? DEFAULT_BREAKER_OPTIONS.resetTimeout,
      volumeThreshold: options.volumeThreshold ?? DEFAULT_BREAKER_OPTIONS.volumeThreshold,
      // Our own AbortController enforces the timeout
      timeout: false,
    });

    this.breaker.on('open', () => {
      this.logger.warn({ service: this.service }, 'Circuit breaker OPEN');
    });
    this.breaker.on('halfOpen', () => {
      this.logger.info({ service: this.service }, 'Circuit breaker HALF-OPEN');
    });
    this.breaker.on('close', () => {
      this.logger.info({ service: this.service }, 'Circuit breaker CLOSED');
    });
  }

  /**
   * Build the full URL for a request
   */
  buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }

  /**
   * Perform one request with timeout. Resolves with parsed JSON, or null
   * for an empty body.
   */
  private async send(request: HttpRequest): Promise<unknown> {
    const url = this.buildUrl(request.path, request.query);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: request.method,
        headers: this.headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new RemoteCallError(
          this.service,
          `${request.method} ${request.path} failed: ${response.status} ${response.statusText}`,
          response.status
        );
      }

      const text = await response.text();
      if (!text) return null;

      try {
        return JSON.parse(text);
      } catch {
        throw new RemoteCallError(this.service, `${request.method} ${request.path} returned invalid JSON`, response.status);
      }
    } catch (error) {
      if (error instanceof RemoteCallError) throw error;
      if (controller.signal.aborted) {
        throw new RemoteCallError(this.service, `${request.method} ${request.path} timed out after ${this.timeoutMs}ms`);
      }
      throw new RemoteCallError(
        this.service,
        `${request.method} ${request.path} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Execute a request through the circuit breaker
   */
  async request(request: HttpRequest): Promise<unknown> {
    try {
      return await this.breaker.fire(request);
    } catch (error) {
      if (error instanceof RemoteCallError) throw error;
      // Breaker open / shutdown
      throw new RemoteCallError(
        this.service,
        `${request.method} ${request.path} rejected: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  get(path: string, query?: QueryParams): Promise<unknown> {
    return this.request({ method: 'GET', path, query });
  }

  post(path: string, body: unknown): Promise<unknown> {
    return this.request({ method: 'POST', path, body });
  }

  patch(path: string, body: unknown): Promise<unknown> {
    return this.request({ method: 'PATCH', path, body });
  }

  delete(path: string): Promise<unknown> {
    return this.request({ method: 'DELETE', path });
  }

  /**
   * Current breaker state, for status output
   */
  isOpen(): boolean {
    return this.breaker.opened;
  }

  /**
   * Stop the breaker's rolling statistics timer
   */
  shutdown(): void {
    this.breaker.shutdown();
  }
}

/**
 * Parse a payload with a zod-like schema, converting failures to RemoteCallError
 */
export function parseResponse<T>(
  service: string,
  what: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'root'}: ${i.message}`);
    throw new RemoteCallError(service, `Unexpected ${what} payload (${issues.join('; ')})`);
  }
  return result.data;
}
