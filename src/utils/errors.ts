/**
 * Error Handling Utilities
 *
 * Typed errors for the sync service. Steady-state errors are operational:
 * they are contained at the smallest scope (one lease, one ticket, one phase)
 * and surfaced through logs and the event log. ConfigurationError is the only
 * fatal one and is raised before the engine is built.
 */

import type { Logger } from 'pino';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational: boolean = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or invalid settings. Prevents engine construction.
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', false);
    this.issues = issues;
  }
}

/**
 * A call to the property-management, CRM or network API failed,
 * timed out, or returned a payload we could not parse.
 */
export class RemoteCallError extends AppError {
  public readonly service: string;
  public readonly status: number | undefined;

  constructor(service: string, message: string, status?: number) {
    super(`${service}: ${message}`, 'REMOTE_CALL_ERROR');
    this.service = service;
    this.status = status;
  }
}

/**
 * Upstream data could not be resolved into what we need
 * (e.g. no unit number in a lease).
 */
export class DataResolutionError extends AppError {
  public readonly field: string;

  constructor(message: string, field: string) {
    super(message, 'DATA_RESOLUTION_ERROR');
    this.field = field;
  }
}

/**
 * No inventory row matches the endpoint name
 */
export class EndpointNotFoundError extends AppError {
  public readonly endpointName: string;

  constructor(endpointName: string) {
    super(`Endpoint not found in inventory: ${endpointName}`, 'ENDPOINT_NOT_FOUND');
    this.endpointName = endpointName;
  }
}

/**
 * Inventory row exists but has no registered device id
 */
export class EndpointNotProvisionedError extends AppError {
  public readonly endpointName: string;

  constructor(endpointName: string) {
    super(`Endpoint not provisioned yet: ${endpointName}`, 'ENDPOINT_NOT_PROVISIONED');
    this.endpointName = endpointName;
  }
}

/**
 * Database error
 */
export class DatabaseError extends AppError {
  constructor(message: string, public readonly sqliteCode?: string) {
    super(message, 'DATABASE_ERROR');
  }
}

/**
 * Validation error for inputs to pure functions and registry writes
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.field = field;
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Data and endpoint resolution problems are expected in day-to-day
 * operation and log as warnings; everything else is an error.
 */
export function isWarningLevel(error: unknown): boolean {
  return (
    error instanceof DataResolutionError ||
    error instanceof EndpointNotFoundError ||
    error instanceof EndpointNotProvisionedError
  );
}

/**
 * Log an error at the level its type calls for
 */
export function logError(
  log: Logger,
  error: unknown,
  context: Record<string, unknown>,
  message: string
): void {
  if (error instanceof AppError) {
    const payload = { ...context, errorCode: error.code, error: error.message };
    if (isWarningLevel(error)) {
      log.warn(payload, message);
    } else {
      log.error(payload, message);
    }
    return;
  }

  log.error({ ...context, error: errorMessage(error) }, message);
}
