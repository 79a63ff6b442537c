/**
 * Utils module exports
 */

export { logger, createChildLogger, type Logger } from './logger.js';
export {
  AppError,
  ConfigurationError,
  RemoteCallError,
  DataResolutionError,
  EndpointNotFoundError,
  EndpointNotProvisionedError,
  DatabaseError,
  ValidationError,
  errorMessage,
  isWarningLevel,
  logError,
} from './errors.js';
