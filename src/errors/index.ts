import { ErrorCode, ErrorSeverity, type ErrorContext } from './types.js';

/**
 * Base error class for the disk status exporter
 * Extends native Error with a code, a severity and structured context
 */
export class ExporterError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'ExporterError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends ExporterError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure reading a device's sysfs attributes
 */
export class EnumerationError extends ExporterError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.ENUMERATION_READ_FAILURE, ErrorSeverity.LOW, context, originalError);
    this.name = 'EnumerationError';
  }
}

/**
 * smartctl probe errors (timeout, launch failure, unsupported device)
 */
export class ProbeError extends ExporterError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'ProbeError';
  }
}

/**
 * zpool topology errors
 */
export class TopologyError extends ExporterError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.LOW, context, originalError);
    this.name = 'TopologyError';
  }
}

/**
 * HTTP server and scan-serving errors
 */
export class ServerError extends ExporterError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ServerError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export { ErrorCode, ErrorSeverity, type ErrorContext } from './types.js';
