/**
 * Error types and error codes for the disk status exporter
 * Each scan-level code names one degradation path; none of them aborts a scan
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,
  INITIALIZATION_ERROR = 1003,

  // Enumeration errors (2000-2999)
  ENUMERATION_READ_FAILURE = 2000,

  // Probe errors (3000-3999)
  PROBE_TIMEOUT = 3000,
  PROBE_INVOCATION_FAILURE = 3001,
  PROBE_UNSUPPORTED = 3002,

  // Topology errors (4000-4999)
  TOPOLOGY_UNAVAILABLE = 4000,
  TOPOLOGY_PARSE_ANOMALY = 4001,

  // Server errors (5000-5999)
  SCAN_FAILED = 5000,
  SERVER_START_FAILED = 5001,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}
