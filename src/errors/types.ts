/**
 * Error types and error codes for the docs gateway
 * Every failure a tool caller can observe maps to one code below
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,

  // Access policy errors (2000-2999)
  DOMAIN_NOT_ALLOWED = 2000,
  PATH_NOT_ALLOWED = 2001,

  // Index errors (3000-3999)
  INDEX_UNAVAILABLE = 3000,
  INDEX_PARSE_ERROR = 3001,

  // Fetch errors (4000-4999)
  NOT_FOUND = 4000,
  UPSTREAM_ERROR = 4001,
  TOO_LARGE = 4002,
  INVALID_TARGET = 4003,

  // Tool errors (5000-5999)
  TOOL_NOT_FOUND = 5000,
  TOOL_INVALID_INPUT = 5001,
  TOOL_NAME_COLLISION = 5002,
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

export interface ErrorDetails {
  name: string;
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  timestamp: number;
  stack?: string;
}
