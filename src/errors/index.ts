import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for the docs gateway
 * Extends native Error with a stable code and structured context
 */
export class GatewayError extends Error {
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
    this.name = 'GatewayError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Configuration-related errors (fatal at startup)
 */
export class ConfigurationError extends GatewayError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.VALIDATION_ERROR, ErrorSeverity.LOW, context, originalError);
    this.name = 'ValidationError';
  }
}

/**
 * A remote target whose host is outside the allowlist
 */
export class DomainNotAllowedError extends GatewayError {
  public readonly host: string;

  constructor(host: string, allowed: string[]) {
    super(
      `Domain not allowed: ${host}. Allowed domains: ${allowed.length > 0 ? allowed.join(', ') : '(none)'}`,
      ErrorCode.DOMAIN_NOT_ALLOWED,
      ErrorSeverity.MEDIUM,
      { host, allowed }
    );
    this.name = 'DomainNotAllowedError';
    this.host = host;
  }
}

/**
 * A local target outside every allowed local root
 */
export class PathNotAllowedError extends GatewayError {
  constructor(path: string, roots: string[]) {
    super(`Local path not allowed: ${path}`, ErrorCode.PATH_NOT_ALLOWED, ErrorSeverity.MEDIUM, {
      path,
      roots,
    });
    this.name = 'PathNotAllowedError';
  }
}

export class InvalidTargetError extends GatewayError {
  constructor(target: string, reason: string) {
    super(`Invalid target ${target}: ${reason}`, ErrorCode.INVALID_TARGET, ErrorSeverity.LOW, { target });
    this.name = 'InvalidTargetError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(target: string, context?: ErrorContext, originalError?: Error) {
    super(`Not found: ${target}`, ErrorCode.NOT_FOUND, ErrorSeverity.LOW, { target, ...context }, originalError);
    this.name = 'NotFoundError';
  }
}

/**
 * Network, transport, timeout or unexpected HTTP status failures
 */
export class UpstreamError extends GatewayError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.UPSTREAM_ERROR, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'UpstreamError';
  }
}

export class TooLargeError extends GatewayError {
  /** length is left out when reading stopped before the end of the content */
  constructor(target: string, maxLength: number, length?: number) {
    super(
      length === undefined
        ? `Content of ${target} exceeds the maximum of ${maxLength} characters`
        : `Content of ${target} is ${length} characters, exceeding the maximum of ${maxLength}`,
      ErrorCode.TOO_LARGE,
      ErrorSeverity.LOW,
      { target, maxLength, ...(length === undefined ? {} : { length }) }
    );
    this.name = 'TooLargeError';
  }
}

export class IndexUnavailableError extends GatewayError {
  constructor(source: string, location: string, originalError?: Error) {
    super(
      `Index for ${source} is unavailable (${location})${originalError ? `: ${originalError.message}` : ''}`,
      ErrorCode.INDEX_UNAVAILABLE,
      ErrorSeverity.MEDIUM,
      { source, location },
      originalError
    );
    this.name = 'IndexUnavailableError';
  }
}

export class IndexParseError extends GatewayError {
  constructor(location: string, reason: string) {
    super(`Could not parse index ${location}: ${reason}`, ErrorCode.INDEX_PARSE_ERROR, ErrorSeverity.MEDIUM, {
      location,
    });
    this.name = 'IndexParseError';
  }
}

/**
 * Tool execution errors
 */
export class ToolError extends GatewayError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'ToolError';
  }
}

export class ToolNameCollisionError extends GatewayError {
  constructor(toolName: string, sources: string[]) {
    super(
      `Duplicate tool name detected: ${toolName} (sources: ${sources.join(', ')}). Please ensure all doc sources have unique names.`,
      ErrorCode.TOOL_NAME_COLLISION,
      ErrorSeverity.CRITICAL,
      { toolName, sources }
    );
    this.name = 'ToolNameCollisionError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
