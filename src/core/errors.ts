// Domain-specific error types for the namespace scanner

/**
 * Base error class for all scanner errors
 */
export abstract class ScannerError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input
 */
export class ValidationError extends ScannerError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Security errors for path traversal in namespace names
 */
export class SecurityError extends ScannerError {
  readonly code = 'SECURITY_ERROR';
}

/**
 * Configuration file could not be read or failed schema validation
 */
export class ConfigError extends ScannerError {
  readonly code = 'CONFIG_ERROR';
}

/**
 * Host-level I/O failure while listing locations for a namespace
 */
export class DiscoveryIOError extends ScannerError {
  readonly code = 'DISCOVERY_IO_ERROR';
}

/**
 * Strict parse failure of a location string
 */
export class LocationSyntaxError extends ScannerError {
  readonly code = 'LOCATION_SYNTAX';

  constructor(message: string, public readonly input: string, public readonly index?: number) {
    super(message, { input, index });
  }
}

/**
 * A raw location could neither be parsed nor repaired
 */
export class MalformedLocationError extends ScannerError {
  readonly code = 'MALFORMED_LOCATION';

  constructor(public readonly location: string, cause?: unknown) {
    super(`Error when converting a location to a canonical identifier: ${location}`, { location }, { cause });
  }
}

/**
 * No finder factory is registered for the scheme of a location
 */
export class UnsupportedSchemeError extends ScannerError {
  readonly code = 'UNSUPPORTED_SCHEME';

  constructor(public readonly scheme: string, public readonly location: string) {
    super(
      `The scheme ${scheme} of the location ${location} is not supported. ` +
        'Namespace scanning is not supported for such locations. ' +
        'Try declaring the resources explicitly instead.',
      { scheme, location }
    );
  }
}

/**
 * next() was called with no remaining resources
 */
export class ExhaustedSequenceError extends ScannerError {
  readonly code = 'EXHAUSTED_SEQUENCE';

  constructor(message = 'No more resources') {
    super(message);
  }
}

/**
 * open() or remove() was called without a current resource
 */
export class StaleCursorError extends ScannerError {
  readonly code = 'STALE_CURSOR';

  constructor(operation: 'open' | 'remove') {
    super(`${operation}() requires a resource returned by next()`, { operation });
  }
}

/**
 * The finder does not support the requested operation
 */
export class UnsupportedOperationError extends ScannerError {
  readonly code = 'UNSUPPORTED_OPERATION';
}

/**
 * Replacement of a process-wide strategy was rejected by the access controller
 */
export class PermissionError extends ScannerError {
  readonly code = 'PERMISSION_DENIED';

  constructor(public readonly permission: string) {
    super(`Access denied: ${permission}`, { permission });
  }
}

/**
 * Reads the errno code of a Node system error
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
