/**
 * Error hierarchy for the bridge
 * All errors extend from BridgeError with a stable code and structured context
 */

export interface ErrorContext {
  [key: string]: unknown;
}

/**
 * Base error class for all bridge errors
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: ErrorContext
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export type ConversionErrorKind = 'UnsupportedConstruct' | 'MalformedInput' | 'SchemaViolation';

/**
 * Raised when a value cannot be translated between wire formats.
 * `path` points at the offending field, e.g. `messages[2].tool_calls[0]`.
 */
export class ConversionError extends BridgeError {
  constructor(
    public readonly kind: ConversionErrorKind,
    message: string,
    context?: ErrorContext
  ) {
    super(message, `CONVERSION_${toSnake(kind)}`, { ...context, kind });
  }
}

export type TransformErrorKind = 'UnknownEncodedName';

export class TransformError extends BridgeError {
  constructor(
    public readonly kind: TransformErrorKind,
    message: string,
    context?: ErrorContext
  ) {
    super(message, `TRANSFORM_${toSnake(kind)}`, { ...context, kind });
  }
}

export type TransportErrorKind =
  | 'Unauthorized'
  | 'RateLimited'
  | 'Overloaded'
  | 'Timeout'
  | 'NetworkFailure'
  | 'MalformedResponse'
  | 'RequestRejected';

export interface TransportErrorDetails extends ErrorContext {
  status?: number;
  retryAfterMs?: number;
  body?: string;
}

/**
 * Failure reported by a Transport. Passed through the client unmodified.
 */
export class TransportError extends BridgeError {
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
    details: TransportErrorDetails = {}
  ) {
    super(message, `TRANSPORT_${toSnake(kind)}`, { ...details, kind });
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/**
 * Configuration-related errors (missing credentials, invalid base URL, breakpoint limits, etc.)
 */
export class ConfigurationError extends BridgeError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', context);
  }
}

function toSnake(kind: string): string {
  return kind.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase();
}

const RETRYABLE_KINDS: ReadonlySet<TransportErrorKind> = new Set([
  'RateLimited',
  'Overloaded',
  'Timeout',
  'NetworkFailure',
]);

/**
 * Whether a caller may reasonably retry the failed operation.
 * Only transient transport failures qualify.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof TransportError && RETRYABLE_KINDS.has(error.kind);
}

/**
 * Helper function to convert unknown errors to BridgeError
 */
export function toBridgeError(error: unknown): BridgeError {
  if (error instanceof BridgeError) {
    return error;
  }

  if (error instanceof Error) {
    return new BridgeError(
      error.message,
      'INTERNAL_ERROR',
      { originalError: error.name, stack: error.stack }
    );
  }

  return new BridgeError(
    String(error),
    'UNKNOWN_ERROR',
    { originalError: error }
  );
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}

export function isTransformError(error: unknown): error is TransformError {
  return error instanceof TransformError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
