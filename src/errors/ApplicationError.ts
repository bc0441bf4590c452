/**
 * Error hierarchy for provider routing
 *
 * Every error raised by the routing core carries:
 * - a machine-readable code
 * - context metadata for structured logging
 * - a retry hint, so providers can decide whether to try again
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // Provider calls (operational)
  PROVIDER_CALL_FAILED = 'PROVIDER_CALL_FAILED',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',

  // Configuration (permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',
  CAPABILITY_DECLARATION_INVALID = 'CAPABILITY_DECLARATION_INVALID',
  ROUTING_NOT_A_CANDIDATE = 'ROUTING_NOT_A_CANDIDATE',

  UNKNOWN = 'UNKNOWN',
}

export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g. 'searchForNewAlbum') */
  operation?: string;

  /** Capability contract involved, if any */
  contract?: string;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 */
export abstract class ApplicationError extends Error {
  public readonly code: ErrorCode;

  /** Whether this error is operational (expected) vs programmer error */
  public readonly isOperational: boolean;

  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  /** Original error that caused this error (if wrapped) */
  public readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      isOperational?: boolean;
      retryable?: boolean;
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    context?: ErrorContext
  ) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, {
      isOperational: true,
      retryable: false,
      context: { ...context, metadata: { ...context?.metadata, issues } },
    });
  }
}

// ============================================
// PROVIDER ERRORS (operational)
// ============================================

export class ProviderError extends ApplicationError {
  constructor(
    message: string,
    public readonly providerName: string,
    code: ErrorCode = ErrorCode.PROVIDER_CALL_FAILED,
    retryable: boolean = true,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: true,
      retryable,
      context: { ...context, service: providerName },
      ...(cause && { cause }),
    });
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(
    providerName: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || `Provider unavailable: ${providerName}`,
      providerName,
      ErrorCode.PROVIDER_UNAVAILABLE,
      true,
      context,
      cause
    );
  }
}

// ============================================
// CONFIGURATION ERRORS (permanent)
// ============================================

export class ConfigurationError extends ApplicationError {
  constructor(
    public readonly configKey: string,
    message?: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: ErrorContext
  ) {
    super(message || `Configuration error: ${configKey}`, code, {
      isOperational: false,
      retryable: false,
      context: { ...context, metadata: { ...context?.metadata, configKey } },
    });
  }
}
