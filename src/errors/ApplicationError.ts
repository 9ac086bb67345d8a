/**
 * Unified Error Hierarchy for nfo-sync
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Retry hints
 * - Structured logging support
 *
 * Only configuration and catalog connection errors are allowed to escape the
 * sync pipeline; everything else is converted into a run outcome.
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_SIDECAR_MALFORMED = 'VALIDATION_SIDECAR_MALFORMED',

  // Network Errors (retryable)
  NETWORK_CONNECTION_FAILED = 'NETWORK_CONNECTION_FAILED',

  // Catalog (Plex) Errors
  CATALOG_REQUEST_FAILED = 'CATALOG_REQUEST_FAILED',
  CATALOG_UNAVAILABLE = 'CATALOG_UNAVAILABLE',
  CATALOG_INVALID_RESPONSE = 'CATALOG_INVALID_RESPONSE',

  // Configuration Errors (permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System Errors
  SYSTEM_INVALID_STATE = 'SYSTEM_INVALID_STATE',
  SYSTEM_USER_ABORTED = 'SYSTEM_USER_ABORTED',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'search', 'saveEdits') */
  operation?: string;

  /** Entity kind being operated on (e.g., 'movie', 'episode') */
  entityType?: string;

  /** Catalog rating key or file path */
  entityId?: string | number;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors in nfo-sync should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether this error is retryable
   */
  public readonly retryable: boolean;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  /**
   * Timestamp when error was created
   */
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
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

/**
 * Sidecar file is missing, unreadable, not XML, or has no usable root element
 */
export class MalformedSidecarError extends ApplicationError {
  constructor(
    public readonly path: string,
    message?: string,
    cause?: Error
  ) {
    super(message || `Malformed NFO file: ${path}`, ErrorCode.VALIDATION_SIDECAR_MALFORMED, {
      isOperational: true,
      retryable: false,
      context: { service: 'nfoParser', entityId: path },
      ...(cause && { cause }),
    });
  }
}

// ============================================
// OPERATIONAL ERRORS
// ============================================

export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    retryable: boolean,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      isOperational: true,
      retryable,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

/**
 * A catalog request (search, read, edit, upload) failed.
 */
export class CatalogRequestError extends OperationalError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly url: string,
    public readonly httpStatusCode?: number,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      httpStatusCode === undefined ? ErrorCode.NETWORK_CONNECTION_FAILED : ErrorCode.CATALOG_REQUEST_FAILED,
      httpStatusCode === undefined || httpStatusCode >= 500,
      { ...context, service: 'plex', metadata: { ...context?.metadata, method, url, httpStatusCode } },
      cause
    );
  }
}

/**
 * Could not establish a session with the catalog service; ends the run
 */
export class CatalogConnectionError extends OperationalError {
  constructor(public readonly baseUrl: string, message?: string, cause?: Error) {
    super(
      message || `Failed to connect to Plex at ${baseUrl}`,
      ErrorCode.CATALOG_UNAVAILABLE,
      false,
      { service: 'plex', operation: 'connect', metadata: { baseUrl } },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS (Not Retryable)
// ============================================

export class PermanentError extends ApplicationError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, cause?: Error) {
    super(message, code, {
      isOperational: false,
      retryable: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

export class InvalidStateError extends PermanentError {
  constructor(
    public readonly expectedState: string,
    public readonly actualState: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Invalid state: expected '${expectedState}', got '${actualState}'`,
      ErrorCode.SYSTEM_INVALID_STATE,
      { ...context, metadata: { ...context?.metadata, expectedState, actualState } }
    );
  }
}

/**
 * The user typed 'q' at an interactive prompt. Ends the run, not an error outcome.
 */
export class UserQuitError extends ApplicationError {
  constructor() {
    super('User quit the interactive session', ErrorCode.SYSTEM_USER_ABORTED, {
      isOperational: true,
      retryable: false,
    });
  }
}
