/**
 * Error types for the Slurm REST client.
 * @module errors/error
 */

/**
 * Error kinds for categorizing Slurm client errors.
 */
export enum SlurmErrorKind {
  // Precondition errors
  /** No cancellation context was supplied. */
  ContextRequired = 'context_required',
  /** The caller's context was cancelled before the call was issued. */
  Cancelled = 'cancelled',
  /** The adapter was built without a wire client. */
  ClientNotInitialized = 'client_not_initialized',
  /** Malformed or missing required input. */
  ValidationError = 'validation_error',
  /** Operation is not available in the selected wire version. */
  UnsupportedOperation = 'unsupported_operation',
  /** Requested wire version is unknown. */
  UnsupportedVersion = 'unsupported_version',

  // API errors (HTTP status codes)
  /** Not found (404). */
  NotFound = 'not_found',
  /** Conflict (409). */
  Conflict = 'conflict',
  /** Unauthorized (401/403). */
  Unauthorized = 'unauthorized',
  /** Server error (5xx). */
  ServerError = 'server_error',

  // Transport errors
  /** Network connection failed. */
  Network = 'network',
  /** Request timeout. */
  Timeout = 'timeout',
  /** Response body did not match the wire schema. */
  InvalidResponse = 'invalid_response',

  // Configuration
  /** Invalid client configuration. */
  Configuration = 'configuration',
}

/**
 * Structured error entry embedded in a Slurm response body.
 */
export interface WireErrorEntry {
  /** Short error name. */
  error?: string;
  /** Numeric Slurm error code. */
  error_number?: number;
  /** Human-readable description. */
  description?: string;
  /** Component that raised the error. */
  source?: string;
}

/**
 * Slurm client error with detailed information.
 */
export class SlurmError extends Error {
  /** Error kind. */
  public readonly kind: SlurmErrorKind;
  /** HTTP status code, when the error came from a response. */
  public readonly statusCode?: number;
  /** Wire version that produced the error. */
  public readonly version?: string;
  /** Error entries carried in the response body. */
  public readonly details: WireErrorEntry[];
  /** Underlying cause. */
  public readonly cause?: Error;

  constructor(
    kind: SlurmErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      version?: string;
      details?: WireErrorEntry[];
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'SlurmError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.version = options?.version;
    this.details = options?.details ?? [];
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SlurmError);
    }
  }

  /**
   * Returns true if this error is retryable by the transport.
   */
  isRetryable(): boolean {
    return [
      SlurmErrorKind.ServerError,
      SlurmErrorKind.Network,
      SlurmErrorKind.Timeout,
    ].includes(this.kind);
  }

  // Convenience factory methods

  static contextRequired(): SlurmError {
    return new SlurmError(SlurmErrorKind.ContextRequired, 'context is required');
  }

  static cancelled(reason?: string): SlurmError {
    return new SlurmError(
      SlurmErrorKind.Cancelled,
      reason ? `context cancelled: ${reason}` : 'context cancelled'
    );
  }

  static clientNotInitialized(resource: string): SlurmError {
    return new SlurmError(
      SlurmErrorKind.ClientNotInitialized,
      `${resource} adapter: client not initialized`
    );
  }

  static validation(message: string): SlurmError {
    return new SlurmError(SlurmErrorKind.ValidationError, message);
  }

  static unsupportedOperation(operation: string, version: string): SlurmError {
    return new SlurmError(
      SlurmErrorKind.UnsupportedOperation,
      `${operation} not supported in ${version}`,
      { version }
    );
  }

  static unsupportedVersion(version: string, supported: readonly string[]): SlurmError {
    return new SlurmError(
      SlurmErrorKind.UnsupportedVersion,
      `unsupported API version "${version}" (supported: ${supported.join(', ')})`
    );
  }

  static notFound(resource: string, id: string, version?: string): SlurmError {
    return new SlurmError(SlurmErrorKind.NotFound, `${resource} "${id}" not found`, {
      statusCode: 404,
      version,
    });
  }

  static invalidResponse(message: string, version?: string, cause?: Error): SlurmError {
    return new SlurmError(SlurmErrorKind.InvalidResponse, message, { version, cause });
  }

  static network(message: string, cause?: Error): SlurmError {
    return new SlurmError(SlurmErrorKind.Network, message, { cause });
  }

  static timeout(message: string): SlurmError {
    return new SlurmError(SlurmErrorKind.Timeout, message);
  }

  static configuration(message: string): SlurmError {
    return new SlurmError(SlurmErrorKind.Configuration, message);
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.version) {
      result += ` [${this.version}]`;
    }
    return result;
  }
}

/**
 * Type guard for SlurmError.
 */
export function isSlurmError(error: unknown): error is SlurmError {
  return error instanceof SlurmError;
}

/**
 * Returns true if `error` is a SlurmError of the given kind.
 */
export function hasErrorKind(error: unknown, kind: SlurmErrorKind): boolean {
  return isSlurmError(error) && error.kind === kind;
}
