/**
 * Error types for the Firebase Realtime Database client.
 *
 * Core operations never throw: they return a {@link Result} whose failure
 * branch carries a {@link FirebaseError}. Only configuration building throws.
 */

/**
 * Error codes for Firebase errors.
 */
export enum FirebaseErrorCode {
  // URL errors
  /** The URL could not be parsed. */
  InvalidUrl = 'invalid_url',
  /** The URL scheme is not https. */
  NotHttps = 'not_https',

  // Request errors
  /** A write was attempted without an encodable body. */
  Serialize = 'serialize',
  /** Transport failure or unexpected HTTP status. */
  Network = 'network',
  /** The response body is not the JSON the caller expected. */
  NotJson = 'not_json',
  /** The response body is not valid UTF-8. */
  Utf8 = 'utf8',
  /** A successful read returned `null`. */
  NotFoundOrNull = 'not_found_or_null',

  // Atomic update errors
  /** A counter bound would be violated. */
  LimitExceeded = 'limit_exceeded',

  // Streaming errors
  /** The event stream could not be opened or broke. */
  Connection = 'connection',
  /** A handler is already registered for the event type. */
  EventExists = 'event_exists',

  // Configuration errors
  Configuration = 'configuration',
}

/**
 * Base error class for Firebase errors.
 */
export class FirebaseError extends Error {
  /** Error code. */
  readonly code: FirebaseErrorCode;
  /** HTTP status code if applicable. */
  readonly status?: number;
  /** Additional error details. */
  readonly details?: Record<string, unknown>;

  constructor(
    code: FirebaseErrorCode,
    message: string,
    options?: {
      status?: number;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'FirebaseError';
    this.code = code;
    this.status = options?.status;
    this.details = options?.details;

    Error.captureStackTrace?.(this, this.constructor);
  }

  static invalidUrl(url: string, cause?: Error): FirebaseError {
    return new FirebaseError(FirebaseErrorCode.InvalidUrl, `Error while parsing the URL: ${url}`, {
      details: { url },
      cause,
    });
  }

  static notHttps(protocol: string): FirebaseError {
    return new FirebaseError(FirebaseErrorCode.NotHttps, 'The URL protocol should be https', {
      details: { protocol },
    });
  }

  static serialize(message: string, cause?: Error): FirebaseError {
    return new FirebaseError(FirebaseErrorCode.Serialize, `Serialize error: ${message}`, { cause });
  }

  /**
   * Creates a network error. Pass `status` when the server answered with an
   * unexpected status code rather than failing to answer at all.
   */
  static network(message: string, options?: { status?: number; cause?: Error }): FirebaseError {
    return new FirebaseError(FirebaseErrorCode.Network, `Network error: ${message}`, options);
  }

  static notJson(message: string, cause?: Error): FirebaseError {
    return new FirebaseError(FirebaseErrorCode.NotJson, `Invalid JSON: ${message}`, { cause });
  }

  static utf8(cause?: Error): FirebaseError {
    return new FirebaseError(FirebaseErrorCode.Utf8, 'Response body is not valid UTF-8', { cause });
  }

  static notFoundOrNull(path: string): FirebaseError {
    return new FirebaseError(
      FirebaseErrorCode.NotFoundOrNull,
      `Body is null or record is not found: ${path}`,
      { status: 200, details: { path } }
    );
  }

  static limitExceeded(current: number, bound: number, kind: 'min' | 'max'): FirebaseError {
    return new FirebaseError(
      FirebaseErrorCode.LimitExceeded,
      `Value ${current} has reached the ${kind} bound ${bound}`,
      { details: { current, bound, kind } }
    );
  }

  static connection(message: string, options?: { status?: number; cause?: Error }): FirebaseError {
    return new FirebaseError(
      FirebaseErrorCode.Connection,
      `Connection error for server events: ${message}`,
      options
    );
  }

  static eventExists(eventType: string): FirebaseError {
    return new FirebaseError(
      FirebaseErrorCode.EventExists,
      `A handler is already registered for event: ${eventType}`,
      { details: { eventType } }
    );
  }

  static configuration(message: string): FirebaseError {
    return new FirebaseError(FirebaseErrorCode.Configuration, `Configuration error: ${message}`);
  }

  /**
   * Converts the error to a JSON object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
      details: this.details,
    };
  }
}

/**
 * Type guard for FirebaseError.
 */
export function isFirebaseError(error: unknown): error is FirebaseError {
  return error instanceof FirebaseError;
}

/**
 * Wraps an unknown thrown value into an Error suitable for `cause`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Type for operation results.
 */
export type Result<T, E = FirebaseError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E = FirebaseError>(error: E): Result<never, E> {
  return { success: false, error };
}
