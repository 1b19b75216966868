/**
 * @file Error Classes
 *
 * Error hierarchy for the replica client. Construction-time errors
 * ({@link InvalidPathError}, {@link InvalidQueryError}) are thrown at the call
 * site. Everything that goes wrong while a session is live ends up as the
 * `error` of a terminal change event instead of being thrown.
 *
 * @example
 * ```typescript
 * for await (const event of handle.events()) {
 *   if (event.kind === 'fault' && event.error instanceof ConnectionError) {
 *     console.log('gave up reconnecting:', event.error.message)
 *   }
 * }
 * ```
 *
 * @module rtdb-replica/errors
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for every error raised by this package.
 *
 * @example
 * ```typescript
 * if (error instanceof RtdbError && error.retryable) {
 *   scheduleRetry()
 * }
 * ```
 */
export class RtdbError extends Error {
  /** The original cause of this error, if any */
  override readonly cause?: Error

  /** Whether retrying the same operation may succeed */
  readonly retryable: boolean

  constructor(message: string, options?: { cause?: Error; retryable?: boolean }) {
    super(message)
    this.name = 'RtdbError'
    this.cause = options?.cause
    this.retryable = options?.retryable ?? false

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

// =============================================================================
// Construction-Time Errors
// =============================================================================

/**
 * Thrown when a string cannot be parsed into a {@link Path}, or a segment is
 * not a valid key.
 */
export class InvalidPathError extends RtdbError {
  /** The rejected input */
  readonly input: string

  constructor(message: string, input: string) {
    super(message)
    this.name = 'InvalidPathError'
    this.input = input
  }
}

/**
 * Thrown by `QueryBuilder.build()` when constraints conflict or a value is
 * outside the domain of the chosen ordering.
 *
 * @example
 * ```typescript
 * try {
 *   query().orderByKey().orderByValue().build()
 * } catch (error) {
 *   if (error instanceof InvalidQueryError) {
 *     console.log(error.fields) // ['orderByKey', 'orderByValue']
 *   }
 * }
 * ```
 */
export class InvalidQueryError extends RtdbError {
  /** Names of the builder fields involved in the conflict */
  readonly fields: readonly string[]

  constructor(message: string, fields: readonly string[]) {
    super(message)
    this.name = 'InvalidQueryError'
    this.fields = Object.freeze([...fields])
  }
}

/**
 * Thrown when a value cannot be represented as a tree value.
 */
export class InvalidValueError extends RtdbError {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidValueError'
  }
}

/**
 * Thrown when client configuration fails validation.
 */
export class InvalidConfigError extends RtdbError {
  /** Dotted paths of the offending configuration fields */
  readonly fields: readonly string[]

  constructor(message: string, fields: readonly string[]) {
    super(message)
    this.name = 'InvalidConfigError'
    this.fields = Object.freeze([...fields])
  }
}

// =============================================================================
// Stream Errors
// =============================================================================

/**
 * A completed frame could not be decoded (bad UTF-8 or bad JSON).
 */
export class MalformedFrameError extends RtdbError {
  /** The event name of the frame, when one was read */
  readonly event?: string

  /** The undecodable data text, when available */
  readonly raw?: string

  constructor(message: string, options?: { event?: string; raw?: string; cause?: Error }) {
    super(message, { cause: options?.cause })
    this.name = 'MalformedFrameError'
    this.event = options?.event
    this.raw = options?.raw
  }
}

/**
 * A well-formed frame arrived that the protocol does not allow at this point,
 * or its payload has the wrong shape.
 */
export class ProtocolViolationError extends RtdbError {
  /** The event name of the offending frame */
  readonly event?: string

  constructor(message: string, options?: { event?: string; cause?: Error }) {
    super(message, { cause: options?.cause })
    this.name = 'ProtocolViolationError'
    this.event = options?.event
  }
}

// =============================================================================
// Auth Errors
// =============================================================================

/**
 * The credential accessor could not produce a fresh token.
 */
export class AuthFailureError extends RtdbError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, { cause: options?.cause })
    this.name = 'AuthFailureError'
  }
}

/**
 * The server revoked read access to the subscribed location.
 */
export class AccessRevokedError extends RtdbError {
  /** Reason text sent by the server, if any */
  readonly reason?: string

  constructor(message: string, options?: { reason?: string; cause?: Error }) {
    super(message, { cause: options?.cause })
    this.name = 'AccessRevokedError'
    this.reason = options?.reason
  }
}

// =============================================================================
// Connection Errors
// =============================================================================

/**
 * Transient I/O failure: the connection could not be opened, dropped, or
 * went idle.
 */
export class ConnectionError extends RtdbError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, { cause: options?.cause, retryable: true })
    this.name = 'ConnectionError'
  }
}

/**
 * The streaming request was answered with a non-2xx status.
 *
 * 429 and 5xx responses are retryable.
 */
export class HttpStatusError extends RtdbError {
  /** The HTTP status code */
  readonly status: number

  /** The HTTP status text */
  readonly statusText: string

  constructor(status: number, statusText: string, url?: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}${url ? ` from ${url}` : ''}`, {
      retryable: status === 429 || status >= 500,
    })
    this.name = 'HttpStatusError'
    this.status = status
    this.statusText = statusText
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Wraps any thrown value in an {@link RtdbError}.
 *
 * Errors that are already part of the hierarchy pass through untouched;
 * anything else becomes a {@link ConnectionError}, since foreign errors raised
 * while a stream is live come from the I/O layer.
 */
export function toRtdbError(error: unknown): RtdbError {
  if (error instanceof RtdbError) {
    return error
  }
  if (error instanceof Error) {
    return new ConnectionError(error.message, { cause: error })
  }
  return new ConnectionError(String(error))
}

/**
 * Whether a session that failed with `error` may be replaced by a fresh one.
 *
 * Connection failures and stream corruption are recoverable by a full
 * resync. Auth failures and revoked access are not: retrying would repeat
 * the same denial.
 */
export function isRecoverableError(error: unknown): boolean {
  return (
    error instanceof ConnectionError ||
    error instanceof MalformedFrameError ||
    error instanceof ProtocolViolationError ||
    (error instanceof HttpStatusError && error.retryable)
  )
}
