/**
 * Base error class for all nats-box errors
 */
export class NatsBoxError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Connection-related errors.
 * - ConnectionError.failed() - Initial connection failure
 * - ConnectionError.closed() - Connection closed and will not come back
 * - ConnectionError.auth() - Credentials unreadable or rejected
 * - ConnectionError.server() - Server refused an operation asynchronously
 */
export class ConnectionError extends NatsBoxError {
  private constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
  }

  static failed(message: string, details?: Record<string, unknown>): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:FAILED', details);
  }

  static closed(message: string, details?: Record<string, unknown>): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:CLOSED', details);
  }

  static auth(message: string, details?: Record<string, unknown>): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:AUTH', details);
  }

  static server(message: string, details?: Record<string, unknown>): ConnectionError {
    return new ConnectionError(message, 'CONNECTION_ERROR:SERVER', details);
  }
}

/**
 * Request/reply errors.
 * - RequestError.timeout() - No reply within the timeout
 * - RequestError.noResponders() - Nobody is listening on the subject
 * - RequestError.failed() - Any other client failure
 */
export class RequestError extends NatsBoxError {
  private constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
  }

  static timeout(details?: Record<string, unknown>): RequestError {
    return new RequestError('timeout for request', 'REQUEST_ERROR:TIMEOUT', details);
  }

  static noResponders(details?: Record<string, unknown>): RequestError {
    return new RequestError('no responders for request', 'REQUEST_ERROR:NO_RESPONDERS', details);
  }

  static failed(reason: string, details?: Record<string, unknown>): RequestError {
    return new RequestError(`${reason} for request`, 'REQUEST_ERROR:FAILED', details);
  }
}

/**
 * Publish-related errors
 * - PublishError.flushFailed() - Server did not acknowledge the flush
 */
export class PublishError extends NatsBoxError {
  private constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
  }

  static flushFailed(message: string, details?: Record<string, unknown>): PublishError {
    return new PublishError(message, 'PUBLISH_ERROR:FLUSH_FAILED', details);
  }
}

/**
 * Command line usage errors.
 * - UsageError.unknownFlag() - Flag is not defined
 * - UsageError.missingValue() - String flag given without a value
 * - UsageError.invalidValue() - Boolean flag given a non-boolean value
 * - UsageError.badSyntax() - Argument looks like a flag but is malformed
 */
export class UsageError extends NatsBoxError {
  private constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
  }

  static badSyntax(arg: string): UsageError {
    return new UsageError(`bad flag syntax: ${arg}`, 'USAGE_ERROR:BAD_SYNTAX', { arg });
  }

  static unknownFlag(flag: string): UsageError {
    return new UsageError(`flag provided but not defined: -${flag}`, 'USAGE_ERROR:UNKNOWN_FLAG', {
      flag,
    });
  }

  static missingValue(flag: string): UsageError {
    return new UsageError(`flag needs an argument: -${flag}`, 'USAGE_ERROR:MISSING_VALUE', {
      flag,
    });
  }

  static invalidValue(flag: string, value: string): UsageError {
    return new UsageError(
      `invalid boolean value "${value}" for -${flag}`,
      'USAGE_ERROR:INVALID_VALUE',
      { flag, value }
    );
  }
}

/**
 * Best-effort message for anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Coerce anything thrown into an Error for logging
 */
export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
