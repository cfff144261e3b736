/**
 * Custom error classes and error handling utilities
 */

import { randomUUID } from 'node:crypto';

/**
 * Base error class for all custom errors
 */
export class BaseError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly id: string;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
    this.id = randomUUID();
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Login to a service failed after exhausting the login retry policy.
 * Fatal for every task that depends on the service.
 */
export class AuthenticationError extends BaseError {
  constructor(
    public readonly serviceId: string,
    message: string,
    public readonly attempts?: number
  ) {
    super(`Authentication failed for ${serviceId}: ${message}`, { serviceId, attempts });
  }
}

/**
 * The outbound proxy rejected its BASIC credentials. Configuration error, never retried.
 */
export class ProxyAuthenticationError extends BaseError {
  constructor(
    message: string,
    public readonly proxyUrl?: string
  ) {
    super(`Proxy authentication failed: ${message}`, { proxyUrl });
  }
}

/**
 * A request came back 401/403 (or the collaborator saw a login page) while using a
 * session that was believed valid.
 */
export class SessionExpiredError extends BaseError {
  constructor(
    public readonly serviceId: string,
    public readonly statusCode?: number
  ) {
    super(`Session expired for ${serviceId}`, { serviceId, statusCode });
  }
}

/**
 * A persisted session record could not be decrypted or parsed
 */
export class SessionCorruptionError extends BaseError {
  constructor(
    public readonly serviceId: string,
    reason: string
  ) {
    super(`Session record for ${serviceId} is corrupted: ${reason}`, { serviceId, reason });
  }
}

/**
 * Fetching an entity's sub-records failed after exhausting the fetch retry policy
 */
export class ConnectionError extends BaseError {
  constructor(
    public readonly locator: string,
    message: string,
    public readonly attempts?: number,
    public readonly originalError?: unknown
  ) {
    super(`Connection failed for ${locator}: ${message}`, {
      locator,
      attempts,
      originalError: describeError(originalError)
    });
  }
}

/**
 * The classifier could not produce an answer (error, timeout, unparsable reply)
 */
export class ClassificationUnavailableError extends BaseError {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(`Classification unavailable for "${key}": ${message}`, { key });
  }
}

/**
 * No tokenizer could split a label
 */
export class TokenizerUnavailableError extends BaseError {
  constructor(message: string) {
    super(`Tokenizer unavailable: ${message}`);
  }
}

/**
 * Writing a checkpoint export failed
 */
export class ExportError extends BaseError {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(`Export to ${filePath} failed: ${message}`, { filePath });
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends BaseError {
  constructor(
    message: string,
    public readonly missingFields?: string[]
  ) {
    super(`Configuration error: ${message}`, {
      missingFields
    });
  }
}

/**
 * Errors that make every task for a service pointless
 */
export function isServiceFatal(
  error: unknown
): error is AuthenticationError | ProxyAuthenticationError {
  return error instanceof AuthenticationError || error instanceof ProxyAuthenticationError;
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeError(error: unknown): string | undefined {
  if (error === undefined) {
    return undefined;
  }
  return error instanceof Error ? error.message : String(error);
}
