import type { JsonValue } from '../types/index.js';
import { SentryClientError } from './base.js';

/**
 * Parsed body of a failed response: JSON when it parses,
 * raw text otherwise, `null` when empty
 */
export type HttpErrorBody = JsonValue;

/**
 * Non-2xx response from the API
 */
export class HttpError extends SentryClientError {
  public readonly status: number;

  public readonly body: HttpErrorBody;

  constructor(
    message: string,
    status: number,
    body: HttpErrorBody = null,
    retryable = false,
  ) {
    super(message, { retryable, statusCode: status });
    this.status = status;
    this.body = body;
  }
}

/**
 * Bad request error (400)
 */
export class BadRequestError extends HttpError {
  constructor(message: string, body?: HttpErrorBody) {
    super(message, 400, body);
  }
}

/**
 * Authentication error (401 Unauthorized)
 * Requires a new token
 */
export class AuthenticationError extends HttpError {
  constructor(message = 'Authentication failed', body?: HttpErrorBody) {
    super(message, 401, body);
  }
}

/**
 * Authorization error (403 Forbidden)
 * The token lacks the required scope
 */
export class AuthorizationError extends HttpError {
  constructor(message = 'Insufficient permissions', body?: HttpErrorBody) {
    super(message, 403, body);
  }
}

/**
 * Not found error (404 Not Found)
 */
export class NotFoundError extends HttpError {
  constructor(message: string, body?: HttpErrorBody) {
    super(message, 404, body);
  }
}

/**
 * Rate limit error (429 Too Many Requests)
 */
export class RateLimitError extends HttpError {
  /**
   * Number of seconds to wait before retrying (from Retry-After header)
   */
  public readonly retryAfter?: number;

  constructor(
    message = 'Rate limit exceeded',
    body?: HttpErrorBody,
    retryAfter?: string | number,
  ) {
    super(message, 429, body, true);

    if (retryAfter !== undefined) {
      this.retryAfter =
        typeof retryAfter === 'string' ? parseInt(retryAfter, 10) : retryAfter;
    }
  }
}

/**
 * Server error (500+)
 */
export class ServerError extends HttpError {
  constructor(message: string, statusCode = 500, body?: HttpErrorBody) {
    super(message, statusCode, body, true);
  }
}
