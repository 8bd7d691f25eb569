import { SentryClientError } from './base.js';

/**
 * Connection-level failure: DNS, refused connection, timeout, or a
 * connection dropped while the response body was streaming in.
 */
export class TransportError extends SentryClientError {
  constructor(message: string, cause?: Error) {
    super(message, { retryable: true, cause });
  }
}
