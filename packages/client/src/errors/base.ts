/**
 * Root of every error the client throws. Catching it covers transport
 * failures, HTTP status errors, validation failures and missing model
 * attributes alike.
 */
export class SentryClientError extends Error {
  /**
   * Hint for callers with their own retry policy. The client never
   * retries on its own.
   */
  public readonly retryable: boolean;

  /**
   * Status of the Sentry response, for HTTP errors
   */
  public readonly statusCode?: number;

  /**
   * Underlying ky, fetch or stream error
   */
  public readonly cause?: Error;

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      statusCode?: number;
      cause?: Error;
    },
  ) {
    super(message);
    this.name = this.constructor.name;
    this.retryable = options?.retryable ?? false;
    this.statusCode = options?.statusCode;
    this.cause = options?.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}
