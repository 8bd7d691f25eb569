import type { ZodError } from 'zod';
import { SentryClientError } from './base.js';

/**
 * Data crossing the client boundary had the wrong shape: a Sentry body
 * that is not JSON or not the object/array an operation expects, a
 * pagination cursor pointing at another origin, an invalid team payload,
 * or a model attribute read through a typed getter.
 */
export class ValidationError extends SentryClientError {
  /**
   * Zod issues, when a schema rejected the value
   */
  public readonly validationErrors?: ZodError;

  constructor(message: string, validationErrors?: ZodError) {
    super(message, { retryable: false });
    this.validationErrors = validationErrors;
  }

  /**
   * Message followed by each zod issue as `path: message`
   */
  public getValidationDetails(): string {
    if (!this.validationErrors) {
      return this.message;
    }

    const errors = this.validationErrors.issues
      .map((err) => `${err.path.map(String).join('.')}: ${err.message}`)
      .join(', ');

    return `${this.message} - ${errors}`;
  }
}
