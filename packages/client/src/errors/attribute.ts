import { SentryClientError } from './base.js';

/**
 * A model was asked for a key its document (or its extra fields) lacks
 */
export class MissingAttributeError extends SentryClientError {
  public readonly key: string;

  public readonly model: string;

  constructor(model: string, key: string) {
    super(`${model} has no attribute '${key}'`);
    this.model = model;
    this.key = key;
  }
}
