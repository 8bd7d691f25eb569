import type { ZodSchema } from 'zod';
import { MissingAttributeError } from '../errors/index.js';
import type { Transceiver } from '../transceiver.js';
import type { Document, ExtraFields, JsonValue } from '../types/index.js';
import { validate } from '../utils/index.js';

/**
 * Constructor shape every model variant shares. Only the Transceiver
 * invokes it, through {@link Transceiver.materialize}.
 */
export type ModelConstructor<M extends BaseModel> = new (
  transceiver: Transceiver,
  json: Document,
  extraFields: ExtraFields,
) => M;

/**
 * Base class for all models like {@link Project} or {@link Event}.
 *
 * Wraps the JSON document of an API response and exposes it read-only.
 * Given a response
 *
 * ```json
 * { "id": "42", "title": "...", "first seen": "..." }
 * ```
 *
 * every model resolves keys through two equivalent entry points:
 *
 * ```typescript
 * issue.get('id');
 * issue.getIndexed('first seen');
 * ```
 *
 * Variants add typed getters on top; those are re-derived from the
 * document on every access.
 */
export abstract class BaseModel {
  /**
   * The transceiver that produced this model; navigation methods route
   * every further request through it
   */
  public readonly transceiver: Transceiver;

  /**
   * Raw document from the API response, including attributes no getter covers
   */
  public readonly json: Document;

  protected readonly extraFields: ExtraFields;

  constructor(
    transceiver: Transceiver,
    json: Document,
    extraFields: ExtraFields = {},
  ) {
    this.transceiver = transceiver;
    this.json = Object.freeze({ ...json });
    this.extraFields = Object.freeze({ ...extraFields });
  }

  /**
   * Value stored under `key` in the document
   * @throws {MissingAttributeError} if the document has no such key
   */
  get(key: string): JsonValue {
    if (!Object.hasOwn(this.json, key)) {
      throw new MissingAttributeError(this.constructor.name, key);
    }
    return this.json[key];
  }

  /**
   * Same as {@link get}; reads better for keys that are not identifiers
   */
  getIndexed(key: string): JsonValue {
    return this.get(key);
  }

  has(key: string): boolean {
    return Object.hasOwn(this.json, key);
  }

  /**
   * Caller-supplied value that is not part of the document
   * @throws {MissingAttributeError} if no such extra field was given
   */
  getExtra(key: string): JsonValue {
    if (!Object.hasOwn(this.extraFields, key)) {
      throw new MissingAttributeError(this.constructor.name, key);
    }
    return this.extraFields[key];
  }

  toJSON(): Document {
    return this.json;
  }

  /**
   * {@link get} narrowed through a schema
   * @throws {ValidationError} if the value does not match
   */
  protected read<T>(key: string, schema: ZodSchema<T>): T {
    return validate(
      this.get(key),
      schema,
      `${this.constructor.name}.${key} has an unexpected shape`,
    );
  }

  protected readExtra<T>(key: string, schema: ZodSchema<T>): T {
    return validate(
      this.getExtra(key),
      schema,
      `${this.constructor.name} extra field ${key} has an unexpected shape`,
    );
  }
}
