import type { z } from 'zod';
import type {
  eventResolutionSchema,
  tagSchema,
} from '../schemas/common.js';

/**
 * Any value JSON can carry
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Raw JSON object backing one model instance
 */
export type Document = Readonly<Record<string, JsonValue>>;

/**
 * Values the caller supplies at construction that are absent from
 * the document itself (e.g. a parent organization slug)
 */
export type ExtraFields = Readonly<Record<string, JsonValue>>;

/**
 * Query string parameters; `undefined` entries are skipped
 */
export type QueryParams = Readonly<
  Record<string, string | number | boolean | undefined>
>;

/**
 * Timespan used to aggregate project event counts
 */
export type EventResolution = z.infer<typeof eventResolutionSchema>;

/**
 * One `{ key, value }` entry of an event's tag list
 */
export type Tag = z.infer<typeof tagSchema>;

/**
 * List options for a project's issues endpoint
 */
export interface ListIssuesOptions {
  /**
   * Sentry search query, e.g. `is:unresolved`
   */
  query?: string;
  statsPeriod?: string;
}
