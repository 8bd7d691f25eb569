import { z } from 'zod';
import type { JsonValue } from '../types/common.js';

/**
 * Any JSON value, recursively
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

/**
 * A JSON object, the shape every model wraps
 */
export const documentSchema = z.record(z.string(), jsonValueSchema);

/**
 * Body of one page of a paginated list endpoint
 */
export const pageSchema = z.array(jsonValueSchema);

/**
 * Nested `{ slug }` reference, e.g. `project.organization`
 */
export const slugReferenceSchema = z.object({ slug: z.string() });

/**
 * Event count resolution accepted by the project stats endpoint
 */
export const eventResolutionSchema = z.enum(['10s', '1h', '1d']);

/**
 * One entry of an event's `tags` list
 */
export const tagSchema = z.object({
  key: z.string(),
  value: z.string(),
});

/**
 * Project stats body: `[timestamp, count]` pairs
 */
export const eventCountsSchema = z.array(z.tuple([z.number(), z.number()]));

/**
 * API error response
 */
export const apiErrorSchema = z.object({
  detail: z.string().optional(),
  error: z.string().optional(),
  message: z.string().optional(),
});
