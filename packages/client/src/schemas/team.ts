import { z } from 'zod';

/**
 * Create team request schema; Sentry derives whichever of the two is missing
 */
export const createTeamSchema = z
  .object({
    name: z.string().min(1).optional(),
    slug: z.string().min(1).optional(),
  })
  .refine((input) => input.name !== undefined || input.slug !== undefined, {
    message: 'Either name or slug is required',
  });
