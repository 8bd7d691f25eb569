import type { z } from 'zod';
import type { createTeamSchema } from '../schemas/team.js';

/**
 * Request payload for creating a team
 */
export type CreateTeam = z.infer<typeof createTeamSchema>;
