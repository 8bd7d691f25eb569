export {
  apiErrorSchema,
  documentSchema,
  eventCountsSchema,
  eventResolutionSchema,
  jsonValueSchema,
  pageSchema,
  slugReferenceSchema,
  tagSchema,
} from './common.js';
export { createTeamSchema } from './team.js';
