export type {
  Document,
  EventResolution,
  ExtraFields,
  JsonValue,
  ListIssuesOptions,
  QueryParams,
  Tag,
} from './common.js';
export type { CreateTeam } from './team.js';
