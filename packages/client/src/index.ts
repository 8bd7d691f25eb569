/**
 * sentry-api-client - TypeScript client for the Sentry web API
 *
 * Typed models over Sentry's JSON, cursor pagination as async iteration.
 *
 * @packageDocumentation
 */

// Main client
export { SentryClient } from './client.js';
// Configuration
export { type ClientConfig, DEFAULT_BASE_URL, type Logger } from './config.js';
// Errors
export {
  AuthenticationError,
  AuthorizationError,
  BadRequestError,
  HttpError,
  type HttpErrorBody,
  MissingAttributeError,
  NotFoundError,
  RateLimitError,
  SentryClientError,
  ServerError,
  TransportError,
  ValidationError,
} from './errors/index.js';
// Models
export {
  BaseModel,
  Event,
  EventCount,
  Issue,
  type ModelConstructor,
  Organization,
  Project,
  TagValue,
  Team,
} from './models/index.js';
export {
  type ModelRequestOptions,
  type RequestOptions,
  Transceiver,
} from './transceiver.js';
// Types
export type {
  CreateTeam,
  Document,
  EventResolution,
  ExtraFields,
  JsonValue,
  ListIssuesOptions,
  QueryParams,
  Tag,
} from './types/index.js';
export { type Cursor, type CursorPair, parseLinkHeader } from './utils/index.js';
