export { MissingAttributeError } from './attribute.js';
export { SentryClientError } from './base.js';
export {
  AuthenticationError,
  AuthorizationError,
  BadRequestError,
  HttpError,
  type HttpErrorBody,
  NotFoundError,
  RateLimitError,
  ServerError,
} from './http.js';
export { TransportError } from './transport.js';
export { ValidationError } from './validation.js';
