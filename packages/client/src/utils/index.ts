export {
  createKyInstance,
  readResponseText,
  transformHttpError,
} from './http.js';
export { type Cursor, type CursorPair, parseLinkHeader } from './link-header.js';
export { normalizeBaseUrl, resolveUrl } from './url.js';
export { validate } from './validate.js';
