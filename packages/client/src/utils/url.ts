import type { QueryParams } from '../types/index.js';

/**
 * Ensure a base URL ends in `/` so relative endpoints append to it
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
}

const ABSOLUTE_URL = /^[a-z][a-z\d+.-]*:/i;

/**
 * Resolve an endpoint (absolute, or relative to `baseUrl`) and append
 * query parameters to whatever query it already carries.
 *
 * Leading slashes on a relative endpoint are dropped: `/projects/` is
 * resolved under the base path, not against the host root.
 */
export function resolveUrl(
  endpoint: string,
  baseUrl: string,
  params: QueryParams = {},
): string {
  const relative = ABSOLUTE_URL.test(endpoint)
    ? endpoint
    : endpoint.replace(/^\/+/, '');
  const url = new URL(relative, baseUrl);

  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.append(key, String(value));
    }
  }

  return url.toString();
}
