/**
 * One pagination cursor from a `Link` response header
 */
export interface Cursor {
  url: string;
  rel: string;
  /**
   * Whether results continue in this direction. A cursor without a
   * `results` attribute is taken to have them.
   */
  results: boolean;
  cursor?: string;
}

export interface CursorPair {
  previous?: Cursor;
  next?: Cursor;
}

const ENTRY_SEPARATOR = /,\s*(?=<)/;
const TARGET = /^\s*<([^>]*)>(.*)$/;
const ATTRIBUTE = /;\s*([A-Za-z-]+)\s*=\s*"([^"]*)"/g;

/**
 * Parse Sentry's cursor links:
 *
 * ```
 * <https://sentry.io/api/0/projects/?&cursor=100:-1:1>; rel="previous"; results="false"; cursor="100:-1:1",
 * <https://sentry.io/api/0/projects/?&cursor=100:1:0>; rel="next"; results="true"; cursor="100:1:0"
 * ```
 */
export function parseLinkHeader(value: string | null | undefined): CursorPair {
  const pair: CursorPair = {};
  if (!value) {
    return pair;
  }

  for (const entry of value.split(ENTRY_SEPARATOR)) {
    const match = TARGET.exec(entry);
    if (!match) {
      continue;
    }

    const [, url, rest] = match;
    const attributes = new Map<string, string>();
    for (const [, name, attributeValue] of rest.matchAll(ATTRIBUTE)) {
      attributes.set(name.toLowerCase(), attributeValue);
    }

    const rel = attributes.get('rel');
    if (rel !== 'previous' && rel !== 'next') {
      continue;
    }

    pair[rel] = {
      url,
      rel,
      results: attributes.get('results') !== 'false',
      cursor: attributes.get('cursor'),
    };
  }

  return pair;
}
