import { HttpResponse, http } from 'msw';
import { beforeEach, describe, expect, it } from 'vitest';
import { ServerError, ValidationError } from '../../src/errors/index.js';
import { Project } from '../../src/models/index.js';
import { Transceiver } from '../../src/transceiver.js';
import { BASE_URL, cursorLinks } from '../mocks/handlers.js';
import { server } from '../setup.js';

const PROJECTS_URL = `${BASE_URL}/projects/`;

function project(id: string) {
  return { id, slug: `project-${id}`, organization: { slug: 'acme' } };
}

/**
 * Three pages of sizes 2, 2 and 1 behind cursors 100:1:0 and 100:2:0
 */
function useThreePages(requests: string[], failOnCursor?: string) {
  server.use(
    http.get(PROJECTS_URL, ({ request }) => {
      requests.push(request.url);
      const cursor = new URL(request.url).searchParams.get('cursor');

      if (cursor !== null && cursor === failOnCursor) {
        return HttpResponse.json({ detail: 'Internal error' }, { status: 500 });
      }
      if (cursor === null) {
        return HttpResponse.json([project('1'), project('2')], {
          headers: { Link: cursorLinks(PROJECTS_URL, '100:1:0', true) },
        });
      }
      if (cursor === '100:1:0') {
        return HttpResponse.json([project('3'), project('4')], {
          headers: { Link: cursorLinks(PROJECTS_URL, '100:2:0', true) },
        });
      }
      return HttpResponse.json([project('5')], {
        headers: { Link: cursorLinks(PROJECTS_URL, '100:3:0', false) },
      });
    }),
  );
}

describe('Pagination', () => {
  let transceiver: Transceiver;

  beforeEach(() => {
    transceiver = new Transceiver({ token: 'test-token' });
  });

  describe('Cursor following', () => {
    it('should yield every element across pages in order', async () => {
      const requests: string[] = [];
      useThreePages(requests);

      const ids: string[] = [];
      for await (const item of transceiver.paginateGet(PROJECTS_URL, {
        model: Project,
      })) {
        expect(item).toBeInstanceOf(Project);
        ids.push(String(item.get('id')));
      }

      expect(ids).toEqual(['1', '2', '3', '4', '5']);
      expect(requests).toEqual([
        'https://sentry.io/api/0/projects/',
        'https://sentry.io/api/0/projects/?&cursor=100:1:0',
        'https://sentry.io/api/0/projects/?&cursor=100:2:0',
      ]);
    });

    it('should issue one request for a single page without more results', async () => {
      const requests: string[] = [];
      server.use(
        http.get(PROJECTS_URL, ({ request }) => {
          requests.push(request.url);
          return HttpResponse.json([project('1'), project('2')], {
            headers: { Link: cursorLinks(PROJECTS_URL, '100:1:0', false) },
          });
        }),
      );

      const slugs: string[] = [];
      for await (const item of transceiver.paginateGet('projects/', {
        model: Project,
      })) {
        slugs.push(item.slug);
      }

      expect(slugs).toEqual(['project-1', 'project-2']);
      expect(requests).toHaveLength(1);
    });

    it('should stop at an empty page even if the cursor claims more', async () => {
      const requests: string[] = [];
      server.use(
        http.get(PROJECTS_URL, ({ request }) => {
          requests.push(request.url);
          return HttpResponse.json([], {
            headers: { Link: cursorLinks(PROJECTS_URL, '100:1:0', true) },
          });
        }),
      );

      const items = [];
      for await (const item of transceiver.paginateGet('projects/')) {
        items.push(item);
      }

      expect(items).toEqual([]);
      expect(requests).toHaveLength(1);
    });

    it('should stop when the response has no Link header', async () => {
      const requests: string[] = [];
      server.use(
        http.get(PROJECTS_URL, ({ request }) => {
          requests.push(request.url);
          return HttpResponse.json([project('1')]);
        }),
      );

      const items = [];
      for await (const item of transceiver.paginateGet('projects/')) {
        items.push(item);
      }

      expect(items).toHaveLength(1);
      expect(requests).toHaveLength(1);
    });

    it('should send params on the first request only', async () => {
      const requests: string[] = [];
      useThreePages(requests);

      const items = [];
      for await (const item of transceiver.paginateGet('projects/', {
        params: { query: 'platform:node' },
      })) {
        items.push(item);
      }

      expect(items).toHaveLength(5);
      expect(new URL(requests[0]).searchParams.get('query')).toBe(
        'platform:node',
      );
      expect(new URL(requests[1]).searchParams.has('query')).toBe(false);
      expect(new URL(requests[2]).searchParams.has('query')).toBe(false);
    });

    it('should yield raw JSON without a model', async () => {
      const requests: string[] = [];
      useThreePages(requests);

      const items = [];
      for await (const item of transceiver.paginateGet('projects/')) {
        items.push(item);
      }

      expect(items[0]).toEqual(project('1'));
      expect(items[4]).toEqual(project('5'));
    });

    it('should hand extra fields to every element', async () => {
      const requests: string[] = [];
      useThreePages(requests);

      const markers = [];
      for await (const item of transceiver.paginateGet('projects/', {
        model: Project,
        extraFields: { source: 'listing' },
      })) {
        markers.push(item.getExtra('source'));
      }

      expect(markers).toEqual([
        'listing',
        'listing',
        'listing',
        'listing',
        'listing',
      ]);
    });
  });

  describe('Laziness', () => {
    it('should not request anything until iteration starts', () => {
      const requests: string[] = [];
      useThreePages(requests);

      transceiver.paginateGet('projects/', { model: Project });

      expect(requests).toHaveLength(0);
    });

    it('should fetch the next page only once the current one is consumed', async () => {
      const requests: string[] = [];
      useThreePages(requests);

      const iterator = transceiver.paginateGet('projects/', { model: Project });

      await iterator.next();
      expect(requests).toHaveLength(1);
      await iterator.next();
      expect(requests).toHaveLength(1);

      const third = await iterator.next();
      expect(requests).toHaveLength(2);
      expect(third.done).toBe(false);
    });

    it('should not fetch further pages after the consumer stops', async () => {
      const requests: string[] = [];
      useThreePages(requests);

      for await (const item of transceiver.paginateGet('projects/', {
        model: Project,
      })) {
        expect(item.get('id')).toBe('1');
        break;
      }

      expect(requests).toHaveLength(1);
    });

    it('should start over from the first page on every call', async () => {
      const requests: string[] = [];
      useThreePages(requests);

      for (let run = 0; run < 2; run++) {
        const ids: string[] = [];
        for await (const item of transceiver.paginateGet('projects/', {
          model: Project,
        })) {
          ids.push(item.slug);
        }
        expect(ids).toHaveLength(5);
      }

      expect(requests).toHaveLength(6);
      expect(requests[3]).toBe('https://sentry.io/api/0/projects/');
    });

    it('should be exhausted after one pass', async () => {
      const requests: string[] = [];
      useThreePages(requests);

      const iterator = transceiver.paginateGet('projects/', { model: Project });
      for await (const _item of iterator) {
        // drain
      }

      expect((await iterator.next()).done).toBe(true);
      expect(requests).toHaveLength(3);
    });
  });

  describe('Errors', () => {
    it('should surface a failing page after yielding earlier ones', async () => {
      const requests: string[] = [];
      useThreePages(requests, '100:1:0');

      const ids: string[] = [];
      const error = await (async () => {
        for await (const item of transceiver.paginateGet('projects/', {
          model: Project,
        })) {
          ids.push(item.slug);
        }
      })().catch((e) => e);

      expect(ids).toEqual(['project-1', 'project-2']);
      expect(error).toBeInstanceOf(ServerError);
      expect(error.status).toBe(500);
      expect(error.body).toEqual({ detail: 'Internal error' });
    });

    it('should refuse a next cursor on another origin', async () => {
      const requests: string[] = [];
      server.use(
        http.get(PROJECTS_URL, ({ request }) => {
          requests.push(request.url);
          return HttpResponse.json([project('1')], {
            headers: {
              Link: '<https://elsewhere.example.com/api/0/projects/?&cursor=100:1:0>; rel="next"; results="true"; cursor="100:1:0"',
            },
          });
        }),
      );

      const ids: string[] = [];
      const error = await (async () => {
        for await (const item of transceiver.paginateGet('projects/', {
          model: Project,
        })) {
          ids.push(item.slug);
        }
      })().catch((e) => e);

      expect(ids).toEqual(['project-1']);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe(
        'Pagination cursor leaves https://sentry.io: https://elsewhere.example.com/api/0/projects/?&cursor=100:1:0',
      );
      expect(requests).toEqual(['https://sentry.io/api/0/projects/']);
    });

    it('should reject a page body that is not an array', async () => {
      server.use(
        http.get(PROJECTS_URL, () => {
          return HttpResponse.json({ items: [] });
        }),
      );

      const iterator = transceiver.paginateGet('projects/');

      await expect(iterator.next()).rejects.toThrow(ValidationError);
    });
  });
});
