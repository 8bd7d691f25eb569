import { z } from 'zod';
import {
  eventCountsSchema,
  eventResolutionSchema,
  slugReferenceSchema,
} from '../schemas/index.js';
import type { EventResolution, ListIssuesOptions } from '../types/index.js';
import { validate } from '../utils/index.js';
import { BaseModel } from './base.js';
import { EventCount } from './event-count.js';
import { Issue } from './issue.js';
import { TagValue } from './tag-value.js';

export class Project extends BaseModel {
  /**
   * Timespans the stats endpoint aggregates event counts by
   */
  static readonly EventResolution = {
    SECONDS: '10s',
    HOUR: '1h',
    DAY: '1d',
  } as const satisfies Record<string, EventResolution>;

  get slug(): string {
    return this.read('slug', z.string());
  }

  get name(): string {
    return this.read('name', z.string());
  }

  get organizationSlug(): string {
    return this.read('organization', slugReferenceSchema).slug;
  }

  private get endpoint(): string {
    return `projects/${encodeURIComponent(this.organizationSlug)}/${encodeURIComponent(this.slug)}/`;
  }

  issues(options?: ListIssuesOptions): AsyncGenerator<Issue> {
    return this.transceiver.paginateGet(`${this.endpoint}issues/`, {
      params: { query: options?.query, statsPeriod: options?.statsPeriod },
      model: Issue,
      extraFields: { organizationSlug: this.organizationSlug },
    });
  }

  /**
   * Event counts of this project over time
   *
   * @see https://docs.sentry.io/api/projects/retrieve-event-counts-for-a-project/
   */
  async eventCounts(resolution?: EventResolution): Promise<EventCount[]> {
    const params =
      resolution === undefined
        ? {}
        : { resolution: validate(resolution, eventResolutionSchema) };
    const body = await this.transceiver.get(`${this.endpoint}stats/`, {
      params,
    });

    return validate(body, eventCountsSchema).map(([timestamp, count]) =>
      this.transceiver.materialize({ timestamp, count }, EventCount),
    );
  }

  /**
   * Values seen for one tag key across this project's events
   */
  tagValues(key: string): AsyncGenerator<TagValue> {
    return this.transceiver.paginateGet(
      `${this.endpoint}tags/${encodeURIComponent(key)}/values/`,
      { model: TagValue },
    );
  }
}
