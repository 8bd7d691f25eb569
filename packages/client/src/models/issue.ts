import { z } from 'zod';
import { BaseModel } from './base.js';
import { Event } from './event.js';

/**
 * Issue of a project. Materialized with an `organizationSlug` extra field,
 * which issue payloads do not carry but the events endpoint needs.
 */
export class Issue extends BaseModel {
  get id(): string {
    return this.read('id', z.string());
  }

  get title(): string {
    return this.read('title', z.string());
  }

  get organizationSlug(): string {
    return this.readExtra('organizationSlug', z.string());
  }

  /**
   * Events of this issue, newest first
   */
  events(): AsyncGenerator<Event> {
    const endpoint = `organizations/${encodeURIComponent(this.organizationSlug)}/issues/${encodeURIComponent(this.id)}/events/`;
    return this.transceiver.paginateGet(endpoint, { model: Event });
  }
}
