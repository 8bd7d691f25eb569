import { z } from 'zod';
import { tagSchema } from '../schemas/index.js';
import { BaseModel } from './base.js';

export class Event extends BaseModel {
  /**
   * Event tags as a `key -> value` mapping
   */
  get tags(): Record<string, string> {
    const tags = this.read('tags', z.array(tagSchema));
    return Object.fromEntries(tags.map((tag) => [tag.key, tag.value]));
  }
}
