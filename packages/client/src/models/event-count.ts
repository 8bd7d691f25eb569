import { z } from 'zod';
import { BaseModel } from './base.js';

/**
 * One bucket of a project's event count series
 */
export class EventCount extends BaseModel {
  /**
   * Bucket start, seconds since epoch
   */
  get timestamp(): number {
    return this.read('timestamp', z.number());
  }

  get count(): number {
    return this.read('count', z.number());
  }

  get date(): Date {
    return new Date(this.timestamp * 1000);
  }
}
