import { z } from 'zod';
import { BaseModel } from './base.js';

export class TagValue extends BaseModel {
  get key(): string {
    return this.read('key', z.string());
  }

  get value(): string {
    return this.read('value', z.string());
  }

  get count(): number {
    return this.read('count', z.number());
  }
}
