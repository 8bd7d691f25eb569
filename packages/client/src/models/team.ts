import { z } from 'zod';
import { slugReferenceSchema } from '../schemas/index.js';
import { BaseModel } from './base.js';

export class Team extends BaseModel {
  get slug(): string {
    return this.read('slug', z.string());
  }

  get name(): string {
    return this.read('name', z.string());
  }

  /**
   * From the `organizationSlug` extra field when given, otherwise from
   * the embedded `organization` reference
   */
  get organizationSlug(): string {
    if (Object.hasOwn(this.extraFields, 'organizationSlug')) {
      return this.readExtra('organizationSlug', z.string());
    }
    return this.read('organization', slugReferenceSchema).slug;
  }

  async delete(): Promise<void> {
    await this.transceiver.delete(
      `teams/${encodeURIComponent(this.organizationSlug)}/${encodeURIComponent(this.slug)}/`,
    );
  }
}
