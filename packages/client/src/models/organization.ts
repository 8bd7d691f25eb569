import { z } from 'zod';
import { createTeamSchema } from '../schemas/index.js';
import type { CreateTeam } from '../types/index.js';
import { validate } from '../utils/index.js';
import { BaseModel } from './base.js';
import { Project } from './project.js';
import { Team } from './team.js';

export class Organization extends BaseModel {
  get slug(): string {
    return this.read('slug', z.string());
  }

  get name(): string {
    return this.read('name', z.string());
  }

  teams(): AsyncGenerator<Team> {
    return this.transceiver.paginateGet(
      `organizations/${encodeURIComponent(this.slug)}/teams/`,
      { model: Team, extraFields: { organizationSlug: this.slug } },
    );
  }

  team(slug: string): Promise<Team> {
    return this.transceiver.get(
      `teams/${encodeURIComponent(this.slug)}/${encodeURIComponent(slug)}/`,
      { model: Team, extraFields: { organizationSlug: this.slug } },
    );
  }

  /**
   * Create a team in this organization
   * @throws {ValidationError} if neither name nor slug is given
   */
  async createTeam(input: CreateTeam): Promise<Team> {
    const validatedInput = validate(
      input,
      createTeamSchema,
      'Invalid team input',
    );

    return this.transceiver.post(
      `organizations/${encodeURIComponent(this.slug)}/teams/`,
      validatedInput,
      { model: Team, extraFields: { organizationSlug: this.slug } },
    );
  }

  project(slug: string): Promise<Project> {
    return this.transceiver.get(
      `projects/${encodeURIComponent(this.slug)}/${encodeURIComponent(slug)}/`,
      { model: Project },
    );
  }
}
