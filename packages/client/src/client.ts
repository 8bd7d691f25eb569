import type { ClientConfig } from './config.js';
import { Organization, Project, Team } from './models/index.js';
import { Transceiver } from './transceiver.js';

/**
 * Main Sentry API client
 *
 * @example
 * ```typescript
 * const sentry = new SentryClient({ token: 'your-api-token' });
 *
 * // Walk every project the token can see
 * for await (const project of sentry.projects()) {
 *   console.log(project.slug);
 * }
 *
 * // Events of every issue of one project
 * const project = await sentry.project('acme', 'backend');
 * for await (const issue of project.issues()) {
 *   for await (const event of issue.events()) {
 *     console.log(event.tags);
 *   }
 * }
 * ```
 */
export class SentryClient {
  /**
   * Transceiver every model created by this client shares
   */
  public readonly transceiver: Transceiver;

  /**
   * Create a new Sentry API client
   *
   * @param config - Client configuration
   */
  constructor(config: ClientConfig) {
    this.transceiver = new Transceiver(config);
  }

  organization(organizationSlug: string): Promise<Organization> {
    return this.transceiver.get(
      `organizations/${encodeURIComponent(organizationSlug)}/`,
      { model: Organization },
    );
  }

  project(organizationSlug: string, projectSlug: string): Promise<Project> {
    return this.transceiver.get(
      `projects/${encodeURIComponent(organizationSlug)}/${encodeURIComponent(projectSlug)}/`,
      { model: Project },
    );
  }

  /**
   * Every project the token has access to
   */
  projects(): AsyncGenerator<Project> {
    return this.transceiver.paginateGet('projects/', { model: Project });
  }

  team(organizationSlug: string, teamSlug: string): Promise<Team> {
    return this.transceiver.get(
      `teams/${encodeURIComponent(organizationSlug)}/${encodeURIComponent(teamSlug)}/`,
      { model: Team, extraFields: { organizationSlug } },
    );
  }
}
