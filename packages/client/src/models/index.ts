export { BaseModel, type ModelConstructor } from './base.js';
export { Event } from './event.js';
export { EventCount } from './event-count.js';
export { Issue } from './issue.js';
export { Organization } from './organization.js';
export { Project } from './project.js';
export { TagValue } from './tag-value.js';
export { Team } from './team.js';
