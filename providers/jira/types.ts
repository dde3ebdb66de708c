/**
 * Jira provider configuration and API types
 */

import type { ResolvedJiraConfig } from '../../src/config.js';
import type { Logger } from '../../src/logger.js';
import type { TrackedPerson, Window } from '../../schemas/index.js';

/**
 * Options for one work-log query
 */
export interface JiraQueryOptions {
  config: ResolvedJiraConfig;
  person: TrackedPerson;
  window: Window;
  timeoutMs: number;
  logger: Logger;
}

/**
 * E-mail domains used to derive a person's tracker identity
 */
export interface EmailDomains {
  emailDomain: string;
  externalEmailDomain: string;
}
