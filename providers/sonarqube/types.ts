/**
 * SonarQube provider configuration and query types
 */

import type { ResolvedSonarQubeConfig } from '../../src/config.js';
import type { Logger } from '../../src/logger.js';
import type { SonarQueryKind, TrackedProject, Window } from '../../schemas/index.js';

export interface SonarQueryOptions {
  config: ResolvedSonarQubeConfig;
  project: TrackedProject;
  window: Window;
  kind: SonarQueryKind;
  timeoutMs: number;
  logger: Logger;
}

/** Query kinds in the order they are run for each project */
export const SONAR_QUERY_KINDS: readonly SonarQueryKind[] = ['measures', 'metricsHistory', 'issuesDetailed'];

/** Issue statuses counted as open */
export const OPEN_ISSUE_STATUSES = 'OPEN,CONFIRMED,REOPENED';

/**
 * Combined history payload: one search per metric, keyed by metric name
 */
export interface MetricsHistoryPayload {
  project: TrackedProject;
  metrics_history: Record<string, unknown[]>;
}
