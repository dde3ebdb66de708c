/**
 * Record extractors turning nested source payloads into flat records
 *
 * Each extractor:
 * - Takes an untyped payload as returned by the source
 * - Returns flat records with a fixed key set
 * - Defaults missing fields to null instead of throwing
 */

import type { IssueEffortRecord, MetricRecord, WorklogRecord } from '../schemas/index.js';
import type { RecordExtractor } from './types.js';
import { extractWorklogRecords } from './jira.js';
import { extractIssueEfforts, extractMetricHistory } from './sonarqube.js';

export * from './types.js';
export * from './utils.js';
export * from './jira.js';
export * from './sonarqube.js';

export const worklogExtractor: RecordExtractor<WorklogRecord> = {
  source: 'jira',
  extract: extractWorklogRecords,
};

export const metricHistoryExtractor: RecordExtractor<MetricRecord> = {
  source: 'sonarqube',
  extract: extractMetricHistory,
};

/**
 * Issue-effort extractor bound to the project the payload was fetched for
 */
export function issueEffortExtractor(projectKey: string): RecordExtractor<IssueEffortRecord> {
  return {
    source: 'sonarqube',
    extract: (payload) => extractIssueEfforts(payload, projectKey),
  };
}
