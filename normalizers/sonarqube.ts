/**
 * Flattens code-quality payloads (metric history, detailed issues)
 */

import type { IssueEffortRecord, MetricRecord } from '../schemas/index.js';
import { parseEffort } from '../src/effort.js';
import { getArray, getNumeric, getObject, getString, hasKey, normalizeToUTC } from './utils.js';

/**
 * Extract one record per history point from a combined metrics-history payload
 *
 * Payload shape: `{ project, metrics_history: { <metric>: [{ metric, history: [{ date, value }] }] } }`
 */
export function extractMetricHistory(payload: unknown): MetricRecord[] {
  const projectKey = getString(payload, 'project') ?? '';
  const history = getObject(payload, 'metrics_history');
  const records: MetricRecord[] = [];

  for (const [metricName, measures] of Object.entries(history)) {
    if (!Array.isArray(measures)) continue;
    for (const measure of measures) {
      for (const point of getArray(measure, 'history')) {
        records.push({
          projectKey,
          metricName,
          timestamp: normalizeToUTC(getString(point, 'date')),
          value: getNumeric(point, 'value'),
        });
      }
    }
  }

  return records;
}

/**
 * Extract remediation effort per issue from an issue-search payload
 *
 * Issues without `effort` or a parseable `creationDate` are skipped.
 */
export function extractIssueEfforts(payload: unknown, projectKey: string): IssueEffortRecord[] {
  const records: IssueEffortRecord[] = [];

  for (const issue of getArray(payload, 'issues')) {
    if (!hasKey(issue, 'effort') || !hasKey(issue, 'creationDate')) continue;
    const creationDate = normalizeToUTC(getString(issue, 'creationDate'));
    if (creationDate === null) continue;

    records.push({
      projectKey: getString(issue, 'project') ?? projectKey,
      issueKey: getString(issue, 'key'),
      effortMinutes: parseEffort(getString(issue, 'effort')),
      creationDate,
    });
  }

  return records;
}
