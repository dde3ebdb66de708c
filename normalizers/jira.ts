/**
 * Flattens issue-search payloads into one record per work-log entry
 */

import type { WorklogRecord } from '../schemas/index.js';
import { getArray, getNumeric, getObject, getString, isObject } from './utils.js';
import type { JsonObject } from './utils.js';

function toWorklogRecord(issue: unknown, worklog: unknown): WorklogRecord {
  const author = getObject(worklog, 'author');
  return {
    userName: getString(author, 'displayName'),
    userEmail: getString(author, 'emailAddress'),
    issueKey: getString(issue, 'key'),
    issueId: getString(issue, 'id'),
    worklogId: getString(worklog, 'id'),
    timeSpentSeconds: getNumeric(worklog, 'timeSpentSeconds'),
    worklogStart: getString(worklog, 'started'),
  };
}

/**
 * Attach issue-level time tracking totals to a record.
 *
 * Only the last work-log record of each issue receives the totals; consumers
 * summing `issueTimeSpentSeconds` therefore count each issue at most once.
 * The issue total never replaces the record's own `timeSpentSeconds`, so
 * per-person means are taken over logged durations only.
 */
export function attachIssueTotals(record: WorklogRecord, timetracking: JsonObject): WorklogRecord {
  return {
    ...record,
    originalEstimateSeconds: getNumeric(timetracking, 'originalEstimateSeconds'),
    remainingEstimateSeconds: getNumeric(timetracking, 'remainingEstimateSeconds'),
    issueTimeSpentSeconds: getNumeric(timetracking, 'timeSpentSeconds'),
  };
}

/**
 * Extract work-log records from an issue-search payload
 *
 * Issues without work logs produce nothing, even when they carry totals.
 */
export function extractWorklogRecords(payload: unknown): WorklogRecord[] {
  const records: WorklogRecord[] = [];

  for (const issue of getArray(payload, 'issues')) {
    const fields = getObject(issue, 'fields');
    const worklogs = getArray(getObject(fields, 'worklog'), 'worklogs');
    const issueRecords = worklogs.map((worklog) => toWorklogRecord(issue, worklog));

    const timetracking = fields.timetracking;
    const last = issueRecords.length - 1;
    if (last >= 0 && isObject(timetracking) && Object.keys(timetracking).length > 0) {
      issueRecords[last] = attachIssueTotals(issueRecords[last], timetracking);
    }

    records.push(...issueRecords);
  }

  return records;
}
