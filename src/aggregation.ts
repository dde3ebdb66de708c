/**
 * Monthly aggregation of flat records
 *
 * Groups records by (subject, UTC month) and computes one statistic per group.
 * Values that fail numeric coercion, timestamps that fail to parse and records
 * without a subject are left out; they are never counted as zero.
 */

import { InvalidArgumentError } from './errors.js';
import { coerceNumber, normalizeToUTC } from '../normalizers/utils.js';
import type { AggregateRow, HistogramBin, Statistic } from '../schemas/index.js';

/**
 * What to aggregate and how
 */
export interface AggregationSpec<T> {
  statistic: Statistic;
  /** Grouping subject; omit for an all-entities series (subject = null) */
  subjectKey?: keyof T & string;
  /** Timestamp field used for bucketing and chronological order */
  timeKey: keyof T & string;
  /** Numeric field; required by mean, sum and cumulative_sum */
  valueKey?: keyof T & string;
  /** Field whose distinct values are counted by distinct_count */
  distinctKey?: keyof T & string;
}

interface PreparedRecord {
  subject: string | null;
  bucket: string;
  time: number;
  value: number;
  distinct: string | null;
}

interface Group {
  subject: string | null;
  bucket: string;
  values: number[];
  distinct: Set<string>;
}

/**
 * Parse a timestamp to epoch milliseconds (UTC)
 */
export function parseTimestamp(timestamp: unknown): number | null {
  if (timestamp instanceof Date) {
    const time = timestamp.getTime();
    return isNaN(time) ? null : time;
  }
  if (typeof timestamp !== 'string') {
    return null;
  }
  const normalized = normalizeToUTC(timestamp);
  if (normalized === null) {
    return null;
  }
  const time = Date.parse(normalized);
  return isNaN(time) ? null : time;
}

/**
 * Truncate a timestamp to its UTC month
 *
 * @returns "YYYY-MM", or null when the timestamp does not parse
 */
export function toMonthBucket(timestamp: unknown): string | null {
  const time = parseTimestamp(timestamp);
  return time === null ? null : new Date(time).toISOString().slice(0, 7);
}

function readKey(value: unknown): string | null {
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function prepare<T extends object>(records: readonly T[], spec: AggregationSpec<T>): PreparedRecord[] {
  const prepared: PreparedRecord[] = [];

  for (const record of records) {
    const subject = spec.subjectKey ? readKey(record[spec.subjectKey]) : null;
    if (spec.subjectKey && subject === null) continue;

    const time = parseTimestamp(record[spec.timeKey]);
    if (time === null) continue;

    // distinct_count without a value field counts every record
    const value = spec.valueKey ? coerceNumber(record[spec.valueKey]) : 0;
    if (value === null) continue;

    prepared.push({
      subject,
      bucket: new Date(time).toISOString().slice(0, 7),
      time,
      value,
      distinct: spec.distinctKey ? readKey(record[spec.distinctKey]) : null,
    });
  }

  return prepared;
}

function groupKey(subject: string | null, bucket: string): string {
  return `${subject ?? ''}\u0000${bucket}`;
}

function compareRows(a: AggregateRow, b: AggregateRow): number {
  const bySubject = (a.subject ?? '').localeCompare(b.subject ?? '');
  return bySubject !== 0 ? bySubject : a.timeBucket.localeCompare(b.timeBucket);
}

function toRow(subject: string | null, timeBucket: string, statistic: Statistic, value: number): AggregateRow {
  return Object.freeze({ subject, timeBucket, statistic, value });
}

function groupRecords(prepared: PreparedRecord[]): Group[] {
  const groups = new Map<string, Group>();

  for (const record of prepared) {
    const key = groupKey(record.subject, record.bucket);
    let group = groups.get(key);
    if (!group) {
      group = { subject: record.subject, bucket: record.bucket, values: [], distinct: new Set() };
      groups.set(key, group);
    }
    group.values.push(record.value);
    if (record.distinct !== null) {
      group.distinct.add(record.distinct);
    }
  }

  return Array.from(groups.values());
}

/**
 * Running total per subject in chronological order. Ties keep input order
 * (Array.prototype.sort is stable). One row per (subject, month) holding the
 * total reached at the end of that month.
 */
function cumulativeRows(prepared: PreparedRecord[]): AggregateRow[] {
  const ordered = [...prepared].sort((a, b) => a.time - b.time);
  const totals = new Map<string, number>();
  const rows = new Map<string, AggregateRow>();

  for (const record of ordered) {
    const subjectKey = record.subject ?? '';
    const total = (totals.get(subjectKey) ?? 0) + record.value;
    totals.set(subjectKey, total);
    rows.set(groupKey(record.subject, record.bucket), toRow(record.subject, record.bucket, 'cumulative_sum', total));
  }

  return Array.from(rows.values());
}

function validateSpec<T>(spec: AggregationSpec<T>): void {
  if (spec.statistic === 'distinct_count') {
    if (!spec.distinctKey) {
      throw new InvalidArgumentError('distinct_count requires a distinctKey');
    }
  } else if (!spec.valueKey) {
    throw new InvalidArgumentError(`${spec.statistic} requires a valueKey`);
  }
}

/**
 * Aggregate flat records into rows sorted by subject, then month
 *
 * @returns an empty array when nothing survives coercion; callers skip
 *          rendering in that case
 */
export function aggregate<T extends object>(records: readonly T[], spec: AggregationSpec<T>): AggregateRow[] {
  validateSpec(spec);
  const prepared = prepare(records, spec);
  const { statistic } = spec;

  if (statistic === 'cumulative_sum') {
    return cumulativeRows(prepared).sort(compareRows);
  }

  return groupRecords(prepared)
    .map((group) => {
      switch (statistic) {
        case 'mean':
          return toRow(group.subject, group.bucket, 'mean', sum(group.values) / group.values.length);
        case 'sum':
          return toRow(group.subject, group.bucket, 'sum', sum(group.values));
        case 'distinct_count':
          return toRow(group.subject, group.bucket, 'distinct_count', group.distinct.size);
      }
    })
    .sort(compareRows);
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Coerced, finite values of one field
 */
export function collectValues<T extends object>(records: readonly T[], valueKey: keyof T & string): number[] {
  const values: number[] = [];
  for (const record of records) {
    const value = coerceNumber(record[valueKey]);
    if (value !== null) values.push(value);
  }
  return values;
}

/**
 * Equal-width histogram. The last bin includes its upper bound.
 */
export function histogram(values: readonly number[], binCount: number = 30): HistogramBin[] {
  if (!Number.isInteger(binCount) || binCount < 1) {
    throw new InvalidArgumentError(`binCount must be a positive integer, got ${binCount}`);
  }

  const finite = values.filter((value) => Number.isFinite(value));
  if (finite.length === 0) {
    return [];
  }

  const min = finite.reduce((lowest, value) => (value < lowest ? value : lowest), finite[0]);
  const max = finite.reduce((highest, value) => (value > highest ? value : highest), finite[0]);
  if (min === max) {
    return [{ from: min, to: max, count: finite.length }];
  }

  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    from: min + i * width,
    to: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));

  for (const value of finite) {
    const index = Math.min(Math.floor((value - min) / width), binCount - 1);
    bins[index].count++;
  }

  return bins;
}

/**
 * Rescale row values from seconds to hours
 */
export function secondsToHours(rows: readonly AggregateRow[]): AggregateRow[] {
  return rows.map((row) => toRow(row.subject, row.timeBucket, row.statistic, row.value / 3600));
}
