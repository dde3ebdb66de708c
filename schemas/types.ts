/**
 * Sources supported by the metrics extraction pipeline
 */
export type Source = 'jira' | 'sonarqube';

/**
 * Inclusive calendar range used to scope a single query
 */
export interface Window {
  start: Date;
  end: Date;
}

/**
 * A person whose work logs are tracked
 */
export interface TrackedPerson {
  /** Two-part display name, e.g. "Ada Lovelace" */
  name: string;
  /** Short identifier used in file names */
  trigram: string;
  /** External collaborators get the external e-mail domain */
  external: boolean;
}

/**
 * A code-quality project, identified by its opaque server key
 */
export type TrackedProject = string;

/**
 * Entity roster loaded once at start-up
 */
export interface Roster {
  people: readonly TrackedPerson[];
  projects: readonly TrackedProject[];
}

/**
 * Query kinds issued against the code-quality server, one persisted payload each
 */
export type SonarQueryKind = 'measures' | 'metricsHistory' | 'issuesDetailed';

/**
 * One row per work-log entry
 */
export interface WorklogRecord {
  userName: string | null;
  userEmail: string | null;
  issueKey: string | null;
  issueId: string | null;
  worklogId: string | null;
  timeSpentSeconds: number | null;
  /** Start timestamp as returned by the tracker */
  worklogStart: string | null;
  /** Issue-level totals, present only on the last record of an issue */
  originalEstimateSeconds?: number | null;
  remainingEstimateSeconds?: number | null;
  issueTimeSpentSeconds?: number | null;
}

/**
 * One historical measure of one metric of one project
 */
export interface MetricRecord {
  projectKey: string;
  metricName: string;
  timestamp: string | null;
  value: number | null;
}

/**
 * Remediation effort of one open code-quality issue
 */
export interface IssueEffortRecord {
  projectKey: string;
  issueKey: string | null;
  effortMinutes: number;
  creationDate: string;
}

export type Statistic = 'mean' | 'sum' | 'distinct_count' | 'cumulative_sum';

/**
 * One summarized statistic for a (subject, month) pair
 */
export interface AggregateRow {
  /** Person or project; null for all-entities series */
  subject: string | null;
  /** Month in YYYY-MM format (UTC) */
  timeBucket: string;
  statistic: Statistic;
  value: number;
}

/**
 * Equal-width bucket of a value distribution
 */
export interface HistogramBin {
  /** Inclusive lower bound */
  from: number;
  /** Exclusive upper bound (inclusive for the last bin) */
  to: number;
  count: number;
}

export type ChartKind = 'line' | 'bar' | 'histogram';

export interface ChartPoint {
  x: string | number;
  y: number;
}

export interface ChartSeries {
  name: string;
  points: ChartPoint[];
}

/**
 * Render-ready chart description written by the presenter
 */
export interface ChartDocument {
  /** File name without extension */
  name: string;
  title: string;
  kind: ChartKind;
  xLabel: string;
  yLabel: string;
  series: ChartSeries[];
}
