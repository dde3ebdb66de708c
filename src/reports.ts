/**
 * Monthly summary charts for each source
 *
 * Aggregates are recomputed from the persisted records on every run.
 */

import { aggregate, collectValues, histogram, secondsToHours } from './aggregation.js';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { buildBarChart, buildHistogramChart, buildLineChart } from './presenter.js';
import type { Presenter } from './presenter.js';
import { loadSonarPayload, loadWorklogRecords } from './storage.js';
import { issueEffortExtractor, metricHistoryExtractor } from '../normalizers/index.js';
import type {
  ChartDocument,
  IssueEffortRecord,
  MetricRecord,
  TrackedProject,
  WorklogRecord,
} from '../schemas/index.js';

export interface NamedChart {
  name: string;
  chart: ChartDocument | null;
}

const HISTOGRAM_BINS = 30;

/**
 * Work-log charts: per-person averages, totals and issue counts by month,
 * the all-people monthly average and the distribution of logged hours
 */
export function buildWorklogCharts(records: readonly WorklogRecord[]): NamedChart[] {
  const perPerson = { subjectKey: 'userName', timeKey: 'worklogStart', valueKey: 'timeSpentSeconds' } as const;
  // Issue counts do not depend on the logged duration being readable
  const perPersonIssues = { subjectKey: 'userName', timeKey: 'worklogStart', distinctKey: 'issueKey' } as const;

  const average = secondsToHours(aggregate(records, { ...perPerson, statistic: 'mean' }));
  const total = secondsToHours(aggregate(records, { ...perPerson, statistic: 'sum' }));
  const issues = aggregate(records, { ...perPersonIssues, statistic: 'distinct_count' });
  const overall = secondsToHours(
    aggregate(records, { timeKey: 'worklogStart', valueKey: 'timeSpentSeconds', statistic: 'mean' })
  );
  const hours = collectValues(records, 'timeSpentSeconds').map((seconds) => seconds / 3600);

  const charts: NamedChart[] = [
    {
      name: 'avg_time_spent_per_issue_by_month',
      chart: buildLineChart(
        {
          name: 'avg_time_spent_per_issue_by_month',
          title: 'Average Time Spent per Issue by Month',
          xLabel: 'Month',
          yLabel: 'Average Time Spent (hours)',
        },
        average
      ),
    },
    {
      name: 'total_time_spent_per_tester_by_month',
      chart: buildBarChart(
        {
          name: 'total_time_spent_per_tester_by_month',
          title: 'Total Time Spent per Tester by Month',
          xLabel: 'Month',
          yLabel: 'Total Time Spent (hours)',
        },
        total
      ),
    },
    {
      name: 'issues_per_tester_by_month',
      chart: buildLineChart(
        {
          name: 'issues_per_tester_by_month',
          title: 'Number of Issues Handled per Tester by Month',
          xLabel: 'Month',
          yLabel: 'Number of Issues',
        },
        issues
      ),
    },
    {
      name: 'avg_time_all_testers_each_month',
      chart: buildLineChart(
        {
          name: 'avg_time_all_testers_each_month',
          title: 'Average Time Spent on Issues Each Month (All Testers Combined)',
          xLabel: 'Month',
          yLabel: 'Average Time Spent (hours)',
        },
        overall
      ),
    },
    {
      name: 'distribution_of_time_spent_on_issues',
      chart: buildHistogramChart(
        {
          name: 'distribution_of_time_spent_on_issues',
          title: 'Distribution of Time Spent on Issues',
          xLabel: 'Time Spent (hours)',
          yLabel: 'Frequency',
        },
        [{ name: 'All', bins: histogram(hours, HISTOGRAM_BINS) }]
      ),
    },
  ];

  return charts;
}

/**
 * Code-quality charts: monthly mean of each metric per project, effort
 * distribution per project and cumulative effort per project
 */
export function buildQualityCharts(
  metrics: readonly string[],
  history: readonly MetricRecord[],
  efforts: readonly IssueEffortRecord[]
): NamedChart[] {
  const charts: NamedChart[] = metrics.map((metric) => {
    const name = `metric_evolution_${metric}`;
    const rows = aggregate(
      history.filter((record) => record.metricName === metric),
      { subjectKey: 'projectKey', timeKey: 'timestamp', valueKey: 'value', statistic: 'mean' }
    );
    return {
      name,
      chart: buildLineChart({ name, title: `Metric Evolution: ${metric}`, xLabel: 'Month', yLabel: 'Value' }, rows),
    };
  });

  const projects = Array.from(new Set(efforts.map((record) => record.projectKey)));
  charts.push({
    name: 'issue_effort_distribution',
    chart: buildHistogramChart(
      {
        name: 'issue_effort_distribution',
        title: 'Distribution of Issue Resolution Efforts',
        xLabel: 'Effort (minutes)',
        yLabel: 'Number of Issues',
      },
      projects.map((project) => ({
        name: project,
        bins: histogram(
          collectValues(
            efforts.filter((record) => record.projectKey === project),
            'effortMinutes'
          ),
          HISTOGRAM_BINS
        ),
      }))
    ),
  });

  charts.push({
    name: 'cumulative_effort_over_time',
    chart: buildLineChart(
      {
        name: 'cumulative_effort_over_time',
        title: 'Cumulative Effort Over Time',
        xLabel: 'Month',
        yLabel: 'Cumulative Effort (minutes)',
      },
      aggregate(efforts, {
        subjectKey: 'projectKey',
        timeKey: 'creationDate',
        valueKey: 'effortMinutes',
        statistic: 'cumulative_sum',
      })
    ),
  });

  return charts;
}

async function renderAll(charts: readonly NamedChart[], presenter: Presenter): Promise<number> {
  let written = 0;
  for (const { name, chart } of charts) {
    if (await presenter.render(name, chart)) {
      written++;
    }
  }
  return written;
}

/**
 * Rebuild the work-log charts from the data directory
 *
 * @returns number of charts written
 */
export async function runWorklogReport(config: AppConfig, presenter: Presenter, logger: Logger): Promise<number> {
  const records = await loadWorklogRecords(config.dataDir, logger);
  if (records.length === 0) {
    logger.error('report:no-data', { dataDir: config.dataDir });
    return 0;
  }
  return renderAll(buildWorklogCharts(records), presenter);
}

/**
 * Rebuild the code-quality charts from the data directory
 *
 * @returns number of charts written
 */
export async function runQualityReport(
  config: AppConfig,
  projects: readonly TrackedProject[],
  presenter: Presenter,
  logger: Logger
): Promise<number> {
  const history: MetricRecord[] = [];
  const efforts: IssueEffortRecord[] = [];

  for (const project of projects) {
    const historyPayload = await loadSonarPayload(config.dataDir, project, 'metricsHistory', logger);
    if (historyPayload !== null) {
      history.push(...metricHistoryExtractor.extract(historyPayload));
    }
    const issuesPayload = await loadSonarPayload(config.dataDir, project, 'issuesDetailed', logger);
    if (issuesPayload !== null) {
      efforts.push(...issueEffortExtractor(project).extract(issuesPayload));
    }
  }

  return renderAll(buildQualityCharts(config.sonarqube.metrics, history, efforts), presenter);
}
