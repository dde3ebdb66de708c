/**
 * SonarQube provider fetch implementation
 *
 * Uses the Web API with a token passed as the basic-auth user name.
 */

import { err, ok } from '../../src/errors.js';
import type { FetchError, Result } from '../../src/errors.js';
import { formatDay } from '../../src/windows.js';
import { getArray, getNumber, getObject } from '../../normalizers/utils.js';
import { buildUrl, isPageFull, requestJson } from '../http.js';
import type { RequestOptions } from '../http.js';
import type { MetricsHistoryPayload, SonarQueryOptions } from './types.js';
import { OPEN_ISSUE_STATUSES } from './types.js';

function requestOptions(options: SonarQueryOptions): RequestOptions {
  const credentials = Buffer.from(`${options.config.token}:`).toString('base64');
  return {
    headers: { Authorization: `Basic ${credentials}` },
    timeoutMs: options.timeoutMs,
  };
}

function pagingTotal(payload: unknown): number | null {
  return getNumber(getObject(payload, 'paging'), 'total') ?? getNumber(payload, 'total');
}

/**
 * Current value of every tracked metric
 */
async function fetchMeasures(options: SonarQueryOptions): Promise<Result<unknown, FetchError>> {
  const { config, project } = options;
  const url = buildUrl(`${config.baseUrl}/api/measures/component`, {
    component: project,
    metricKeys: config.metrics.join(','),
  });
  return requestJson(url, requestOptions(options));
}

/**
 * History of each tracked metric over the window, one request per metric.
 * The first failing metric fails the whole query.
 */
async function fetchMetricsHistory(options: SonarQueryOptions): Promise<Result<unknown, FetchError>> {
  const { config, project, window, logger } = options;
  const payload: MetricsHistoryPayload = { project, metrics_history: {} };

  for (const metric of config.metrics) {
    const url = buildUrl(`${config.baseUrl}/api/measures/search_history`, {
      component: project,
      metrics: metric,
      from: formatDay(window.start),
      to: formatDay(window.end),
      ps: config.pageSize,
    });

    const result = await requestJson(url, requestOptions(options));
    if (!result.ok) {
      return err(result.error);
    }

    const measures = getArray(result.value, 'measures');
    const points = measures.reduce<number>((count, measure) => count + getArray(measure, 'history').length, 0);
    if (isPageFull(points, config.pageSize, pagingTotal(result.value))) {
      logger.warn('sonarqube:page-full', { project, metric, returned: points, pageSize: config.pageSize });
    }
    payload.metrics_history[metric] = measures;
  }

  return ok(payload);
}

/**
 * Open issues created inside the window, with every additional field
 */
async function fetchIssuesDetailed(options: SonarQueryOptions): Promise<Result<unknown, FetchError>> {
  const { config, project, window, logger } = options;
  const url = buildUrl(`${config.baseUrl}/api/issues/search`, {
    componentKeys: project,
    createdAfter: formatDay(window.start),
    createdBefore: formatDay(window.end),
    statuses: OPEN_ISSUE_STATUSES,
    additionalFields: '_all',
    ps: config.pageSize,
  });

  const result = await requestJson(url, requestOptions(options));
  if (result.ok) {
    const returned = getArray(result.value, 'issues').length;
    if (isPageFull(returned, config.pageSize, pagingTotal(result.value))) {
      logger.warn('sonarqube:page-full', { project, kind: 'issuesDetailed', returned, pageSize: config.pageSize });
    }
  }
  return result;
}

/**
 * Run one query kind for one project
 */
export async function querySonarQube(options: SonarQueryOptions): Promise<Result<unknown, FetchError>> {
  options.logger.debug('sonarqube:query', { project: options.project, kind: options.kind });

  switch (options.kind) {
    case 'measures':
      return fetchMeasures(options);
    case 'metricsHistory':
      return fetchMetricsHistory(options);
    case 'issuesDetailed':
      return fetchIssuesDetailed(options);
  }
}
