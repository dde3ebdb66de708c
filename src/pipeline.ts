/**
 * Query → extract → persist runs
 *
 * Every (entity, window, kind) triple runs to completion before the next one
 * starts, so persisted artifacts follow the iteration order. A failed query is
 * logged and skipped; it never aborts the run.
 */

import type { AppConfig } from './config.js';
import { requireJiraConfig, requireSonarQubeConfig } from './config.js';
import { describeFetchError } from './errors.js';
import type { FetchError, Result } from './errors.js';
import type { Logger } from './logger.js';
import { saveJson, sonarFileLocation, worklogFileLocation } from './storage.js';
import { formatDay } from './windows.js';
import { queryWorklogs, querySonarQube, SONAR_QUERY_KINDS } from '../providers/index.js';
import { worklogExtractor } from '../normalizers/index.js';
import type { SonarQueryKind, TrackedPerson, TrackedProject, Window } from '../schemas/index.js';

export interface RunSummary {
  attempted: number;
  saved: number;
  /** Failed queries */
  skipped: number;
  /** Successful queries that produced nothing to persist */
  empty: number;
}

type SaveFn = (dir: string, fileName: string, data: unknown) => Promise<string>;

export interface JiraFetchDependencies {
  query: (person: TrackedPerson, window: Window) => Promise<Result<unknown, FetchError>>;
  save: SaveFn;
}

export interface JiraFetchOptions {
  config: AppConfig;
  people: readonly TrackedPerson[];
  windows: readonly Window[];
  logger: Logger;
  dependencies?: Partial<JiraFetchDependencies>;
}

export interface SonarQubeFetchDependencies {
  query: (project: TrackedProject, window: Window, kind: SonarQueryKind) => Promise<Result<unknown, FetchError>>;
  save: SaveFn;
}

export interface SonarQubeFetchOptions {
  config: AppConfig;
  projects: readonly TrackedProject[];
  window: Window;
  kinds?: readonly SonarQueryKind[];
  logger: Logger;
  dependencies?: Partial<SonarQubeFetchDependencies>;
}

function emptySummary(): RunSummary {
  return { attempted: 0, saved: 0, skipped: 0, empty: 0 };
}

/**
 * Fetch work logs for every window × person, oldest window first
 */
export async function runJiraFetch(options: JiraFetchOptions): Promise<RunSummary> {
  const { config, people, windows, logger, dependencies = {} } = options;

  let query = dependencies.query;
  if (!query) {
    const jira = requireJiraConfig(config);
    query = (person, window) => queryWorklogs({ config: jira, person, window, timeoutMs: config.timeoutMs, logger });
  }
  const save = dependencies.save ?? saveJson;
  const summary = emptySummary();

  for (const window of windows) {
    const windowEnd = formatDay(window.end);
    for (const person of people) {
      summary.attempted++;
      const result = await query(person, window);

      if (!result.ok) {
        summary.skipped++;
        logger.error('jira:fetch-failed', {
          person: person.name,
          windowEnd,
          error: describeFetchError(result.error),
        });
        continue;
      }

      const records = worklogExtractor.extract(result.value);
      if (records.length === 0) {
        summary.empty++;
        logger.debug('jira:no-worklogs', { person: person.trigram, windowEnd });
        continue;
      }

      const { dir, fileName } = worklogFileLocation(config.dataDir, person, windowEnd);
      const filePath = await save(dir, fileName, records);
      summary.saved++;
      logger.info('jira:saved', { file: filePath, records: records.length });
    }
  }

  logger.info('jira:done', { ...summary });
  return summary;
}

/**
 * Fetch every query kind for every project over a single window
 */
export async function runSonarQubeFetch(options: SonarQubeFetchOptions): Promise<RunSummary> {
  const { config, projects, window, kinds = SONAR_QUERY_KINDS, logger, dependencies = {} } = options;

  let query = dependencies.query;
  if (!query) {
    const sonarqube = requireSonarQubeConfig(config);
    query = (project, queryWindow, kind) =>
      querySonarQube({ config: sonarqube, project, window: queryWindow, kind, timeoutMs: config.timeoutMs, logger });
  }
  const save = dependencies.save ?? saveJson;
  const summary = emptySummary();

  for (const project of projects) {
    for (const kind of kinds) {
      summary.attempted++;
      logger.info('sonarqube:fetch', { project, kind });
      const result = await query(project, window, kind);

      if (!result.ok) {
        summary.skipped++;
        logger.error('sonarqube:fetch-failed', { project, kind, error: describeFetchError(result.error) });
        continue;
      }

      if (result.value === null || result.value === undefined) {
        summary.empty++;
        continue;
      }

      const { dir, fileName } = sonarFileLocation(config.dataDir, project, kind);
      const filePath = await save(dir, fileName, result.value);
      summary.saved++;
      logger.info('sonarqube:saved', { file: filePath });
    }
  }

  logger.info('sonarqube:done', { ...summary });
  return summary;
}
