/**
 * Runtime configuration
 *
 * Built once at start-up from the environment and the roster file, then passed
 * by reference to the query clients and the presenter.
 */

import { readFile } from 'fs/promises';
import { ConfigMissingError } from './errors.js';
import { validateRoster, formatValidationErrors } from '../schemas/index.js';
import type { Roster } from '../schemas/index.js';
import { ZodError } from 'zod';

export const DEFAULT_SONARQUBE_METRICS = [
  'coverage',
  'bugs',
  'vulnerabilities',
  'code_smells',
  'ncloc',
  'sqale_index',
] as const;

/** Single-page bound for work-log searches */
export const JIRA_MAX_RESULTS = 1000;
/** Single-page bound for code-quality issue and history searches */
export const SONARQUBE_PAGE_SIZE = 500;
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface JiraConfig {
  searchUrl?: string;
  token?: string;
  emailDomain: string;
  externalEmailDomain: string;
  maxResults: number;
}

export interface SonarQubeConfig {
  baseUrl?: string;
  token?: string;
  metrics: readonly string[];
  pageSize: number;
}

export interface AppConfig {
  readonly jira: Readonly<JiraConfig>;
  readonly sonarqube: Readonly<SonarQubeConfig>;
  readonly dataDir: string;
  readonly plotDir: string;
  readonly timeoutMs: number;
}

/** Jira settings once the endpoint and token are known to be present */
export type ResolvedJiraConfig = Readonly<JiraConfig & { searchUrl: string; token: string }>;
export type ResolvedSonarQubeConfig = Readonly<SonarQubeConfig & { baseUrl: string; token: string }>;

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function parseList(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = {
    jira: Object.freeze({
      searchUrl: env.JIRA_SEARCH_URL || undefined,
      token: env.JIRA_PAT || undefined,
      emailDomain: env.JIRA_EMAIL_DOMAIN || 'example.com',
      externalEmailDomain: env.JIRA_EXTERNAL_EMAIL_DOMAIN || 'ext.example.com',
      maxResults: JIRA_MAX_RESULTS,
    }),
    sonarqube: Object.freeze({
      baseUrl: env.SONARQUBE_URL || undefined,
      token: env.SONARQUBE_API_TOKEN || undefined,
      metrics: Object.freeze(parseList(env.SONARQUBE_METRICS) ?? [...DEFAULT_SONARQUBE_METRICS]),
      pageSize: SONARQUBE_PAGE_SIZE,
    }),
    dataDir: env.DATA_DIR || './data',
    plotDir: env.PLOT_DIR || './plots',
    timeoutMs: parsePositiveInt(env.HTTP_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
  };
  return Object.freeze(config);
}

/**
 * @throws ConfigMissingError when the search URL or token is absent
 */
export function requireJiraConfig(config: AppConfig): ResolvedJiraConfig {
  const { searchUrl, token } = config.jira;
  if (!searchUrl) throw new ConfigMissingError('JIRA_SEARCH_URL is not set');
  if (!token) throw new ConfigMissingError('JIRA_PAT is not set');
  return Object.freeze({ ...config.jira, searchUrl, token });
}

/**
 * @throws ConfigMissingError when the server URL or token is absent
 */
export function requireSonarQubeConfig(config: AppConfig): ResolvedSonarQubeConfig {
  const { baseUrl, token } = config.sonarqube;
  if (!baseUrl) throw new ConfigMissingError('SONARQUBE_URL is not set');
  if (!token) throw new ConfigMissingError('SONARQUBE_API_TOKEN is not set');
  return Object.freeze({ ...config.sonarqube, baseUrl: baseUrl.replace(/\/+$/, ''), token });
}

/**
 * Load the tracked people and projects
 *
 * @throws ConfigMissingError when the file is missing, unreadable or invalid
 */
export async function loadRoster(rosterPath: string): Promise<Roster> {
  let content: string;
  try {
    content = await readFile(rosterPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigMissingError(`Roster file not found: ${rosterPath}`);
    }
    throw new ConfigMissingError(`Failed to read roster file ${rosterPath}: ${String(error)}`);
  }

  try {
    const roster = validateRoster(JSON.parse(content));
    return Object.freeze({
      people: Object.freeze(roster.people.map((person) => Object.freeze(person))),
      projects: Object.freeze(roster.projects),
    });
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigMissingError(
        `Invalid roster file ${rosterPath}: ${formatValidationErrors(error).join('; ')}`
      );
    }
    throw new ConfigMissingError(`Failed to parse roster file ${rosterPath}: ${String(error)}`);
  }
}
