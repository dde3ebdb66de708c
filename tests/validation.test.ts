import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ZodError } from 'zod';
import {
  DEFAULT_SONARQUBE_METRICS,
  loadConfig,
  loadRoster,
  requireJiraConfig,
  requireSonarQubeConfig,
} from '../src/config.js';
import { ConfigMissingError } from '../src/errors.js';
import {
  formatValidationErrors,
  safeValidateWorklogFile,
  validateChartDocument,
  validateRoster,
} from '../schemas/index.js';

describe('validateRoster', () => {
  it('should default missing lists and the external flag', () => {
    expect(validateRoster({ people: [{ name: 'Ada Lovelace', trigram: 'ALO' }] })).toEqual({
      people: [{ name: 'Ada Lovelace', trigram: 'ALO', external: false }],
      projects: [],
    });
  });

  it('should reject names without exactly two parts', () => {
    try {
      validateRoster({ people: [{ name: 'Ada', trigram: 'A' }] });
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ZodError);
      if (error instanceof ZodError) {
        expect(formatValidationErrors(error)).toEqual([
          'people.0.name: Name must have exactly two parts (first and last name)',
        ]);
      }
    }
  });
});

describe('safeValidateWorklogFile', () => {
  it('should fill missing fields with null and keep unknown ones', () => {
    const result = safeValidateWorklogFile([{ userName: 'Ada Lovelace', extra: 1 }]);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data[0]).toEqual({
        userName: 'Ada Lovelace',
        userEmail: null,
        issueKey: null,
        issueId: null,
        worklogId: null,
        timeSpentSeconds: null,
        worklogStart: null,
        extra: 1,
      });
    }
  });

  it('should coerce malformed numbers to null without rejecting the file', () => {
    const result = safeValidateWorklogFile([
      { userName: 'Ada Lovelace', issueId: 10001, timeSpentSeconds: '7200' },
      { userName: 'Ada Lovelace', timeSpentSeconds: 'NaN', issueTimeSpentSeconds: 'Infinity' },
    ]);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.map((record) => record.timeSpentSeconds)).toEqual([7200, null]);
      expect(result.data[0].issueId).toBe('10001');
      expect(result.data[1].issueTimeSpentSeconds).toBeNull();
    }
  });

  it('should reject a file that is not an array', () => {
    expect(safeValidateWorklogFile({ userName: 'x' }).success).toBe(false);
  });
});

describe('validateChartDocument', () => {
  it('should reject a chart without series', () => {
    expect(() =>
      validateChartDocument({ name: 'c', title: 't', kind: 'line', xLabel: 'x', yLabel: 'y', series: [] })
    ).toThrow(ZodError);
  });
});

describe('loadConfig', () => {
  it('should apply defaults and freeze the result', () => {
    const config = loadConfig({});

    expect(config.dataDir).toBe('./data');
    expect(config.plotDir).toBe('./plots');
    expect(config.timeoutMs).toBe(30_000);
    expect(config.jira.maxResults).toBe(1000);
    expect(config.sonarqube.pageSize).toBe(500);
    expect(config.sonarqube.metrics).toEqual([...DEFAULT_SONARQUBE_METRICS]);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.jira)).toBe(true);
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      JIRA_SEARCH_URL: 'https://jira.test/rest/api/2/search',
      JIRA_PAT: 'test-token',
      SONARQUBE_URL: 'https://sonar.test/',
      SONARQUBE_API_TOKEN: 'test-token',
      SONARQUBE_METRICS: 'coverage, bugs,',
      HTTP_TIMEOUT_MS: '5000',
    });

    expect(requireJiraConfig(config).searchUrl).toBe('https://jira.test/rest/api/2/search');
    expect(requireSonarQubeConfig(config).baseUrl).toBe('https://sonar.test');
    expect(config.sonarqube.metrics).toEqual(['coverage', 'bugs']);
    expect(config.timeoutMs).toBe(5000);
  });

  it('should ignore an invalid timeout', () => {
    expect(loadConfig({ HTTP_TIMEOUT_MS: 'soon' }).timeoutMs).toBe(30_000);
  });

  it('should report missing credentials', () => {
    const config = loadConfig({ JIRA_SEARCH_URL: 'https://jira.test/search' });
    expect(() => requireJiraConfig(config)).toThrow('JIRA_PAT is not set');
    expect(() => requireSonarQubeConfig(config)).toThrow(ConfigMissingError);
  });
});

describe('loadRoster', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'roster-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load and freeze a valid roster', async () => {
    const file = path.join(dir, 'roster.json');
    await writeFile(
      file,
      JSON.stringify({ people: [{ name: 'Alan Turing', trigram: 'ATU', external: true }], projects: ['web-portal'] })
    );

    const roster = await loadRoster(file);

    expect(roster.people).toEqual([{ name: 'Alan Turing', trigram: 'ATU', external: true }]);
    expect(roster.projects).toEqual(['web-portal']);
    expect(Object.isFrozen(roster.people[0])).toBe(true);
  });

  it('should throw ConfigMissingError for a missing file', async () => {
    await expect(loadRoster(path.join(dir, 'absent.json'))).rejects.toThrow('Roster file not found');
  });

  it('should throw ConfigMissingError for invalid contents', async () => {
    const file = path.join(dir, 'roster.json');
    await writeFile(file, JSON.stringify({ people: [{ name: 'Ada Lovelace' }] }));

    await expect(loadRoster(file)).rejects.toBeInstanceOf(ConfigMissingError);
  });

  it('should throw ConfigMissingError for malformed JSON', async () => {
    const file = path.join(dir, 'roster.json');
    await writeFile(file, '{ people: ');

    await expect(loadRoster(file)).rejects.toBeInstanceOf(ConfigMissingError);
  });
});
