/**
 * JSON artifact persistence
 *
 * Writes are not transactional. Readers treat missing or unreadable artifacts
 * as absent data.
 */

import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import type { Logger } from './logger.js';
import { safeValidateWorklogFile, formatValidationErrors } from '../schemas/index.js';
import type { SonarQueryKind, TrackedPerson, WorklogRecord } from '../schemas/index.js';

export const JIRA_DATA_SUBDIR = 'jira';
export const SONARQUBE_DATA_SUBDIR = 'sonarqube';

/**
 * Write `data` pretty-printed to `<dir>/<fileName>`, creating `dir` if needed
 *
 * @returns the written file path
 */
export async function saveJson(dir: string, fileName: string, data: unknown): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, fileName);
  await writeFile(filePath, JSON.stringify(data, null, 2));
  return filePath;
}

/**
 * `<dataDir>/jira/<windowEnd>/data_<trigram>-<windowEnd>.json`
 */
export function worklogFileLocation(
  dataDir: string,
  person: TrackedPerson,
  windowEnd: string
): { dir: string; fileName: string } {
  return {
    dir: path.join(dataDir, JIRA_DATA_SUBDIR, windowEnd),
    fileName: `data_${person.trigram}-${windowEnd}.json`,
  };
}

/**
 * `<dataDir>/sonarqube/<project>_<kind>.json`
 */
export function sonarFileLocation(
  dataDir: string,
  project: string,
  kind: SonarQueryKind
): { dir: string; fileName: string } {
  return {
    dir: path.join(dataDir, SONARQUBE_DATA_SUBDIR),
    fileName: `${project}_${kind}.json`,
  };
}

async function listEntries(dir: string): Promise<{ name: string; isDirectory: boolean }[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }))
      .sort((a, b) => a.name.localeCompare(b.name));
  } catch {
    return [];
  }
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, 'utf-8'));
}

/**
 * Read back every persisted work-log file, window folders in name order
 */
export async function loadWorklogRecords(dataDir: string, logger: Logger): Promise<WorklogRecord[]> {
  const root = path.join(dataDir, JIRA_DATA_SUBDIR);
  const records: WorklogRecord[] = [];

  for (const folder of await listEntries(root)) {
    if (!folder.isDirectory) continue;
    const folderPath = path.join(root, folder.name);

    for (const file of await listEntries(folderPath)) {
      if (file.isDirectory || !file.name.endsWith('.json')) continue;
      const filePath = path.join(folderPath, file.name);

      let data: unknown;
      try {
        data = await readJson(filePath);
      } catch (error) {
        logger.warn('storage:unreadable', { file: filePath, error: String(error) });
        continue;
      }

      const parsed = safeValidateWorklogFile(data);
      if (!parsed.success) {
        logger.warn('storage:invalid', { file: filePath, errors: formatValidationErrors(parsed.error) });
        continue;
      }
      records.push(...parsed.data);
    }
  }

  logger.debug('storage:loaded', { records: records.length });
  return records;
}

/**
 * Read back one persisted code-quality payload, or null when absent
 */
export async function loadSonarPayload(
  dataDir: string,
  project: string,
  kind: SonarQueryKind,
  logger: Logger
): Promise<unknown> {
  const { dir, fileName } = sonarFileLocation(dataDir, project, kind);
  const filePath = path.join(dir, fileName);
  try {
    return await readJson(filePath);
  } catch (error) {
    logger.warn('storage:missing', { file: filePath, error: String(error) });
    return null;
  }
}
