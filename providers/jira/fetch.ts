/**
 * Jira provider fetch implementation
 *
 * One issue search per (person, window), a single bounded page, no pagination.
 */

import { InvalidArgumentError } from '../../src/errors.js';
import type { FetchError, Result } from '../../src/errors.js';
import { formatDay } from '../../src/windows.js';
import type { TrackedPerson, Window } from '../../schemas/index.js';
import { buildUrl, isPageFull, requestJson } from '../http.js';
import { getArray, getNumber } from '../../normalizers/utils.js';
import type { EmailDomains, JiraQueryOptions } from './types.js';

/** Fields requested from the search endpoint */
export const WORKLOG_FIELDS = 'timetracking,worklog';

/**
 * Derive the tracker e-mail from a two-part display name
 *
 * "Ada Lovelace" → "ada.lovelace@<domain>"
 */
export function generateEmail(person: TrackedPerson, domains: EmailDomains): string {
  const parts = person.name.trim().split(/\s+/);
  if (parts.length !== 2) {
    throw new InvalidArgumentError(`Expected a first and last name, got "${person.name}"`);
  }
  const [firstName, lastName] = parts;
  const domain = person.external ? domains.externalEmailDomain : domains.emailDomain;
  return `${firstName.toLowerCase()}.${lastName.toLowerCase()}@${domain}`;
}

/**
 * Work logged on issues assigned to `email`, both window bounds inclusive
 */
export function buildWorklogJql(email: string, window: Window): string {
  return (
    `assignee="${email}" AND worklogDate >= '${formatDay(window.start)}'` +
    ` AND worklogDate <= '${formatDay(window.end)}'`
  );
}

/**
 * Fetch the raw issue-search payload for one person and window
 */
export async function queryWorklogs(options: JiraQueryOptions): Promise<Result<unknown, FetchError>> {
  const { config, person, window, timeoutMs, logger } = options;
  const email = generateEmail(person, config);
  const url = buildUrl(config.searchUrl, {
    jql: buildWorklogJql(email, window),
    fields: WORKLOG_FIELDS,
    maxResults: config.maxResults,
  });

  logger.debug('jira:query', { person: person.trigram, start: formatDay(window.start), end: formatDay(window.end) });

  const result = await requestJson(url, {
    headers: { Authorization: `Bearer ${config.token}` },
    timeoutMs,
  });

  if (result.ok) {
    const returned = getArray(result.value, 'issues').length;
    const total = getNumber(result.value, 'total');
    if (isPageFull(returned, config.maxResults, total)) {
      logger.warn('jira:page-full', { person: person.trigram, returned, total, maxResults: config.maxResults });
    }
  }

  return result;
}
