import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildWorklogJql, generateEmail, queryWorklogs } from '../providers/jira/index.js';
import type { ResolvedJiraConfig } from '../src/config.js';
import type { Logger } from '../src/logger.js';
import type { TrackedPerson, Window } from '../schemas/index.js';

const config: ResolvedJiraConfig = {
  searchUrl: 'https://jira.test/rest/api/2/search',
  token: 'test-token',
  emailDomain: 'example.com',
  externalEmailDomain: 'ext.example.com',
  maxResults: 1000,
};

const ada: TrackedPerson = { name: 'Ada Lovelace', trigram: 'ALO', external: false };
const alan: TrackedPerson = { name: 'Alan Turing', trigram: 'ATU', external: true };
const january: Window = { start: new Date(2024, 0, 1), end: new Date(2024, 0, 31) };

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function stubFetch(impl: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('generateEmail', () => {
  it('should derive the address from a two-part name', () => {
    expect(generateEmail(ada, config)).toBe('ada.lovelace@example.com');
  });

  it('should use the external domain for external people', () => {
    expect(generateEmail(alan, config)).toBe('alan.turing@ext.example.com');
  });

  it('should reject names that do not have two parts', () => {
    expect(() => generateEmail({ name: 'Ada', trigram: 'A', external: false }, config)).toThrow(
      'Expected a first and last name'
    );
  });
});

describe('buildWorklogJql', () => {
  it('should scope the search to the assignee and both window bounds', () => {
    expect(buildWorklogJql('ada.lovelace@example.com', january)).toBe(
      `assignee="ada.lovelace@example.com" AND worklogDate >= '2024-01-01' AND worklogDate <= '2024-01-31'`
    );
  });
});

describe('queryWorklogs', () => {
  it('should request a single bounded page with a bearer token', async () => {
    const payload = { total: 1, issues: [{ key: 'QA-1' }] };
    const fetchMock = stubFetch(async () => jsonResponse(payload));
    const logger = createLogger();

    const result = await queryWorklogs({ config, person: ada, window: january, timeoutMs: 1000, logger });

    expect(result).toEqual({ ok: true, value: payload });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    const parsed = new URL(url);
    expect(parsed.origin + parsed.pathname).toBe('https://jira.test/rest/api/2/search');
    expect(parsed.searchParams.get('jql')).toBe(buildWorklogJql('ada.lovelace@example.com', january));
    expect(parsed.searchParams.get('fields')).toBe('timetracking,worklog');
    expect(parsed.searchParams.get('maxResults')).toBe('1000');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should map HTTP 500 to a server error without throwing', async () => {
    stubFetch(async () => new Response('boom', { status: 500 }));

    const result = await queryWorklogs({ config, person: ada, window: january, timeoutMs: 1000, logger: createLogger() });

    expect(result).toEqual({ ok: false, error: { kind: 'server_error', status: 500 } });
  });

  it('should map HTTP 401 to unauthorized', async () => {
    stubFetch(async () => new Response('', { status: 401 }));

    const result = await queryWorklogs({ config, person: ada, window: january, timeoutMs: 1000, logger: createLogger() });

    expect(result).toEqual({ ok: false, error: { kind: 'unauthorized', status: 401 } });
  });

  it('should map network errors to transport failures', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    const result = await queryWorklogs({ config, person: ada, window: january, timeoutMs: 1000, logger: createLogger() });

    expect(result).toEqual({ ok: false, error: { kind: 'transport_failure', message: 'fetch failed' } });
  });

  it('should map aborted requests to timeouts', async () => {
    stubFetch(async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });

    const result = await queryWorklogs({ config, person: ada, window: january, timeoutMs: 250, logger: createLogger() });

    expect(result).toEqual({ ok: false, error: { kind: 'timeout', timeoutMs: 250 } });
  });

  it('should report a non-JSON body as a transport failure', async () => {
    stubFetch(async () => new Response('<html>login</html>', { status: 200 }));

    const result = await queryWorklogs({ config, person: ada, window: january, timeoutMs: 1000, logger: createLogger() });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('transport_failure');
    }
  });

  it('should warn when the page is full', async () => {
    stubFetch(async () => jsonResponse({ total: 5, issues: [{}, {}] }));
    const logger = createLogger();

    const result = await queryWorklogs({
      config: { ...config, maxResults: 2 },
      person: ada,
      window: january,
      timeoutMs: 1000,
      logger,
    });

    expect(result.ok).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('jira:page-full', {
      person: 'ALO',
      returned: 2,
      total: 5,
      maxResults: 2,
    });
  });
});
