import fs from 'fs';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { parseAssignments, QueraScraper } from '../../src/scraper/quera.js';
import { createSilentLogger } from '../../src/utils/logger.js';

const fixture = fs.readFileSync(new URL('../fixtures/quera-course.html', import.meta.url), 'utf8');

function htmlResponse(body: string, url = 'https://quera.org/course', status = 200) {
  return { url, ok: status >= 200 && status < 300, status, text: async () => body };
}

describe('parseAssignments', () => {
  it('reads every complete row under the deadline heading', () => {
    expect(parseAssignments(fixture, 'https://quera.org')).toEqual([
      {
        title: 'Graph Traversal',
        course: 'Algorithms',
        dateText: '۲۵ اردیبهشت',
        link: 'https://quera.org/course/assignments/85830/problems',
      },
      {
        title: 'Linked Lists',
        course: 'Data Structures',
        dateText: '۱ خرداد',
        link: 'https://quera.org/course/assignments/90112/problems',
      },
      {
        title: 'Unlinked Quiz',
        course: 'Compilers',
        dateText: '۵ تیر',
        link: '',
      },
    ]);
  });

  it('returns null when the page has no deadline section', () => {
    expect(parseAssignments('<html><body><h2>Other</h2></body></html>', 'https://quera.org')).toBeNull();
  });
});

describe('QueraScraper', () => {
  const scraper = new QueraScraper('https://quera.org', 5_000, createSilentLogger());

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches the course page with the session cookie', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => htmlResponse(fixture));
    vi.stubGlobal('fetch', fetchMock);

    const result = await scraper.fetchAssignments('test-session');

    expect(result.ok && result.value.map((row) => row.title)).toEqual(['Graph Traversal', 'Linked Lists', 'Unlinked Quiz']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://quera.org/course');
    expect(init.headers).toMatchObject({ cookie: 'session_id=test-session' });
  });

  it('treats a redirect to login as an invalid session', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => htmlResponse('<html></html>', 'https://quera.org/accounts/login?next=/course')));

    const result = await scraper.fetchAssignments('test-session');

    expect(result).toEqual({
      ok: false,
      error: { code: 'SourceError', reason: 'session_invalid', message: 'Quera session is invalid or expired' },
    });
  });

  it('reports server errors as unreachable', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => htmlResponse('down', 'https://quera.org/course', 502)));

    const result = await scraper.fetchAssignments('test-session');

    expect(result).toEqual({
      ok: false,
      error: { code: 'SourceError', reason: 'unreachable', message: 'Quera responded with HTTP 502' },
    });
  });

  it('reports network failures as unreachable', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(new TypeError('fetch failed'))));

    const result = await scraper.validateSession('test-session');

    expect(result).toEqual({
      ok: false,
      error: { code: 'SourceError', reason: 'unreachable', message: 'Quera could not be reached: fetch failed' },
    });
  });

  it('returns no rows when the deadline section is missing', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => htmlResponse('<html><body></body></html>')));
    expect(await scraper.fetchAssignments('test-session')).toEqual({ ok: true, value: [] });
  });

  it('accepts a session that reaches the course page', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => htmlResponse(fixture)));
    expect(await scraper.validateSession('test-session')).toEqual({ ok: true, value: undefined });
  });
});
