import { afterEach, describe, expect, it, vi } from 'vitest';
import { AuthRequiredError } from '../../errors/custom-errors';
import { SourceSession } from '../session';
import { createPageKey, DCUniverseInfiniteSource } from './dc-universe-infinite-source';

const API = 'https://www.dcuniverseinfinite.com/api';
const SERIES_URL = 'https://www.dcuniverseinfinite.com/comics/series/sample-knight/11111111-2222-3333-4444-555555555555';
const ISSUE_URL =
  'https://www.dcuniverseinfinite.com/comics/book/sample-knight-1/aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee/c/reader';

function stubRoutes(routes: Record<string, unknown>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const body = routes[String(input)];
    return body === undefined ? new Response('', { status: 404 }) : new Response(JSON.stringify(body));
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

async function authenticatedSession(source: DCUniverseInfiniteSource): Promise<SourceSession> {
  const session = new SourceSession({ apiKey: 'test-secret' });
  await source.authenticate(session);
  return session;
}

describe('createPageKey', () => {
  it('should hash uuid, page number, job id and format', () => {
    const key = createPageKey('761ad52d-b961-49b1-87b6-ca85774fc3a6', 1, 'fcc51f44-4a82-47b1-9eac-13f3f1068571', 'HD');
    expect(Array.from(key)).toEqual([
      221, 142, 219, 226, 164, 30, 108, 77, 254, 230, 3, 14, 0, 205, 167, 253, 92, 26, 25, 15, 124, 214, 129, 246, 39,
      14, 89, 51, 223, 155, 54, 225,
    ]);
  });
});

describe('DCUniverseInfiniteSource', () => {
  const source = new DCUniverseInfiniteSource();

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should resolve series and book URLs', async () => {
    expect(await source.resolve(SERIES_URL)).toEqual({
      platform: 'dcuniverseinfinite',
      kind: 'series',
      id: '11111111-2222-3333-4444-555555555555',
      url: SERIES_URL,
    });
    expect((await source.resolve(ISSUE_URL)).id).toBe('aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee');
  });

  describe('authenticate', () => {
    it('should require an API key', async () => {
      expect(source.requiresAuthentication()).toBe(true);
      await expect(source.authenticate(new SourceSession())).rejects.toThrow(AuthRequiredError);
    });

    it('should send the API key as a token', async () => {
      const session = await authenticatedSession(source);
      expect(session.getToken()).toBe('test-secret');
      expect(session.requestHeaders()).toEqual({ Authorization: 'Token test-secret' });
    });
  });

  it('should list issues of a series in catalogue order', async () => {
    const fetchMock = stubRoutes({
      [`${API}/comics/1/series/11111111-2222-3333-4444-555555555555/?trans=en`]: {
        title: 'Sample Knight',
        book_uuids: { issue: ['issue-b', 'issue-a'] },
      },
    });

    const series = await source.getSeries(await source.resolve(SERIES_URL), await authenticatedSession(source));

    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({
      'X-Consumer-Key': 'DA59dtVXYLxajktV',
      Authorization: 'Token test-secret',
    });
    expect(series.title).toBe('Sample Knight');
    expect(series.issues.map((issue) => [issue.ref.id, issue.order])).toEqual([
      ['issue-b', 1],
      ['issue-a', 2],
    ]);
    expect(series.issues[0]?.ref.url).toBe('https://www.dcuniverseinfinite.com/comics/book/-/issue-b/c/reader');
  });

  it('should read credits from the book', async () => {
    stubRoutes({
      [`${API}/comics/1/book/aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee/?trans=en`]: {
        title: 'Night Watch',
        series_title: 'Sample Knight',
        description: null,
        publisher: 'Example Comics',
        issue_number: '7',
        authors: [{ display_name: 'Writer One' }],
        pencillers: [{ display_name: 'Artist Two' }],
        inkers: [{ display_name: 'Artist Two' }],
      },
    });

    const issue = await source.getIssue(await source.resolve(ISSUE_URL), await authenticatedSession(source));

    expect(issue.order).toBe(7);
    expect(issue.metadata).toEqual({
      title: 'Night Watch',
      series: 'Sample Knight',
      publisher: 'Example Comics',
      issueNumber: 7,
      authors: [
        { name: 'Writer One', role: 'Writer' },
        { name: 'Artist Two', role: 'Inker' },
        { name: 'Artist Two', role: 'Penciller' },
      ],
      source: 'DC Universe Infinite',
    });
  });

  it('should fall back to order 0 without an issue number', async () => {
    stubRoutes({
      [`${API}/comics/1/book/aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee/?trans=en`]: { title: 'Special', issue_number: null },
    });

    const issue = await source.getIssue(await source.resolve(ISSUE_URL), await authenticatedSession(source));
    expect(issue.order).toBe(0);
    expect(issue.metadata.issueNumber).toBeUndefined();
  });

  it('should list pages with per-page keys', async () => {
    const fetchMock = stubRoutes({
      [`${API}/5/1/rights/comic/aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee?trans=en`]: 'test-jwt',
      [`${API}/comics/1/book/download/?page=1&quality=HD&trans=en`]: {
        uuid: 'book-uuid',
        job_id: 'job-1',
        format: 'HD',
        images: [
          { signed_url: 'https://cdn.example.com/p2', page_number: 2 },
          { signed_url: 'https://cdn.example.com/p1', page_number: 1 },
        ],
      },
    });

    const pages = await source.listPages(await source.resolve(ISSUE_URL), await authenticatedSession(source));

    expect(fetchMock.mock.calls[1]?.[1]?.headers).toMatchObject({ 'X-Auth-JWT': 'test-jwt' });
    expect(pages.map((page) => [page.index, page.url])).toEqual([
      [0, 'https://cdn.example.com/p1'],
      [1, 'https://cdn.example.com/p2'],
    ]);
    expect(pages[1]?.decode).toEqual({
      type: 'size-prefixed-aes',
      key: createPageKey('book-uuid', 2, 'job-1', 'HD'),
    });
  });
});
