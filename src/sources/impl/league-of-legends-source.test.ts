import { afterEach, describe, expect, it, vi } from 'vitest';
import { ParseError } from '../../errors/custom-errors';
import { SourceSession } from '../session';
import { LeagueOfLegendsSource } from './league-of-legends-source';

const MEEPS = 'https://universe-meeps.leagueoflegends.com/v1/en_us/comics';
const SERIES_URL = 'https://universe.leagueoflegends.com/en_us/comic/samplesaga';
const ISSUE_URL = 'https://universe.leagueoflegends.com/en_us/comic/samplesaga/issue-2/0/';

const issueInfo = {
  'comic-info': {
    title: 'Issue #2',
    'issue-title': 'Sample Saga: Issue #2',
    index: 2,
    'cover-image': { uri: 'https://cdn.example.com/samplesaga/2/cover.jpg' },
    credits: [
      { 'credit-label': 'Writer', 'credit-info': 'Writer One' },
      { 'credit-label': 'Inks', 'credit-info': 'Artist Two' },
      { 'credit-label': 'Special Thanks', 'credit-info': 'Friend Three' },
      { 'credit-label': 'Editor', 'credit-info': 'Editor Four' },
    ],
  },
};

function stubRoutes(routes: Record<string, unknown>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const body = routes[String(input)];
    return body === undefined ? new Response('', { status: 404 }) : new Response(JSON.stringify(body));
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('LeagueOfLegendsSource', () => {
  const source = new LeagueOfLegendsSource();
  const session = new SourceSession();

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should resolve series and issue URLs', async () => {
    expect(await source.resolve(SERIES_URL)).toEqual({
      platform: 'leagueoflegends',
      kind: 'series',
      id: 'samplesaga',
      url: SERIES_URL,
    });
    expect(await source.resolve(ISSUE_URL)).toMatchObject({ kind: 'issue', id: 'samplesaga/issue-2' });
    expect(source.supports(ISSUE_URL)).toBe(true);
    expect(source.supports('https://www.leagueoflegends.com/en-us/news/')).toBe(false);
  });

  it('should list issues of a series', async () => {
    stubRoutes({
      [`${MEEPS}/samplesaga/index.json`]: { name: 'Sample Saga', issues: [{ id: 'issue-1' }, { id: 'issue-2' }] },
    });

    const series = await source.getSeries(await source.resolve(SERIES_URL), session);

    expect(series.title).toBe('Sample Saga');
    expect(series.issues.map((issue) => [issue.ref.id, issue.order, issue.ref.url])).toEqual([
      ['samplesaga/issue-1', 1, 'https://universe.leagueoflegends.com/en_us/comic/samplesaga/issue-1/'],
      ['samplesaga/issue-2', 2, 'https://universe.leagueoflegends.com/en_us/comic/samplesaga/issue-2/'],
    ]);
  });

  it('should derive series name and credits from the issue', async () => {
    stubRoutes({ [`${MEEPS}/samplesaga/issue-2/index.json`]: issueInfo });

    const issue = await source.getIssue(await source.resolve(ISSUE_URL), session);

    expect(issue.order).toBe(2);
    expect(issue.metadata).toEqual({
      title: 'Sample Saga: Issue #2',
      series: 'Sample Saga',
      issueNumber: 2,
      authors: [
        { name: 'Writer One', role: 'Writer' },
        { name: 'Artist Two', role: 'Inker' },
        { name: 'Editor Four', role: 'Editor' },
      ],
      source: 'League of Legends',
    });
  });

  it('should put the cover before the reader pages', async () => {
    stubRoutes({
      [`${MEEPS}/samplesaga/issue-2/index.json`]: issueInfo,
      'https://universe-comics.leagueoflegends.com/comics/en_us/samplesaga/issue-2/index.json': {
        'desktop-pages': [
          [{ uri: 'https://cdn.example.com/samplesaga/2/p1.jpg' }, { uri: 'https://cdn.example.com/samplesaga/2/p2.jpg' }],
          [{ uri: 'https://cdn.example.com/samplesaga/2/p3.jpg' }],
        ],
      },
    });

    const pages = await source.listPages(await source.resolve(ISSUE_URL), session);

    expect(pages.map((page) => [page.index, page.url])).toEqual([
      [0, 'https://cdn.example.com/samplesaga/2/cover.jpg'],
      [1, 'https://cdn.example.com/samplesaga/2/p1.jpg'],
      [2, 'https://cdn.example.com/samplesaga/2/p2.jpg'],
      [3, 'https://cdn.example.com/samplesaga/2/p3.jpg'],
    ]);
  });

  it('should fail when the issue has no cover', async () => {
    stubRoutes({
      [`${MEEPS}/samplesaga/issue-2/index.json`]: { 'comic-info': { title: 'Issue #2' } },
      'https://universe-comics.leagueoflegends.com/comics/en_us/samplesaga/issue-2/index.json': { 'desktop-pages': [] },
    });

    await expect(source.listPages(await source.resolve(ISSUE_URL), session)).rejects.toThrow(ParseError);
  });
});
