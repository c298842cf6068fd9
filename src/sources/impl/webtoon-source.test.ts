import { afterEach, describe, expect, it, vi } from 'vitest';
import { AuthRequiredError, InvalidUrlError, NetworkError, PageMissingError } from '../../errors/custom-errors';
import { SourceSession } from '../session';
import { WebtoonSource } from './webtoon-source';

const SERIES_URL = 'https://www.webtoons.com/en/fantasy/tower-sample/list?title_no=99';
const ISSUE_URL = 'https://www.webtoons.com/en/fantasy/tower-sample/episode-2/viewer?title_no=99&episode_no=2';

const SERIES_HTML = `
  <html>
    <head><meta property="og:title" content="Tower Sample"></head>
    <body>
      <span class="txt_ico_completed2">COMPLETED</span>
      <ul id="_episodeList">
        <li>
          <a href="https://m.webtoons.com/en/fantasy/tower-sample/episode-2/viewer?title_no=99&amp;episode_no=2">
            <span class="sub_title"><span class="ellipsis">The Climb</span></span>
          </a>
        </li>
        <li>
          <a href="/en/fantasy/tower-sample/episode-1/viewer?title_no=99&amp;episode_no=1">
            <span class="sub_title"><span class="ellipsis">The Door</span></span>
          </a>
        </li>
        <li><a href="/en/fantasy/tower-sample/episode-1/viewer?title_no=99&amp;episode_no=1">duplicate</a></li>
        <li><a href="/en/notice">Notice</a></li>
      </ul>
    </body>
  </html>
`;

const VIEWER_HTML = `
  <html>
    <head>
      <meta property="og:description" content="The tower opens.">
      <meta property="com-linewebtoon:episode:author" content="Sam Placeholder">
    </head>
    <body>
      <h1 class="subj">Tower Sample</h1>
      <h1 class="subj_episode">The Climb</h1>
      <div id="_imageList">
        <img class="_images" data-url="https://img.example.com/tower/1.jpg">
        <img class="_images" data-url="https://img.example.com/tower/2.jpg">
        <img class="_images">
      </div>
    </body>
  </html>
`;

function stubFetch(respond: (url: string) => Response) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => respond(String(input)));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('WebtoonSource', () => {
  const source = new WebtoonSource();

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('resolve', () => {
    it('should parse series and issue URLs the same way every time', async () => {
      const series = await source.resolve(SERIES_URL);
      expect(series).toEqual({
        platform: 'webtoon',
        kind: 'series',
        id: 'en/fantasy/tower-sample/list?title_no=99',
        url: SERIES_URL,
      });
      expect(await source.resolve(SERIES_URL)).toEqual(series);

      const issue = await source.resolve(ISSUE_URL);
      expect(issue.kind).toBe('issue');
      expect(issue.id).toBe('en/fantasy/tower-sample/episode-2/viewer?title_no=99&episode_no=2');
    });

    it('should reject other pages', async () => {
      await expect(source.resolve('https://www.webtoons.com/en/genres')).rejects.toThrow(InvalidUrlError);
    });
  });

  describe('getSeries', () => {
    it('should list episodes in order without duplicates', async () => {
      const fetchMock = stubFetch(() => new Response(SERIES_HTML));
      const session = new SourceSession();

      const series = await source.getSeries(await source.resolve(SERIES_URL), session);

      expect(fetchMock).toHaveBeenCalledWith(
        'https://m.webtoons.com/en/fantasy/tower-sample/list?title_no=99',
        expect.objectContaining({
          headers: expect.objectContaining({ Cookie: 'needGDPR=false; needCCPA=false; needCOPPA=false' }),
        }),
      );
      expect(series.title).toBe('Tower Sample');
      expect(series.ended).toBe(true);
      expect(series.issues.map((issue) => issue.order)).toEqual([1, 2]);
      expect(series.issues[0]?.metadata).toEqual({
        title: 'The Door',
        series: 'Tower Sample',
        issueNumber: 1,
        source: 'Webtoon',
      });
      expect(series.issues[1]?.ref).toEqual({
        platform: 'webtoon',
        kind: 'issue',
        id: 'en/fantasy/tower-sample/episode-2/viewer?title_no=99&episode_no=2',
        url: 'https://m.webtoons.com/en/fantasy/tower-sample/episode-2/viewer?title_no=99&episode_no=2',
      });
    });

    it('should fail when the episode list is missing', async () => {
      stubFetch(() => new Response('<html><head><meta property="og:title" content="X"></head></html>'));
      await expect(source.getSeries(await source.resolve(SERIES_URL), new SourceSession())).rejects.toThrow(
        'Episode list not found',
      );
    });
  });

  describe('getIssue', () => {
    it('should read metadata from the viewer page', async () => {
      stubFetch(() => new Response(VIEWER_HTML));
      const issue = await source.getIssue(await source.resolve(ISSUE_URL), new SourceSession());

      expect(issue.order).toBe(2);
      expect(issue.metadata).toEqual({
        title: 'The Climb',
        series: 'Tower Sample',
        issueNumber: 2,
        description: 'The tower opens.',
        authors: [{ name: 'Sam Placeholder', role: 'Writer' }],
        source: 'Webtoon',
      });
    });
  });

  describe('listPages', () => {
    it('should return identity pages with a referer', async () => {
      stubFetch(() => new Response(VIEWER_HTML));
      const pages = await source.listPages(await source.resolve(ISSUE_URL), new SourceSession());

      expect(pages).toEqual([
        {
          issueId: 'en/fantasy/tower-sample/episode-2/viewer?title_no=99&episode_no=2',
          index: 0,
          url: 'https://img.example.com/tower/1.jpg',
          headers: { Referer: 'https://www.webtoons.com/' },
          decode: { type: 'identity' },
        },
        {
          issueId: 'en/fantasy/tower-sample/episode-2/viewer?title_no=99&episode_no=2',
          index: 1,
          url: 'https://img.example.com/tower/2.jpg',
          headers: { Referer: 'https://www.webtoons.com/' },
          decode: { type: 'identity' },
        },
      ]);
    });
  });

  describe('fetchPage', () => {
    const handle = {
      issueId: 'x',
      index: 0,
      url: 'https://img.example.com/tower/1.jpg',
      headers: { Referer: 'https://www.webtoons.com/' },
      decode: { type: 'identity' },
    } as const;

    it('should send the page headers and return the body', async () => {
      const fetchMock = stubFetch(() => new Response(new Blob([new Uint8Array([1, 2, 3])])));
      expect(await source.fetchPage(handle, new SourceSession())).toEqual(new Uint8Array([1, 2, 3]));
      expect(fetchMock).toHaveBeenCalledWith(
        handle.url,
        expect.objectContaining({ headers: expect.objectContaining({ Referer: 'https://www.webtoons.com/' }) }),
      );
    });

    it('should map HTTP failures onto error kinds', async () => {
      const session = new SourceSession();

      stubFetch(() => new Response('', { status: 404 }));
      await expect(source.fetchPage(handle, session)).rejects.toThrow(PageMissingError);

      stubFetch(() => new Response('', { status: 503 }));
      await expect(source.fetchPage(handle, session)).rejects.toThrow(NetworkError);

      stubFetch(() => new Response('', { status: 403 }));
      await expect(source.fetchPage(handle, session)).rejects.toThrow(AuthRequiredError);
    });

    it('should treat connection failures as network errors', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => {
          throw new TypeError('fetch failed');
        }),
      );
      await expect(source.fetchPage(handle, new SourceSession())).rejects.toThrow('Request failed: fetch failed');
    });
  });
});
