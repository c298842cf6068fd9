import { afterEach, describe, expect, it, vi } from 'vitest';
import { ParseError } from '../../errors/custom-errors';
import { SourceSession } from '../session';
import { FlippSource } from './flipp-source';

const SIGNIN = 'https://flippapi.egmontservice.com/api/signin';
const EDITION_URL = 'https://reader.flipp.dk/html5/reader/production/default.aspx?pubname=&edid=ed-0042';
const SERIES_URL = 'https://magasiner.flipp.dk/flipp/web-app/#/publications/pub-sample';

function stubRoutes(routes: Record<string, unknown>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const body = routes[String(input)];
    if (body === undefined) return new Response('', { status: 404 });
    return new Response(typeof body === 'string' ? body : JSON.stringify(body));
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('FlippSource', () => {
  const source = new FlippSource();
  const session = new SourceSession();

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should resolve an edition through its reader page', async () => {
    stubRoutes({ [EDITION_URL]: '<script>var publicationguid = "pub-sample";</script>' });

    expect(await source.resolve(EDITION_URL, session)).toEqual({
      platform: 'flipp',
      kind: 'issue',
      id: 'pub-sample/ed-0042',
      url: EDITION_URL,
    });
  });

  it('should fail when the reader page names no publication', async () => {
    stubRoutes({ [EDITION_URL]: '<html></html>' });
    await expect(source.resolve(EDITION_URL, session)).rejects.toThrow(ParseError);
  });

  it('should resolve publication URLs without a request', async () => {
    const fetchMock = stubRoutes({});
    expect(await source.resolve(SERIES_URL, session)).toMatchObject({ kind: 'series', id: 'pub-sample' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should sign in anonymously and list editions oldest first', async () => {
    const fetchMock = stubRoutes({
      [SIGNIN]: {
        publications: [
          { name: 'Other Mag', customPublicationCode: 'pub-other', issues: [] },
          {
            name: 'Sample Album',
            customPublicationCode: 'pub-sample',
            issues: [
              { customIssueCode: 'ed-0043', issueName: 'Nr. 2' },
              { customIssueCode: 42, issueName: 'Nr. 1' },
            ],
          },
        ],
      },
    });

    const series = await source.getSeries(await source.resolve(SERIES_URL, session), session);

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init?.body))).toMatchObject({ languageCulture: 'da-DK', email: '' });

    expect(series.title).toBe('Sample Album');
    expect(series.issues).toEqual([
      {
        ref: {
          platform: 'flipp',
          kind: 'issue',
          id: 'pub-sample/42',
          url: 'https://reader.flipp.dk/html5/reader/production/default.aspx?pubname=&edid=42',
        },
        order: 1,
        metadata: { title: 'Sample Album Nr. 1', series: 'Sample Album', source: 'Flipp' },
      },
      {
        ref: {
          platform: 'flipp',
          kind: 'issue',
          id: 'pub-sample/ed-0043',
          url: 'https://reader.flipp.dk/html5/reader/production/default.aspx?pubname=&edid=ed-0043',
        },
        order: 2,
        metadata: { title: 'Sample Album Nr. 2', series: 'Sample Album', source: 'Flipp' },
      },
    ]);
  });

  it('should fail for an unknown publication', async () => {
    stubRoutes({ [SIGNIN]: { publications: [] } });
    await expect(source.getSeries(await source.resolve(SERIES_URL, session), session)).rejects.toThrow(
      'Publication pub-sample not found',
    );
  });

  it('should map preview images to full-size pages', async () => {
    stubRoutes({
      [EDITION_URL]: 'publicationguid = "pub-sample"',
      'https://reader.flipp.dk/html5/reader/get_page_groups_from_eid.aspx?pubid=pub-sample&eid=ed-0042': {
        pageGroups: [
          { pages: [{ image: 'http://pages.cdn.pagesuite.com/a/b/page-0001/lowpage.jpg?h=120' }] },
          { pages: [{ image: 'http://pages.cdn.pagesuite.com/c/d/page-0002/lowpage.jpg?h=120' }] },
        ],
      },
    });

    const pages = await source.listPages(await source.resolve(EDITION_URL, session), session);

    expect(pages.map((page) => page.url)).toEqual([
      'http://pages.cdn.pagesuite.com/a/b/page-0001/highpage.jpg?method=true',
      'http://pages.cdn.pagesuite.com/c/d/page-0002/highpage.jpg?method=true',
    ]);
    expect(pages.map((page) => page.index)).toEqual([0, 1]);
  });

  it('should only know the platform name of a single edition', async () => {
    stubRoutes({ [EDITION_URL]: 'publicationguid = "pub-sample"' });
    const issue = await source.getIssue(await source.resolve(EDITION_URL, session));
    expect(issue.metadata).toEqual({ source: 'Flipp' });
  });
});
