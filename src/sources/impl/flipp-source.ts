import { z } from 'zod';
import { ParseError, UnsupportedError } from '../../errors/custom-errors';
import type { IssueInfo, PageHandle, SeriesInfo, SourceUrl } from '../../types/comic.types';
import { BaseSource } from '../base/base-source';
import type { SourceSession } from '../session';

const READER = 'https://reader.flipp.dk/html5/reader';

const EDITION_PATTERN = /reader\.flipp\.dk\/html5\/reader\/production\/default\.aspx\?pubname=&edid=([^/&#]+)/;

const PUBLICATION_PATTERN = /magasiner\.flipp\.dk\/flipp\/web-app\/#\/publications\/([^/?#]+)/;

const SIGNIN_BODY = {
  email: '',
  password: '',
  token: '',
  languageCulture: 'da-DK',
  appId: '',
  appVersion: '',
  uuid: '',
  os: '',
};

const SigninSchema = z.object({
  publications: z.array(
    z.object({
      name: z.string(),
      customPublicationCode: z.string(),
      issues: z.array(z.object({ customIssueCode: z.union([z.string(), z.number()]), issueName: z.string() })),
    }),
  ),
});

const PageGroupsSchema = z.object({
  pageGroups: z.array(z.object({ pages: z.array(z.object({ image: z.string() })).min(1) })),
});

/**
 * Source for Flipp (Danish magazines and comic albums)
 *
 * Issue ids are `<publication id>/<edition id>`. The publication list comes
 * from an anonymous sign-in, newest edition first.
 */
export class FlippSource extends BaseSource {
  readonly platform = 'flipp';

  readonly displayName = 'Flipp';

  protected getDomain(): string {
    return 'flipp.dk';
  }

  async resolve(url: string, session: SourceSession): Promise<SourceUrl> {
    const editionId = EDITION_PATTERN.exec(url)?.[1];
    if (editionId) {
      const html = await this.fetchText(`${READER}/production/default.aspx?pubname=&edid=${editionId}`, session);
      const publicationId = /publicationguid = "([^"]+)"/.exec(html)?.[1];
      if (!publicationId) {
        throw new ParseError('Reader page names no publication', url);
      }
      return { platform: this.platform, kind: 'issue', id: `${publicationId}/${editionId}`, url };
    }

    return this.matchId(url, [{ pattern: PUBLICATION_PATTERN, kind: 'series' }]);
  }

  async getSeries(series: SourceUrl, session: SourceSession): Promise<SeriesInfo> {
    if (series.kind !== 'series') {
      throw new UnsupportedError(`${series.url} is not a ${this.displayName} publication`);
    }

    const data = await this.fetchJson('https://flippapi.egmontservice.com/api/signin', session, SigninSchema, {
      json: SIGNIN_BODY,
    });
    const publication = data.publications.find((candidate) => candidate.customPublicationCode === series.id);
    if (!publication) {
      throw new ParseError(`Publication ${series.id} not found`, series.url);
    }

    const issues = [...publication.issues].reverse();

    return {
      ref: series,
      title: publication.name,
      ended: false,
      issues: issues.map((issue, index): IssueInfo => {
        const editionId = String(issue.customIssueCode);
        return {
          ref: {
            platform: this.platform,
            kind: 'issue',
            id: `${publication.customPublicationCode}/${editionId}`,
            url: `${READER}/production/default.aspx?pubname=&edid=${editionId}`,
          },
          order: index + 1,
          metadata: {
            title: `${publication.name} ${issue.issueName}`,
            series: publication.name,
            source: this.displayName,
          },
        };
      }),
    };
  }

  /**
   * Flipp has no per-issue metadata beyond the publication list
   */
  async getIssue(issue: SourceUrl): Promise<IssueInfo> {
    this.splitId(issue);
    return { ref: issue, order: 0, metadata: { source: this.displayName } };
  }

  async listPages(issue: SourceUrl, session: SourceSession): Promise<PageHandle[]> {
    const { publicationId, editionId } = this.splitId(issue);
    const data = await this.fetchJson(
      `${READER}/get_page_groups_from_eid.aspx?pubid=${publicationId}&eid=${editionId}`,
      session,
      PageGroupsSchema,
    );

    return data.pageGroups.map((group, index): PageHandle => {
      const preview = group.pages[0]?.image ?? '';
      // Preview URLs embed the page path; the full-size image lives under it
      const pagePath = /\/\w\/\w\/[^/]+/.exec(preview)?.[0];
      if (!pagePath) {
        throw new ParseError(`Unexpected page image URL "${preview}"`, issue.url);
      }
      return {
        issueId: issue.id,
        index,
        url: `http://pages.cdn.pagesuite.com${pagePath}/highpage.jpg?method=true`,
        decode: { type: 'identity' },
      };
    });
  }

  private splitId(issue: SourceUrl): { publicationId: string; editionId: string } {
    const [publicationId, editionId] = issue.id.split('/');
    if (issue.kind !== 'issue' || !publicationId || !editionId) {
      throw new UnsupportedError(`${issue.url} is not a ${this.displayName} edition`);
    }
    return { publicationId, editionId };
  }
}
