import { z } from 'zod';
import { ParseError, UnsupportedError } from '../../errors/custom-errors';
import {
  type Author,
  type IssueInfo,
  type PageHandle,
  parseAuthorRole,
  type SeriesInfo,
  type SourceUrl,
} from '../../types/comic.types';
import { BaseSource } from '../base/base-source';
import type { SourceSession } from '../session';

const SeriesSchema = z.object({
  name: z.string(),
  issues: z.array(z.object({ id: z.string() })),
});

const ComicInfoSchema = z.object({
  'comic-info': z.object({
    title: z.string(),
    'issue-title': z.string().nullish(),
    index: z.number().int().nonnegative().nullish(),
    'cover-image': z.object({ uri: z.string() }).nullish(),
    credits: z.array(z.object({ 'credit-label': z.string(), 'credit-info': z.string() })).default([]),
  }),
});

const PagesSchema = z.object({
  'desktop-pages': z.array(z.array(z.object({ uri: z.string() }))),
});

/**
 * Catalogue entry of a series or an issue (`<series>/<issue>`)
 */
const infoUrl = (id: string): string => `https://universe-meeps.leagueoflegends.com/v1/en_us/comics/${id}/index.json`;

/**
 * Source for the League of Legends universe comics
 */
export class LeagueOfLegendsSource extends BaseSource {
  readonly platform = 'leagueoflegends';

  readonly displayName = 'League of Legends';

  protected getDomain(): string {
    return 'universe.leagueoflegends.com';
  }

  async resolve(url: string): Promise<SourceUrl> {
    return this.matchId(url, [
      { pattern: /\/comic\/([^/?#]+\/[^/?#]+)/, kind: 'issue' },
      { pattern: /\/comic\/([^/?#]+)/, kind: 'series' },
    ]);
  }

  async getSeries(series: SourceUrl, session: SourceSession): Promise<SeriesInfo> {
    if (series.kind !== 'series') {
      throw new UnsupportedError(`${series.url} is not a ${this.displayName} comic series`);
    }

    const data = await this.fetchJson(infoUrl(series.id), session, SeriesSchema);

    return {
      ref: series,
      title: data.name,
      ended: false,
      issues: data.issues.map((issue, index): IssueInfo => {
        const id = `${series.id}/${issue.id}`;
        return {
          ref: {
            platform: this.platform,
            kind: 'issue',
            id,
            url: `https://universe.leagueoflegends.com/en_us/comic/${id}/`,
          },
          order: index + 1,
          metadata: { series: data.name, issueNumber: index + 1, source: this.displayName },
        };
      }),
    };
  }

  async getIssue(issue: SourceUrl, session: SourceSession): Promise<IssueInfo> {
    const info = (await this.fetchJson(infoUrl(this.issueId(issue)), session, ComicInfoSchema))['comic-info'];

    // Credits the reader shows but ComicInfo has no role for are left out
    const authors: Author[] = info.credits
      .map((credit) => ({ name: credit['credit-info'], role: parseAuthorRole(credit['credit-label']) }))
      .filter((author) => author.role !== 'Other');
    const issueTitle = info['issue-title'] ?? undefined;

    return {
      ref: issue,
      order: info.index ?? 0,
      metadata: {
        title: issueTitle,
        series: issueTitle?.replace(`: ${info.title}`, ''),
        issueNumber: info.index ?? undefined,
        authors,
        source: this.displayName,
      },
    };
  }

  /**
   * The cover is not part of the page list, so it is put in front
   */
  async listPages(issue: SourceUrl, session: SourceSession): Promise<PageHandle[]> {
    const id = this.issueId(issue);
    const pages = await this.fetchJson(
      `https://universe-comics.leagueoflegends.com/comics/en_us/${id}/index.json`,
      session,
      PagesSchema,
    );
    const info = await this.fetchJson(infoUrl(id), session, ComicInfoSchema);

    const cover = info['comic-info']['cover-image']?.uri;
    if (!cover) {
      throw new ParseError(`Issue ${id} has no cover image`, issue.url);
    }

    return [cover, ...pages['desktop-pages'].flat().map((page) => page.uri)].map(
      (url, index): PageHandle => ({ issueId: id, index, url, decode: { type: 'identity' } }),
    );
  }

  private issueId(issue: SourceUrl): string {
    if (issue.kind !== 'issue') {
      throw new UnsupportedError(`${issue.url} is not a ${this.displayName} comic issue`);
    }
    return issue.id;
  }
}
