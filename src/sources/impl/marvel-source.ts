import { z } from 'zod';
import { AuthRequiredError, ParseError, UnsupportedError } from '../../errors/custom-errors';
import {
  type Author,
  type IssueInfo,
  type PageHandle,
  parseAuthorRole,
  parseReleaseDate,
  type SeriesInfo,
  type SourceUrl,
} from '../../types/comic.types';
import { BaseSource } from '../base/base-source';
import type { SourceSession } from '../session';

// Public developer key of the marvel.com series widget
const GATEWAY_KEY = '83ac0da31d3f6801f2c73c7e07ad76e8';

/** Ongoing series carry this as their end year */
const OPEN_END_YEAR = 2099;

const results = <T extends z.ZodType>(item: T) => z.object({ data: z.object({ results: z.array(item) }) });

const BrowseSchema = results(z.object({ digital_id: z.union([z.string(), z.number()]).nullish() }));

const GatewaySeriesSchema = results(z.object({ title: z.string(), endYear: z.number().nullish() }));

const MetadataSchema = results(
  z.object({
    issue_meta: z.object({
      title: z.string().nullish(),
      series_title: z.string().nullish(),
      release_date: z.string().nullish(),
      creators: z
        .object({
          extended_list: z.array(z.object({ full_name: z.string().nullish(), role: z.string().nullish() })).nullish(),
        })
        .nullish(),
    }),
  }),
);

const AssetsSchema = results(
  z.object({
    pages: z.array(z.object({ assets: z.object({ source: z.string().nullish() }) })),
  }),
);

/**
 * Source for Marvel Unlimited
 *
 * The session cookie of a logged-in browser goes in `sources.marvel.apiKey`.
 * Catalogue links (`/comics/issue/<id>/<slug>`) are mapped to the digital
 * comic id by reading the catalogue page.
 */
export class MarvelSource extends BaseSource {
  readonly platform = 'marvel';

  readonly displayName = 'Marvel';

  protected getDomain(): string {
    return 'marvel.com';
  }

  requiresAuthentication(): boolean {
    return true;
  }

  async authenticate(session: SourceSession): Promise<void> {
    const { apiKey } = session.credentials;
    if (!apiKey) {
      throw new AuthRequiredError(`${this.displayName} requires the PHPSESSID cookie as API key`, this.platform);
    }
    session.setCookie('PHPSESSID', apiKey);
  }

  async resolve(url: string, session: SourceSession): Promise<SourceUrl> {
    const catalogueId = /\/comics\/issue\/(\d+\/[^?#]+)/.exec(url)?.[1];
    if (catalogueId) {
      const html = await this.fetchText(`https://www.marvel.com/comics/issue/${catalogueId}`, session);
      const id = /digital_comic_id: "(\d+)"/.exec(html)?.[1];
      if (!id) {
        throw new ParseError('Catalogue page names no digital comic', url);
      }
      return { platform: this.platform, kind: 'issue', id, url };
    }

    return this.matchId(url, [
      { pattern: /read\.marvel\.com\/#\/book\/(\d+)/, kind: 'issue' },
      { pattern: /\/comics\/series\/(\d+)/, kind: 'series' },
    ]);
  }

  async getSeries(series: SourceUrl, session: SourceSession): Promise<SeriesInfo> {
    if (series.kind !== 'series') {
      throw new UnsupportedError(`${series.url} is not a ${this.displayName} series`);
    }

    const browse = await this.fetchJson(
      `https://api.marvel.com/browse/comics?byType=comic_series&isDigital=1&limit=10000&byId=${series.id}`,
      session,
      BrowseSchema,
    );
    const gateway = await this.fetchJson(
      `https://gateway.marvel.com:443/v1/public/series/${series.id}?apikey=${GATEWAY_KEY}`,
      session,
      GatewaySeriesSchema,
      { headers: { Referer: 'https://developer.marvel.com/' } },
    );

    const info = gateway.data.results[0];
    if (!info) {
      throw new ParseError(`Series ${series.id} not found`, series.url);
    }

    const ids = browse.data.results.flatMap((result) =>
      result.digital_id === null || result.digital_id === undefined ? [] : [String(result.digital_id)],
    );

    return {
      ref: series,
      title: info.title,
      ended: info.endYear !== undefined && info.endYear !== null && info.endYear !== OPEN_END_YEAR,
      issues: ids.map((id, index): IssueInfo => ({
        ref: { platform: this.platform, kind: 'issue', id, url: `https://read.marvel.com/#/book/${id}` },
        order: index + 1,
        metadata: { series: info.title, publisher: this.displayName, source: this.displayName },
      })),
    };
  }

  async getIssue(issue: SourceUrl, session: SourceSession): Promise<IssueInfo> {
    const response = await this.fetchJson(
      `https://bifrost.marvel.com/v1/catalog/digital-comics/metadata/${this.issueId(issue)}`,
      session,
      MetadataSchema,
    );
    const meta = response.data.results[0]?.issue_meta;
    if (!meta) {
      throw new ParseError(`No metadata for issue ${issue.id}`, issue.url);
    }

    const authors: Author[] = (meta.creators?.extended_list ?? []).flatMap((creator) =>
      creator.full_name && creator.role ? [{ name: creator.full_name, role: parseAuthorRole(creator.role) }] : [],
    );
    const number = meta.title ? /#(\d+)/.exec(meta.title)?.[1] : undefined;
    const issueNumber = number ? Number.parseInt(number, 10) : undefined;

    return {
      ref: issue,
      order: issueNumber ?? 0,
      metadata: {
        title: meta.title ?? undefined,
        series: meta.series_title ?? undefined,
        publisher: this.displayName,
        issueNumber,
        ...(meta.release_date ? parseReleaseDate(meta.release_date) : {}),
        authors,
        source: this.displayName,
      },
    };
  }

  async listPages(issue: SourceUrl, session: SourceSession): Promise<PageHandle[]> {
    const response = await this.fetchJson(
      `https://bifrost.marvel.com/v1/catalog/digital-comics/web/assets/${this.issueId(issue)}`,
      session,
      AssetsSchema,
    );
    const pages = response.data.results[0]?.pages ?? [];

    return pages
      .flatMap((page) => (page.assets.source ? [page.assets.source] : []))
      .map((url, index): PageHandle => ({ issueId: issue.id, index, url, decode: { type: 'identity' } }));
  }

  private issueId(issue: SourceUrl): string {
    if (issue.kind !== 'issue') {
      throw new UnsupportedError(`${issue.url} is not a ${this.displayName} comic`);
    }
    return issue.id;
  }
}
