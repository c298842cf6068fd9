import { createHash } from 'node:crypto';
import { z } from 'zod';
import { AuthRequiredError, UnsupportedError } from '../../errors/custom-errors';
import type { Author, AuthorRole, IssueInfo, PageHandle, SeriesInfo, SourceUrl } from '../../types/comic.types';
import { BaseSource } from '../base/base-source';
import type { SourceSession } from '../session';

const API_BASE = 'https://www.dcuniverseinfinite.com/api';
const CONSUMER_KEY = 'DA59dtVXYLxajktV';

const PersonSchema = z.object({ display_name: z.string() });

const SeriesSchema = z.object({
  title: z.string(),
  book_uuids: z.object({ issue: z.array(z.string()).default([]) }),
});

const BookSchema = z.object({
  title: z.string().nullish(),
  series_title: z.string().nullish(),
  description: z.string().nullish(),
  publisher: z.string().nullish(),
  issue_number: z.string().nullish(),
  authors: z.array(PersonSchema).default([]),
  colorists: z.array(PersonSchema).default([]),
  cover_artists: z.array(PersonSchema).default([]),
  inkers: z.array(PersonSchema).default([]),
  pencillers: z.array(PersonSchema).default([]),
});

const DownloadSchema = z.object({
  uuid: z.string(),
  job_id: z.string(),
  format: z.string(),
  images: z.array(
    z.object({
      signed_url: z.string(),
      page_number: z.number().int().nonnegative(),
    }),
  ),
});

type PeopleField = 'authors' | 'colorists' | 'cover_artists' | 'inkers' | 'pencillers';

const AUTHOR_FIELDS: [PeopleField, AuthorRole][] = [
  ['authors', 'Writer'],
  ['colorists', 'Colorist'],
  ['cover_artists', 'CoverArtist'],
  ['inkers', 'Inker'],
  ['pencillers', 'Penciller'],
];

/**
 * Derive the AES-256 key of one page
 */
export function createPageKey(uuid: string, pageNumber: number, jobId: string, format: string): Uint8Array {
  return new Uint8Array(createHash('sha256').update(`${uuid}${pageNumber}${jobId}${format}`).digest());
}

/**
 * Source for DC Universe Infinite
 *
 * Needs an API key (`sources.dcuniverseinfinite.apiKey`). Pages are prefixed
 * with their plaintext size and IV, then AES-256-CBC encrypted.
 */
export class DCUniverseInfiniteSource extends BaseSource {
  readonly platform = 'dcuniverseinfinite';

  readonly displayName = 'DC Universe Infinite';

  protected getDomain(): string {
    return 'dcuniverseinfinite.com';
  }

  protected defaultHeaders(): Record<string, string> {
    return { 'X-Consumer-Key': CONSUMER_KEY };
  }

  requiresAuthentication(): boolean {
    return true;
  }

  async authenticate(session: SourceSession): Promise<void> {
    const { apiKey } = session.credentials;
    if (!apiKey) {
      throw new AuthRequiredError(`${this.displayName} requires an API key`, this.platform);
    }
    session.setToken(apiKey);
    session.setHeader('Authorization', `Token ${apiKey}`);
  }

  async resolve(url: string): Promise<SourceUrl> {
    return this.matchId(url, [
      { pattern: /comics\/book\/[^/]+\/([^/?#]+)/, kind: 'issue' },
      { pattern: /comics\/series\/[^/]+\/([^/?#]+)/, kind: 'series' },
    ]);
  }

  async getSeries(series: SourceUrl, session: SourceSession): Promise<SeriesInfo> {
    if (series.kind !== 'series') {
      throw new UnsupportedError(`${series.url} is not a ${this.displayName} series`);
    }

    const data = await this.fetchJson(`${API_BASE}/comics/1/series/${series.id}/?trans=en`, session, SeriesSchema);

    return {
      ref: series,
      title: data.title,
      ended: false,
      issues: data.book_uuids.issue.map((id, index) => ({
        ref: {
          platform: this.platform,
          kind: 'issue',
          id,
          url: `https://www.dcuniverseinfinite.com/comics/book/-/${id}/c/reader`,
        },
        order: index + 1,
        metadata: { series: data.title, source: this.displayName },
      })),
    };
  }

  async getIssue(issue: SourceUrl, session: SourceSession): Promise<IssueInfo> {
    const book = await this.fetchJson(`${API_BASE}/comics/1/book/${this.issueId(issue)}/?trans=en`, session, BookSchema);

    const authors: Author[] = AUTHOR_FIELDS.flatMap(([field, role]) =>
      book[field].map((person) => ({ name: person.display_name, role })),
    );
    const issueNumber = book.issue_number ? Number.parseInt(book.issue_number, 10) : Number.NaN;

    return {
      ref: issue,
      order: Number.isNaN(issueNumber) ? 0 : issueNumber,
      metadata: {
        title: book.title ?? undefined,
        series: book.series_title ?? undefined,
        description: book.description ?? undefined,
        publisher: book.publisher ?? undefined,
        issueNumber: Number.isNaN(issueNumber) ? undefined : issueNumber,
        authors,
        source: this.displayName,
      },
    };
  }

  async listPages(issue: SourceUrl, session: SourceSession): Promise<PageHandle[]> {
    const jwt = await this.fetchJson(
      `${API_BASE}/5/1/rights/comic/${this.issueId(issue)}?trans=en`,
      session,
      z.string().min(1),
    );
    const download = await this.fetchJson(
      `${API_BASE}/comics/1/book/download/?page=1&quality=HD&trans=en`,
      session,
      DownloadSchema,
      { headers: { 'X-Auth-JWT': jwt } },
    );

    const images = [...download.images].sort((a, b) => a.page_number - b.page_number);

    return images.map((image, index): PageHandle => ({
      issueId: issue.id,
      index,
      url: image.signed_url,
      decode: {
        type: 'size-prefixed-aes',
        key: createPageKey(download.uuid, image.page_number, download.job_id, download.format),
      },
    }));
  }

  private issueId(issue: SourceUrl): string {
    if (issue.kind !== 'issue') {
      throw new UnsupportedError(`${issue.url} is not a ${this.displayName} book`);
    }
    return issue.id;
  }
}
