import { z } from 'zod';
import { ParseError, UnsupportedError } from '../../errors/custom-errors';
import type { IssueInfo, IssueMetadata, PageHandle, SeriesInfo, SourceUrl } from '../../types/comic.types';
import { BaseSource } from '../base/base-source';
import type { SourceSession } from '../session';

const IdSchema = z.union([z.string(), z.number()]).transform(String);

const SeriesSchema = z.object({
  name: z.string(),
  status: z.string().optional(),
});

const VolumesSchema = z.object({
  albums: z.array(
    z.object({
      id: IdSchema,
      title: z.string().optional(),
      volume: z.union([z.string(), z.number()]).optional(),
    }),
  ),
});

const BookSchema = z.object({
  data: z.object({
    id: IdSchema,
    state: z.string(),
    readDirection: z.string().optional(),
    pages: z.array(
      z.object({
        albumPageNumber: z.number().int().nonnegative(),
        key: z.string(),
        iv: z.string(),
      }),
    ),
    endingPageRules: z
      .object({
        ctaAlbum: z
          .object({
            title: z.string().optional(),
            serie_name: z.string().optional(),
            authors: z.array(z.object({ nickname: z.string() })).optional(),
          })
          .optional(),
      })
      .optional(),
  }),
});

type Book = z.infer<typeof BookSchema>;

/**
 * Source for izneo.com
 *
 * Pages are AES-128-CBC encrypted; key and IV come base64 encoded with the book.
 */
export class IzneoSource extends BaseSource {
  readonly platform = 'izneo';

  readonly displayName = 'Izneo';

  protected getDomain(): string {
    return 'izneo.com';
  }

  async resolve(url: string): Promise<SourceUrl> {
    return this.matchId(url, [
      { pattern: /izneo\.com\/\w+\/[^/]+\/[^/]+\/[^/]+\/[^/?#]+-(\d+)\/read/, kind: 'issue' },
      { pattern: /izneo\.com\/\w+\/[^/]+\/[^/]+\/[^/?#]+-(\d+)\/?(?:[?#].*)?$/, kind: 'series' },
    ]);
  }

  async getSeries(series: SourceUrl, session: SourceSession): Promise<SeriesInfo> {
    if (series.kind !== 'series') {
      throw new UnsupportedError(`${series.url} is not an Izneo series`);
    }

    const base = `https://izneo.com/en/api/android/serie/${series.id}`;
    const info = await this.fetchJson(base, session, SeriesSchema);
    const volumes = await this.fetchJson(`${base}/volumes/old/0/10000`, session, VolumesSchema);

    return {
      ref: series,
      title: info.name,
      ended: info.status?.toLowerCase() === 'finished',
      issues: volumes.albums.map((album, index) => ({
        ref: {
          platform: this.platform,
          kind: 'issue',
          id: album.id,
          url: `https://www.izneo.com/book/${album.id}`,
        },
        order: index + 1,
        metadata: {
          title: album.title,
          series: info.name,
          issueNumber: album.volume !== undefined ? this.parseNumber(String(album.volume)) : undefined,
          source: this.displayName,
        },
      })),
    };
  }

  async getIssue(issue: SourceUrl, session: SourceSession): Promise<IssueInfo> {
    const book = await this.fetchBook(issue, session);
    return {
      ref: issue,
      order: Number.parseInt(issue.id, 10),
      metadata: { ...this.toMetadata(book), pageCount: book.data.pages.length },
    };
  }

  async listPages(issue: SourceUrl, session: SourceSession): Promise<PageHandle[]> {
    const book = await this.fetchBook(issue, session);
    const { id, state, pages } = book.data;
    const preview = state === 'preview' ? '?type=preview' : '';

    return pages.map((page, index): PageHandle => {
      const key = Buffer.from(page.key, 'base64');
      const iv = Buffer.from(page.iv, 'base64');
      if (key.length !== 16 || iv.length !== 16) {
        throw new ParseError(`Page ${index} has an invalid key or IV`, issue.url);
      }
      return {
        issueId: issue.id,
        index,
        url: `https://www.izneo.com/book/${id}/${page.albumPageNumber}${preview}`,
        decode: { type: 'aes-cbc', key: new Uint8Array(key), iv: new Uint8Array(iv) },
      };
    });
  }

  private toMetadata(book: Book): IssueMetadata {
    const info = book.data.endingPageRules?.ctaAlbum;
    return {
      title: info?.title,
      series: info?.serie_name,
      authors: (info?.authors ?? []).map((author) => ({ name: author.nickname, role: 'Other' })),
      readingDirection: book.data.readDirection?.toLowerCase() === 'rtl' ? 'rtl' : 'ltr',
      source: this.displayName,
    };
  }

  private async fetchBook(issue: SourceUrl, session: SourceSession): Promise<Book> {
    if (issue.kind !== 'issue') {
      throw new UnsupportedError(`${issue.url} is not an Izneo album`);
    }
    return this.fetchJson(`https://www.izneo.com/book/${issue.id}`, session, BookSchema);
  }
}
