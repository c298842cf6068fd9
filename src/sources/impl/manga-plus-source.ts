import { ParseError, UnsupportedError } from '../../errors/custom-errors';
import type { IssueInfo, IssueMetadata, PageHandle, SeriesInfo, SourceUrl } from '../../types/comic.types';
import { BaseSource } from '../base/base-source';
import type { SourceSession } from '../session';

const API_BASE = 'https://jumpg-webapi.tokyo-cdn.com/api';

/**
 * Responses are protobuf; only a handful of fields are needed, so they are
 * located with byte patterns over a latin1 view of the body.
 */
const PAGE_URL_PATTERN = /\x01(https:\/\/mangaplus\.shueisha\.co\.jp\/drm\/title\/[^\x10]+?)\x10/g;
const PAGE_KEY_PATTERN = /\x01([0-9a-f]{128})\x0a/g;
const CHAPTER_ID_PATTERN = /chapter\/(\d+)/g;
const SERIES_NAME_PATTERN = /\x12.([^\x1a]+?)\x1a/s;
const ISSUE_TITLE_PATTERN = /\x22.([^\x2a]+?)\x2a/s;
const ISSUE_SERIES_PATTERN = /MANGA_Plus ([^\x12]+?)\x12/;
const ISSUE_NUMBER_PATTERN = /#(\d+)/;

/**
 * Convert a hex string to bytes
 *
 * @returns undefined when the string has odd length or non-hex characters
 */
export function hexToBytes(hex: string): Uint8Array | undefined {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    return undefined;
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Source for MANGA Plus
 */
export class MangaPlusSource extends BaseSource {
  readonly platform = 'mangaplus';

  readonly displayName = 'Manga Plus';

  protected getDomain(): string {
    return 'mangaplus.shueisha.co.jp';
  }

  async resolve(url: string): Promise<SourceUrl> {
    return this.matchId(url, [
      { pattern: /viewer\/(\d+)/, kind: 'issue' },
      { pattern: /titles\/(\d+)/, kind: 'series' },
    ]);
  }

  async getSeries(series: SourceUrl, session: SourceSession): Promise<SeriesInfo> {
    if (series.kind !== 'series') {
      throw new UnsupportedError(`${series.url} is not a Manga Plus title`);
    }

    const apiUrl = `${API_BASE}/title_detailV2?title_id=${series.id}`;
    const body = await this.fetchBinary(apiUrl, session);

    const title = SERIES_NAME_PATTERN.exec(body)?.[1];
    if (!title) {
      throw new ParseError('Title name not found', apiUrl);
    }

    const chapterIds = new Set<number>();
    for (const match of body.matchAll(CHAPTER_ID_PATTERN)) {
      if (match[1]) chapterIds.add(Number.parseInt(match[1], 10));
    }

    // Chapter names are not in a fixed position here; metadata is fetched per chapter
    const issues: IssueInfo[] = Array.from(chapterIds)
      .sort((a, b) => a - b)
      .map((id) => ({
        ref: {
          platform: this.platform,
          kind: 'issue',
          id: String(id),
          url: `https://mangaplus.shueisha.co.jp/viewer/${id}`,
        },
        order: id,
        metadata: { series: title, source: this.displayName, readingDirection: 'rtl' },
      }));

    return { ref: series, title, ended: false, issues };
  }

  async getIssue(issue: SourceUrl, session: SourceSession): Promise<IssueInfo> {
    const body = await this.fetchBinary(this.viewerUrl(issue), session);
    return {
      ref: issue,
      order: Number.parseInt(issue.id, 10),
      metadata: this.parseMetadata(body),
    };
  }

  async listPages(issue: SourceUrl, session: SourceSession): Promise<PageHandle[]> {
    const apiUrl = this.viewerUrl(issue);
    const body = await this.fetchBinary(apiUrl, session);

    const urls = Array.from(body.matchAll(PAGE_URL_PATTERN), (match) => match[1]);
    const keys = Array.from(body.matchAll(PAGE_KEY_PATTERN), (match) => match[1]);

    if (urls.length === 0) {
      throw new ParseError('No pages found in chapter response', apiUrl);
    }
    if (urls.length !== keys.length) {
      throw new ParseError(`Found ${urls.length} pages but ${keys.length} keys`, apiUrl);
    }

    return urls.map((url, index): PageHandle => {
      const key = hexToBytes(keys[index] ?? '');
      if (!url || !key) {
        throw new ParseError(`Malformed page entry ${index}`, apiUrl);
      }
      return { issueId: issue.id, index, url, decode: { type: 'xor', key } };
    });
  }

  /**
   * Extract chapter metadata from a manga_viewer response
   */
  parseMetadata(body: string): IssueMetadata {
    const issueNumber = ISSUE_NUMBER_PATTERN.exec(body)?.[1];
    return {
      title: ISSUE_TITLE_PATTERN.exec(body)?.[1],
      series: ISSUE_SERIES_PATTERN.exec(body)?.[1],
      issueNumber: issueNumber ? Number.parseInt(issueNumber, 10) : undefined,
      readingDirection: 'rtl',
      source: this.displayName,
    };
  }

  private viewerUrl(issue: SourceUrl): string {
    if (issue.kind !== 'issue') {
      throw new UnsupportedError(`${issue.url} is not a Manga Plus chapter`);
    }
    return `${API_BASE}/manga_viewer?chapter_id=${issue.id}&split=yes&img_quality=super_high`;
  }

  private async fetchBinary(url: string, session: SourceSession): Promise<string> {
    const bytes = await this.fetchBytes(url, session);
    return Buffer.from(bytes).toString('latin1');
  }
}
