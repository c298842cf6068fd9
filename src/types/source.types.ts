import type { SourceSession } from '../sources/session';
import type { IssueInfo, PageHandle, SeriesInfo, SourceUrl } from './comic.types';

/**
 * Platform adapter contract
 *
 * Every call may perform network I/O. Calls for different issues or pages may
 * run concurrently against the same adapter and session.
 */
export type SourceAdapter = {
  /**
   * Stable platform id, stored in the update file
   */
  readonly platform: string;

  /**
   * Human readable platform name
   */
  readonly displayName: string;

  /**
   * Check if the adapter recognizes the URL's host
   */
  supports(url: string): boolean;

  /**
   * Parse a URL into a typed handle
   * @throws InvalidUrlError if the URL grammar does not match
   * @throws UnsupportedError if the resource type is not handled
   */
  resolve(url: string, session: SourceSession): Promise<SourceUrl>;

  /**
   * Fetch series title, state and its issues in platform order
   */
  getSeries(series: SourceUrl, session: SourceSession): Promise<SeriesInfo>;

  /**
   * Fetch metadata for a single issue
   */
  getIssue(issue: SourceUrl, session: SourceSession): Promise<IssueInfo>;

  /**
   * List pages in reading order
   */
  listPages(issue: SourceUrl, session: SourceSession): Promise<PageHandle[]>;

  /**
   * Fetch the raw (possibly obfuscated) bytes of one page
   * @throws PageMissingError if the page no longer exists
   */
  fetchPage(handle: PageHandle, session: SourceSession): Promise<Uint8Array>;

  /**
   * Whether `authenticate` must run before listing pages
   */
  requiresAuthentication(): boolean;

  /**
   * Log in using the session's credentials
   */
  authenticate?(session: SourceSession): Promise<void>;
};

/**
 * Source registry interface
 */
export type SourceRegistry = {
  register(adapter: SourceAdapter): void;
  getForUrl(url: string): SourceAdapter;
  getByPlatform(platform: string): SourceAdapter | undefined;
  getPlatforms(): string[];
};
