import * as cheerio from 'cheerio';
import type { z } from 'zod';
import {
  AuthRequiredError,
  InvalidUrlError,
  NetworkError,
  PageMissingError,
  PanelgrabError,
  ParseError,
  errorMessage,
} from '../../errors/custom-errors';
import type { IssueInfo, PageHandle, SeriesInfo, SourceUrl } from '../../types/comic.types';
import type { SourceAdapter } from '../../types/source.types';
import { extractDomain } from '../../utils/url-utils';
import type { SourceSession } from '../session';

export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const ANDROID_USER_AGENT =
  'Mozilla/5.0 (Linux; Android 9; ASUS_X00TD; Flow) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/359.0.0.288 Mobile Safari/537.36';

const REQUEST_TIMEOUT_MS = 30_000;

/**
 * A URL pattern whose first capture group is the platform id
 */
export type IdPattern = {
  pattern: RegExp;
  kind: SourceUrl['kind'];
};

type RequestOptions = {
  headers?: Record<string, string>;
  /** Pages map 404 to PageMissing; everything else to ParseError */
  resource?: 'page' | 'data';
  /** Sent as a JSON POST body */
  json?: unknown;
};

/**
 * Base source class with common functionality
 */
export abstract class BaseSource implements SourceAdapter {
  abstract readonly platform: string;

  abstract readonly displayName: string;

  /**
   * Domain the platform is served from (subdomains match too)
   */
  protected abstract getDomain(): string;

  abstract resolve(url: string, session: SourceSession): Promise<SourceUrl>;

  abstract getSeries(series: SourceUrl, session: SourceSession): Promise<SeriesInfo>;

  abstract getIssue(issue: SourceUrl, session: SourceSession): Promise<IssueInfo>;

  abstract listPages(issue: SourceUrl, session: SourceSession): Promise<PageHandle[]>;

  /**
   * Check if source supports the given URL
   */
  supports(url: string): boolean {
    try {
      const domain = extractDomain(url);
      return domain === this.getDomain() || domain.endsWith(`.${this.getDomain()}`);
    } catch {
      return false;
    }
  }

  requiresAuthentication(): boolean {
    return false;
  }

  /**
   * Headers the platform expects on every request
   */
  protected defaultHeaders(): Record<string, string> {
    return {};
  }

  /**
   * Cookies the platform expects on every request
   */
  protected defaultCookies(): Record<string, string> {
    return {};
  }

  /**
   * Fetch page bytes as they are served
   */
  async fetchPage(handle: PageHandle, session: SourceSession): Promise<Uint8Array> {
    return this.fetchBytes(handle.url, session, { headers: handle.headers, resource: 'page' });
  }

  /**
   * Match URL against id patterns in order; first capture group becomes the id
   */
  protected matchId(url: string, patterns: IdPattern[]): SourceUrl {
    for (const { pattern, kind } of patterns) {
      const id = pattern.exec(url)?.[1];
      if (id) {
        return { platform: this.platform, kind, id, url };
      }
    }
    throw new InvalidUrlError(`URL is not a ${this.displayName} series or issue: "${url}"`, url);
  }

  /**
   * Fetch URL with session headers and map HTTP failures onto error kinds
   */
  protected async request(url: string, session: SourceSession, options: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = {
      'User-Agent': DESKTOP_USER_AGENT,
      Accept: '*/*',
      'Accept-Language': 'en-US,en;q=0.9',
      ...this.defaultHeaders(),
      ...session.requestHeaders(this.defaultCookies()),
      ...options.headers,
    };
    const body = options.json === undefined ? undefined : JSON.stringify(options.json);
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: body === undefined ? 'GET' : 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      throw new NetworkError(`Request failed: ${errorMessage(error)}`, url);
    }

    if (response.ok) {
      return response;
    }

    const status = `HTTP ${response.status}: ${response.statusText}`;

    if (response.status === 401 || response.status === 403) {
      throw new AuthRequiredError(`${this.displayName} refused access (${status})`, this.platform);
    }
    if (response.status === 404 || response.status === 410) {
      if (options.resource === 'page') {
        throw new PageMissingError(`Page not found (${status})`, url);
      }
      throw new ParseError(`Resource not found (${status})`, url);
    }
    if (response.status === 408 || response.status === 429 || response.status >= 500) {
      throw new NetworkError(status, url, response.status);
    }
    throw new ParseError(`Unexpected response (${status})`, url);
  }

  protected async fetchText(url: string, session: SourceSession, options?: RequestOptions): Promise<string> {
    const response = await this.request(url, session, options);
    return this.readBody(url, () => response.text());
  }

  protected async fetchBytes(url: string, session: SourceSession, options?: RequestOptions): Promise<Uint8Array> {
    const response = await this.request(url, session, options);
    const buffer = await this.readBody(url, () => response.arrayBuffer());
    return new Uint8Array(buffer);
  }

  /**
   * Fetch JSON and validate it against a schema
   */
  protected async fetchJson<S extends z.ZodType>(
    url: string,
    session: SourceSession,
    schema: S,
    options?: RequestOptions,
  ): Promise<z.infer<S>> {
    const text = await this.fetchText(url, session, options);
    return this.parseJson(text, schema, url);
  }

  protected parseJson<S extends z.ZodType>(text: string, schema: S, url?: string): z.infer<S> {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ParseError(`Invalid JSON from ${this.displayName}: ${errorMessage(error)}`, url);
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
      throw new ParseError(`Unexpected ${this.displayName} response${where}: ${issue?.message ?? 'invalid'}`, url);
    }
    return result.data;
  }

  /**
   * Parse cheerio document from HTML
   */
  protected parseHtml(html: string): cheerio.CheerioAPI {
    return cheerio.load(html);
  }

  /**
   * Parse the first integer in a text, e.g. "#12" or "Episode 3"
   */
  protected parseNumber(text: string | undefined): number | undefined {
    const match = text?.match(/(\d+)/);
    return match?.[1] ? Number.parseInt(match[1], 10) : undefined;
  }

  private async readBody<T>(url: string, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      if (error instanceof PanelgrabError) throw error;
      throw new NetworkError(`Failed to read response body: ${errorMessage(error)}`, url);
    }
  }
}
