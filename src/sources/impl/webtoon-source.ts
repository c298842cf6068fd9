import type { CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { ParseError, UnsupportedError } from '../../errors/custom-errors';
import type { Author, IssueInfo, PageHandle, SeriesInfo, SourceUrl } from '../../types/comic.types';
import { absoluteUrl } from '../../utils/url-utils';
import { ANDROID_USER_AGENT, BaseSource, type IdPattern } from '../base/base-source';
import type { SourceSession } from '../session';

const ISSUE_PATTERN: IdPattern = {
  pattern: /webtoons\.com\/(\w+\/[^/]+\/[^/]+\/[^/]+\/viewer\?\S*?episode_no=\d+)/,
  kind: 'issue',
};

const SERIES_PATTERN: IdPattern = {
  pattern: /webtoons\.com\/(\w+\/[^/]+\/[^/]+\/list\?title_no=\d+)/,
  kind: 'series',
};

/**
 * Source for webtoons.com
 *
 * Series are read from the mobile episode list, which is not paginated.
 * Page images are served as-is but require a Referer.
 */
export class WebtoonSource extends BaseSource {
  readonly platform = 'webtoon';

  readonly displayName = 'Webtoon';

  protected getDomain(): string {
    return 'webtoons.com';
  }

  protected defaultCookies(): Record<string, string> {
    return { needGDPR: 'false', needCCPA: 'false', needCOPPA: 'false' };
  }

  async resolve(url: string): Promise<SourceUrl> {
    return this.matchId(url, [ISSUE_PATTERN, SERIES_PATTERN]);
  }

  async getSeries(series: SourceUrl, session: SourceSession): Promise<SeriesInfo> {
    if (series.kind !== 'series') {
      throw new UnsupportedError(`${series.url} is not a Webtoon series`);
    }

    const pageUrl = `https://m.webtoons.com/${series.id}`;
    const html = await this.fetchText(pageUrl, session, { headers: { 'User-Agent': ANDROID_USER_AGENT } });
    const $ = this.parseHtml(html);

    const title = $('meta[property="og:title"]').attr('content')?.trim();
    if (!title) {
      throw new ParseError('Series title not found', pageUrl);
    }

    const episodeList = $('ul#_episodeList');
    if (episodeList.length === 0) {
      throw new ParseError('Episode list not found', pageUrl);
    }

    const issues = new Map<number, IssueInfo>();

    episodeList.find('li a').each((_, element) => {
      const issue = this.parseEpisodeLink($, element, title, pageUrl);
      if (issue && !issues.has(issue.order)) {
        issues.set(issue.order, issue);
      }
    });

    return {
      ref: series,
      title,
      ended: $('.txt_ico_completed2, .ico_completed').length > 0,
      issues: Array.from(issues.values()).sort((a, b) => a.order - b.order),
    };
  }

  async getIssue(issue: SourceUrl, session: SourceSession): Promise<IssueInfo> {
    const pageUrl = this.viewerUrl(issue);
    const $ = this.parseHtml(await this.fetchText(pageUrl, session));
    const order = this.episodeNumber(issue.id);
    if (order === undefined) {
      throw new ParseError('Episode number missing from issue id', pageUrl);
    }

    const authors: Author[] = [];
    const author = $('meta[property="com-linewebtoon:episode:author"]').attr('content')?.trim();
    if (author) {
      authors.push({ name: author, role: 'Writer' });
    }

    const title = $('.subj_episode').first().text().trim();
    const series = $('.subj').first().text().trim();

    return {
      ref: issue,
      order,
      metadata: {
        title: title || undefined,
        series: series || undefined,
        issueNumber: order,
        description: $('meta[property="og:description"]').attr('content')?.trim(),
        authors,
        source: this.displayName,
      },
    };
  }

  async listPages(issue: SourceUrl, session: SourceSession): Promise<PageHandle[]> {
    const pageUrl = this.viewerUrl(issue);
    const $ = this.parseHtml(await this.fetchText(pageUrl, session));

    const urls = $('#_imageList ._images')
      .map((_, element) => $(element).attr('data-url'))
      .get()
      .filter((url): url is string => typeof url === 'string' && url.length > 0);

    if (urls.length === 0) {
      throw new ParseError('No page images found', pageUrl);
    }

    return urls.map((url, index): PageHandle => ({
      issueId: issue.id,
      index,
      url,
      headers: { Referer: 'https://www.webtoons.com/' },
      decode: { type: 'identity' },
    }));
  }

  private parseEpisodeLink($: CheerioAPI, element: AnyNode, seriesTitle: string, pageUrl: string): IssueInfo | undefined {
    const $el = $(element);
    const href = $el.attr('href');
    if (!href) return undefined;

    const link = absoluteUrl(href, pageUrl);
    const id = ISSUE_PATTERN.pattern.exec(link)?.[1];
    const order = this.episodeNumber(link);
    if (!id || order === undefined) return undefined;

    const episodeTitle = $el.find('.sub_title .ellipsis, .sub_title').first().text().trim();

    return {
      ref: { platform: this.platform, kind: 'issue', id, url: link },
      order,
      metadata: {
        title: episodeTitle || `Episode ${order}`,
        series: seriesTitle,
        issueNumber: order,
        source: this.displayName,
      },
    };
  }

  private viewerUrl(issue: SourceUrl): string {
    if (issue.kind !== 'issue') {
      throw new UnsupportedError(`${issue.url} is not a Webtoon episode`);
    }
    return `https://www.webtoons.com/${issue.id}`;
  }

  private episodeNumber(link: string): number | undefined {
    return this.parseNumber(/episode_no=(\d+)/.exec(link)?.[1]);
  }
}
