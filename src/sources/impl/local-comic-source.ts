import { basename, extname, resolve } from 'node:path';
import { listZipEntries, readZipEntries } from '../../archive/archive-reader';
import { PageMissingError, UnsupportedError } from '../../errors/custom-errors';
import {
  COMIC_INFO_FILENAME,
  METADATA_JSON_FILENAME,
  fromComicInfoXml,
  fromMetadataJson,
} from '../../metadata/comic-info';
import type { IssueInfo, IssueMetadata, PageHandle, SeriesInfo, SourceUrl } from '../../types/comic.types';
import type { SourceAdapter } from '../../types/source.types';

const ARCHIVE_PATTERN = /\.(cbz|zip)$/i;

const IMAGE_PATTERN = /\.(png|jpe?g|gif|webp)$/i;

const isPage = (name: string): boolean =>
  IMAGE_PATTERN.test(name) && !name.startsWith('__MACOSX/') && !basename(name).startsWith('.');

const byReadingOrder = (a: string, b: string): number => a.localeCompare(b, undefined, { numeric: true });

/**
 * Comic archives on disk, read back so they can be written again
 *
 * Targets are file paths rather than URLs. Metadata comes from a stored
 * panelgrab.json, else from ComicInfo.xml, else from the file name. Page
 * handles carry the archive path as issue id and the entry name as URL.
 */
export class LocalComicSource implements SourceAdapter {
  readonly platform = 'local';

  readonly displayName = 'Local file';

  supports(target: string): boolean {
    return ARCHIVE_PATTERN.test(target) && !/^[a-z][a-z\d+.-]*:\/\//i.test(target);
  }

  async resolve(target: string): Promise<SourceUrl> {
    return { platform: this.platform, kind: 'issue', id: resolve(target), url: target };
  }

  async getSeries(series: SourceUrl): Promise<SeriesInfo> {
    throw new UnsupportedError(`${series.url} is a single issue, not a series`);
  }

  async getIssue(issue: SourceUrl): Promise<IssueInfo> {
    const wanted = [METADATA_JSON_FILENAME, COMIC_INFO_FILENAME].map((name) => name.toLowerCase());
    const entries = await readZipEntries(issue.id, (name) => wanted.includes(name.toLowerCase()));
    const text = (filename: string): string | undefined => {
      for (const [name, data] of entries) {
        if (name.toLowerCase() === filename.toLowerCase()) return data.toString('utf8');
      }
      return undefined;
    };

    const json = text(METADATA_JSON_FILENAME);
    const xml = text(COMIC_INFO_FILENAME);
    const metadata: IssueMetadata = json ? fromMetadataJson(json) : xml ? fromComicInfoXml(xml) : {};

    return {
      ref: issue,
      order: metadata.issueNumber ?? 0,
      metadata: {
        ...metadata,
        title: metadata.title ?? basename(issue.id, extname(issue.id)),
      },
    };
  }

  async listPages(issue: SourceUrl): Promise<PageHandle[]> {
    const names = (await listZipEntries(issue.id)).filter(isPage).sort(byReadingOrder);

    return names.map((name, index): PageHandle => ({
      issueId: issue.id,
      index,
      url: name,
      decode: { type: 'identity' },
    }));
  }

  async fetchPage(handle: PageHandle): Promise<Uint8Array> {
    const entries = await readZipEntries(handle.issueId, (name) => name === handle.url);
    const data = entries.get(handle.url);
    if (!data) {
      throw new PageMissingError(`No entry ${handle.url} in ${handle.issueId}`, handle.url);
    }
    return data;
  }

  requiresAuthentication(): boolean {
    return false;
  }
}
