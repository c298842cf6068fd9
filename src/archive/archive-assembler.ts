import { randomBytes } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import yazl from 'yazl';
import { CancelledError, IoError, PanelgrabError, errorMessage } from '../errors/custom-errors';
import { COMIC_INFO_FILENAME, METADATA_JSON_FILENAME, toComicInfoXml, toMetadataJson } from '../metadata/comic-info';
import type { ComicFormat, IssueInfo, PageData } from '../types/comic.types';
import { logger } from '../utils/logger';

export type AssembleOptions = {
  format: ComicFormat;
  /** Write ComicInfo.xml and panelgrab.json next to the pages */
  writeMetadata: boolean;
  /** Allow replacing an existing artifact */
  replace: boolean;
  signal?: AbortSignal;
};

type Entry = { name: string; data: Uint8Array };

/**
 * Entry name of a page: zero-padded index plus extension, e.g. `007.jpg`
 */
export function pageEntryName(index: number, pageCount: number, extension: string): string {
  const width = Math.max(3, String(pageCount).length);
  return `${String(index).padStart(width, '0')}.${extension}`;
}

/**
 * Check whether something exists at the output path
 */
export async function outputExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw new IoError(`Cannot check output path: ${errorMessage(error)}`, path);
  }
}

/**
 * Writes decoded pages as a CBZ archive or a directory of images
 *
 * The artifact is built in a hidden temporary sibling and renamed into place,
 * so the output path only ever holds a complete issue.
 */
export class ArchiveAssembler {
  /**
   * @param pages - Decoded pages in reading order
   * @returns Path of the written artifact
   * @throws IoError on filesystem failures, CancelledError if aborted before the final rename
   */
  async assemble(issue: IssueInfo, pages: PageData[], outputPath: string, options: AssembleOptions): Promise<string> {
    const directory = dirname(outputPath);
    const name = basename(outputPath);
    const tempPath = join(directory, `.${name}.${randomBytes(4).toString('hex')}.part`);

    const entries: Entry[] = pages.map((page, index) => ({
      name: pageEntryName(index, pages.length, page.extension),
      data: page.bytes,
    }));
    if (options.writeMetadata) {
      const metadata = { ...issue.metadata, pageCount: pages.length };
      entries.push(
        { name: COMIC_INFO_FILENAME, data: Buffer.from(toComicInfoXml(metadata), 'utf8') },
        { name: METADATA_JSON_FILENAME, data: Buffer.from(toMetadataJson({ ...issue, metadata }), 'utf8') },
      );
    }

    try {
      await mkdir(directory, { recursive: true });

      if (options.format === 'cbz') {
        await this.writeZip(tempPath, entries);
      } else {
        await this.writeDirectory(tempPath, entries);
      }

      if (options.signal?.aborted) {
        throw new CancelledError();
      }

      await this.moveIntoPlace(tempPath, outputPath, options.replace);
    } catch (error) {
      await rm(tempPath, { recursive: true, force: true });
      if (error instanceof PanelgrabError) throw error;
      throw new IoError(`Failed to write ${outputPath}: ${errorMessage(error)}`, outputPath);
    }

    return outputPath;
  }

  /**
   * Zip with stored (uncompressed) entries; images are already compressed
   */
  private writeZip(path: string, entries: Entry[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const zip = new yazl.ZipFile();
      const out = createWriteStream(path);

      zip.outputStream.on('error', reject).pipe(out).on('error', reject).on('close', resolve);

      const mtime = new Date();
      for (const entry of entries) {
        zip.addBuffer(Buffer.from(entry.data.buffer, entry.data.byteOffset, entry.data.byteLength), entry.name, {
          compress: false,
          mtime,
        });
      }

      zip.end();
    });
  }

  private async writeDirectory(path: string, entries: Entry[]): Promise<void> {
    await mkdir(path);
    for (const entry of entries) {
      // biome-ignore lint/performance/noAwaitInLoops: Sequential writes keep file handles bounded
      await writeFile(join(path, entry.name), entry.data);
    }
  }

  /**
   * Rename the finished artifact over the output path
   *
   * An existing artifact is moved aside first and restored if the rename fails.
   */
  private async moveIntoPlace(tempPath: string, outputPath: string, replace: boolean): Promise<void> {
    if (!(await outputExists(outputPath))) {
      await rename(tempPath, outputPath);
      return;
    }

    if (!replace) {
      throw new IoError('Output already exists', outputPath);
    }

    const asidePath = join(dirname(outputPath), `.${basename(outputPath)}.${randomBytes(4).toString('hex')}.old`);
    await rename(outputPath, asidePath);

    try {
      await rename(tempPath, outputPath);
    } catch (error) {
      await rename(asidePath, outputPath);
      throw error;
    }

    await rm(asidePath, { recursive: true, force: true }).catch((error: unknown) => {
      logger.warning(`Could not remove previous version ${asidePath}: ${errorMessage(error)}`);
    });
  }
}
