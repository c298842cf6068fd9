import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join } from 'node:path';
import { formatZodError } from '../config/config-schema';
import { CorruptStoreError, IoError, errorMessage } from '../errors/custom-errors';
import {
  createEmptyUpdateFile,
  type LatestIssue,
  type UpdateFile,
  UpdateFileSchema,
  type UpdateRecord,
} from '../types/update.types';

/**
 * Series fields given when a series starts being tracked
 */
export type NewUpdateRecord = Pick<UpdateRecord, 'platform' | 'seriesId' | 'seriesUrl' | 'title'> &
  Partial<Pick<UpdateRecord, 'ended' | 'latest'>>;

const recordKey = (platform: string, seriesId: string): string => `${platform.toLowerCase()}\u0000${seriesId}`;

/**
 * Persistent set of tracked series (v1 JSON file)
 *
 * Keeps the document in memory; `save` writes it as a whole through a temp
 * file and a rename, so the file is never half-written. Saves are serialized.
 *
 * Usage:
 *   const store = await UpdateStore.load('panelgrab-updates.json');
 *   store.markLatest('webtoon', id, { issueId, order });
 *   await store.save();
 */
export class UpdateStore {
  private static locks = new Map<string, Promise<void>>();

  private document: UpdateFile;
  private records: Map<string, UpdateRecord>;

  private constructor(
    readonly path: string,
    document: UpdateFile,
  ) {
    this.document = document;
    this.records = new Map(document.series.map((record) => [recordKey(record.platform, record.seriesId), record]));
  }

  /**
   * Read the update file
   *
   * @param path - Path to update file (relative or absolute)
   * @returns Store; empty when the file does not exist
   * @throws CorruptStoreError if the file is unreadable or not a valid update file
   */
  static async load(path: string): Promise<UpdateStore> {
    const fullPath = UpdateStore.resolvePath(path);

    let content: string;
    try {
      content = await readFile(fullPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return new UpdateStore(fullPath, createEmptyUpdateFile());
      }
      throw new CorruptStoreError(`Cannot read update file: ${errorMessage(error)}`, fullPath);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new CorruptStoreError(`Update file is not valid JSON: ${errorMessage(error)}`, fullPath);
    }

    const result = UpdateFileSchema.safeParse(data);
    if (!result.success) {
      throw new CorruptStoreError(`Update file has an invalid structure: ${formatZodError(result.error)}`, fullPath);
    }

    const seen = new Set<string>();
    for (const record of result.data.series) {
      const key = recordKey(record.platform, record.seriesId);
      if (seen.has(key)) {
        throw new CorruptStoreError(`Series ${record.platform}:${record.seriesId} is listed twice`, fullPath);
      }
      seen.add(key);
    }

    return new UpdateStore(fullPath, result.data);
  }

  /**
   * Start tracking a series
   *
   * @returns false if the series is already tracked
   */
  add(record: NewUpdateRecord): boolean {
    const key = recordKey(record.platform, record.seriesId);
    if (this.records.has(key)) {
      return false;
    }

    const now = new Date().toISOString();
    this.records.set(key, {
      ...record,
      ended: record.ended ?? false,
      latest: record.latest ?? null,
      addedAt: now,
      updatedAt: now,
    });
    return true;
  }

  /**
   * Stop tracking a series
   *
   * @returns Whether a record was removed
   */
  remove(platform: string, seriesId: string): boolean {
    return this.records.delete(recordKey(platform, seriesId));
  }

  get(platform: string, seriesId: string): UpdateRecord | undefined {
    return this.records.get(recordKey(platform, seriesId));
  }

  /**
   * All tracked series, sorted by title
   */
  list(): UpdateRecord[] {
    return Array.from(this.records.values()).sort(
      (a, b) => a.title.localeCompare(b.title) || a.platform.localeCompare(b.platform),
    );
  }

  /**
   * Record a downloaded issue; never moves backwards
   *
   * @returns Whether the stored latest issue changed
   */
  markLatest(platform: string, seriesId: string, latest: LatestIssue): boolean {
    const record = this.records.get(recordKey(platform, seriesId));
    if (!record) {
      return false;
    }
    if (record.latest && record.latest.order >= latest.order) {
      return false;
    }

    record.latest = { issueId: latest.issueId, order: latest.order };
    record.updatedAt = new Date().toISOString();
    return true;
  }

  /**
   * Refresh title and ended flag from the platform
   */
  updateSeriesInfo(platform: string, seriesId: string, info: { title?: string; ended?: boolean }): boolean {
    const record = this.records.get(recordKey(platform, seriesId));
    if (!record) {
      return false;
    }

    const title = info.title ?? record.title;
    const ended = info.ended ?? record.ended;
    if (title === record.title && ended === record.ended) {
      return false;
    }

    record.title = title;
    record.ended = ended;
    record.updatedAt = new Date().toISOString();
    return true;
  }

  /**
   * Write the update file atomically (temp file + rename)
   *
   * @throws IoError if the file cannot be written
   */
  async save(): Promise<void> {
    return this.withLock(async () => {
      this.document = { ...this.document, series: this.list() };
      const content = `${JSON.stringify(this.document, null, 2)}\n`;
      const tempPath = join(dirname(this.path), `.${basename(this.path)}.${randomBytes(4).toString('hex')}.tmp`);

      try {
        await mkdir(dirname(this.path), { recursive: true });
        await writeFile(tempPath, content, 'utf-8');
        await rename(tempPath, this.path);
      } catch (error) {
        await rm(tempPath, { force: true });
        throw new IoError(`Failed to save update file: ${errorMessage(error)}`, this.path);
      }
    });
  }

  /**
   * Execute a function with mutex lock for this store's file
   */
  private async withLock(fn: () => Promise<void>): Promise<void> {
    const previous = UpdateStore.locks.get(this.path) ?? Promise.resolve();
    const current = previous.then(fn);
    const settled = current.then(
      () => undefined,
      () => undefined,
    );
    UpdateStore.locks.set(this.path, settled);

    try {
      await current;
    } finally {
      if (UpdateStore.locks.get(this.path) === settled) {
        UpdateStore.locks.delete(this.path);
      }
    }
  }

  /**
   * Resolve relative paths against the current working directory
   */
  private static resolvePath(path: string): string {
    return isAbsolute(path) ? path : join(process.cwd(), path);
  }
}
