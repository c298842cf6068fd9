import type { DownloadOrchestrator } from '../downloader/download-orchestrator';
import { UnsupportedError, describeError } from '../errors/custom-errors';
import type { UpdateStore } from '../state/update-store';
import type { DownloadResult } from '../types/comic.types';
import type { UpdateRecord } from '../types/update.types';
import { logger as defaultLogger, type Logger } from '../utils/logger';

/**
 * Outcome of adding one URL to the update file
 */
export type AddSeriesResult =
  | { status: 'added'; record: UpdateRecord }
  | { status: 'exists'; record: UpdateRecord }
  | { status: 'failed'; url: string; message: string };

/**
 * Outcome of updating one tracked series
 */
export type SeriesUpdateResult = {
  record: UpdateRecord;
  results: DownloadResult[];
};

/**
 * Tracks series and downloads the issues released since the last run
 */
export class Updater {
  private readonly logger: Logger;

  constructor(
    private readonly store: UpdateStore,
    private readonly orchestrator: DownloadOrchestrator,
    logger: Logger = defaultLogger,
  ) {
    this.logger = logger;
  }

  /**
   * Start tracking the series behind each URL; saves once at the end
   *
   * Issue URLs are rejected. Already downloaded issues are not recorded, so the
   * first `updateAll` downloads the whole series (existing files are skipped).
   */
  async addSeries(urls: string[]): Promise<AddSeriesResult[]> {
    const results: AddSeriesResult[] = [];

    for (const url of urls) {
      try {
        // biome-ignore lint/performance/noAwaitInLoops: One series at a time keeps requests polite
        const target = await this.orchestrator.resolveTarget(url);
        const { ref } = target;
        if (ref.kind !== 'series') {
          throw new UnsupportedError('Only series can be tracked for updates, not single issues');
        }

        const existing = this.store.get(ref.platform, ref.id);
        if (existing) {
          this.logger.warning(`Already tracking "${existing.title}"`);
          results.push({ status: 'exists', record: existing });
          continue;
        }

        const series = await this.orchestrator.getSeries(target);
        this.store.add({
          platform: ref.platform,
          seriesId: ref.id,
          seriesUrl: url,
          title: series.title,
          ended: series.ended,
        });

        const record = this.store.get(ref.platform, ref.id);
        if (record) {
          this.logger.success(`Tracking "${series.title}" (${series.issues.length} issues)`);
          results.push({ status: 'added', record });
        }
      } catch (error) {
        const { message } = describeError(error);
        this.logger.warning(`Cannot add ${url}: ${message}`);
        results.push({ status: 'failed', url, message });
      }
    }

    if (results.some((result) => result.status === 'added')) {
      await this.store.save();
    }
    return results;
  }

  /**
   * Stop tracking a series and save
   *
   * @returns Whether the series was tracked
   */
  async removeSeries(platform: string, seriesId: string): Promise<boolean> {
    const removed = this.store.remove(platform, seriesId);
    if (removed) {
      await this.store.save();
    }
    return removed;
  }

  listSeries(): UpdateRecord[] {
    return this.store.list();
  }

  /**
   * Download new issues of every tracked series
   *
   * "New" means an order above the stored latest issue (everything when none is
   * stored). Each success moves the stored latest issue forward. A failing
   * series does not stop the others. The store is saved once, also when
   * cancelled, with whatever completed.
   */
  async updateAll(signal?: AbortSignal): Promise<SeriesUpdateResult[]> {
    const updates: SeriesUpdateResult[] = [];

    try {
      for (const record of this.store.list()) {
        if (signal?.aborted) break;
        // biome-ignore lint/performance/noAwaitInLoops: Series are updated in order
        updates.push({ record, results: await this.updateSeries(record, signal) });
      }
    } finally {
      await this.store.save();
    }

    return updates;
  }

  private async updateSeries(record: UpdateRecord, signal?: AbortSignal): Promise<DownloadResult[]> {
    const { platform, seriesId, seriesUrl } = record;
    this.logger.highlight(`Checking "${record.title}"`);

    try {
      const target = await this.orchestrator.resolveTarget(seriesUrl);
      const series = await this.orchestrator.getSeries(target, signal);
      this.store.updateSeriesInfo(platform, seriesId, { title: series.title, ended: series.ended });

      const after = record.latest?.order;
      return await this.orchestrator.downloadSeries(series, {
        signal,
        filter: (issue) => after === undefined || issue.order > after,
        onIssueComplete: (issue) => {
          this.store.markLatest(platform, seriesId, { issueId: issue.ref.id, order: issue.order });
        },
      });
    } catch (error) {
      const { kind, message } = describeError(error);
      this.logger.error(`Update of "${record.title}" failed: ${message}`);
      return [{ status: 'failed', target: seriesUrl, kind: signal?.aborted ? 'Cancelled' : kind, message }];
    }
  }
}
