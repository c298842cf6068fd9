import { resolve } from 'node:path';
import pLimit, { type LimitFunction } from 'p-limit';
import type { AssembleOptions } from '../archive/archive-assembler';
import { outputExists } from '../archive/archive-assembler';
import type { ResolvedConcurrency } from '../config/resolved-config.types';
import { decodePage } from '../decrypt/page-decryptor';
import {
  CancelledError,
  type ErrorKind,
  ParseError,
  UnsupportedError,
  describeError,
  errorMessage,
  isRetryable,
} from '../errors/custom-errors';
import type { SourceSession } from '../sources/session';
import type { OutputTemplate } from '../template/output-template';
import {
  type ComicFormat,
  type DownloadResult,
  describeIssue,
  type IssueInfo,
  type IssueMetadata,
  type PageData,
  type PageHandle,
  type SeriesInfo,
  type SourceUrl,
} from '../types/comic.types';
import type { RetryConfig } from '../types/config.types';
import type { SourceAdapter, SourceRegistry } from '../types/source.types';
import { type Logger, logger as defaultLogger } from '../utils/logger';
import { retryWithBackoff } from '../utils/retry-strategy';

/**
 * Progress of one target (a series or issue URL)
 */
export type TargetState = 'Resolving' | 'Listing' | 'Downloading' | 'Assembling' | 'Done' | 'Failed';

/**
 * Writes decoded pages to the output path
 */
export type Assembler = {
  assemble(issue: IssueInfo, pages: PageData[], outputPath: string, options: AssembleOptions): Promise<string>;
};

export type OrchestratorSettings = {
  format: ComicFormat;
  overwrite: boolean;
  writeMetadata: boolean;
  concurrency: ResolvedConcurrency;
  retry: RetryConfig;
};

export type OrchestratorDependencies = {
  registry: SourceRegistry;
  sessions: { get(platform: string): SourceSession };
  assembler: Assembler;
  template: OutputTemplate;
  logger?: Logger;
};

export type ResolvedTarget = {
  adapter: SourceAdapter;
  session: SourceSession;
  ref: SourceUrl;
};

export type DownloadHooks = {
  signal?: AbortSignal;
  onStateChange?: (target: string, state: TargetState, issue?: IssueInfo) => void;
  /** Awaited after each successful issue */
  onIssueComplete?: (issue: IssueInfo, path: string) => void | Promise<void>;
  /** Restrict which listed issues are downloaded */
  filter?: (issue: IssueInfo) => boolean;
};

/**
 * Turns series/issue URLs into written issues
 *
 * Issues of a target run concurrently (bounded by `concurrency.issues`), pages
 * of an issue likewise (`concurrency.pages`). Pages are stored by index, so
 * the assembler always sees reading order. A failing page fails only its issue.
 */
export class DownloadOrchestrator {
  private readonly settings: OrchestratorSettings;
  private readonly deps: OrchestratorDependencies;
  private readonly logger: Logger;
  private readonly issueLimit: LimitFunction;

  constructor(settings: OrchestratorSettings, deps: OrchestratorDependencies) {
    this.settings = settings;
    this.deps = deps;
    this.logger = deps.logger ?? defaultLogger;
    this.issueLimit = pLimit(settings.concurrency.issues);
  }

  /**
   * Download several targets one after another
   *
   * Target-level failures (bad URL, listing failed) become a single failed result.
   */
  async downloadAll(urls: string[], hooks: DownloadHooks = {}): Promise<DownloadResult[]> {
    const results: DownloadResult[] = [];
    for (const url of urls) {
      // biome-ignore lint/performance/noAwaitInLoops: Targets are processed in order
      results.push(...(await this.download(url, hooks)));
    }
    return results;
  }

  /**
   * Download every issue of a series URL, or the single issue of an issue URL
   */
  async download(url: string, hooks: DownloadHooks = {}): Promise<DownloadResult[]> {
    const { signal } = hooks;

    try {
      this.throwIfCancelled(signal);
      hooks.onStateChange?.(url, 'Resolving');

      const { adapter, session, ref } = await this.resolveTarget(url);

      this.throwIfCancelled(signal);
      hooks.onStateChange?.(url, 'Listing');

      const issues =
        ref.kind === 'series'
          ? (await this.getSeries({ adapter, session, ref }, signal)).issues
          : [await this.withRetry(() => adapter.getIssue(ref, session), signal)];

      const results = await this.downloadIssues(adapter, session, url, issues, hooks);
      hooks.onStateChange?.(url, 'Done');
      return results;
    } catch (error) {
      return [this.targetFailed(url, error, hooks)];
    }
  }

  /**
   * Download issues of an already listed series
   */
  async downloadSeries(series: SeriesInfo, hooks: DownloadHooks = {}): Promise<DownloadResult[]> {
    const target = series.ref.url;

    try {
      const adapter = this.deps.registry.getByPlatform(series.ref.platform);
      if (!adapter) {
        throw new UnsupportedError(`Unknown platform "${series.ref.platform}"`);
      }
      const session = this.deps.sessions.get(adapter.platform);
      await this.authenticate(adapter, session);

      const results = await this.downloadIssues(adapter, session, target, series.issues, hooks);
      hooks.onStateChange?.(target, 'Done');
      return results;
    } catch (error) {
      return [this.targetFailed(target, error, hooks)];
    }
  }

  /**
   * Resolve a target and list its issues with full metadata, without downloading pages
   */
  async describe(url: string, signal?: AbortSignal): Promise<IssueInfo[]> {
    const { adapter, session, ref } = await this.resolveTarget(url);

    if (ref.kind === 'issue') {
      return [await this.withRetry(() => adapter.getIssue(ref, session), signal)];
    }

    const series = await this.getSeries({ adapter, session, ref }, signal);
    return Promise.all(
      series.issues.map((issue) =>
        this.issueLimit(async () => {
          this.throwIfCancelled(signal);
          return issue.metadata.title ? issue : this.withMetadata(adapter, session, issue, signal);
        }),
      ),
    );
  }

  /**
   * List a resolved series, retrying transient failures
   */
  async getSeries(target: ResolvedTarget, signal?: AbortSignal): Promise<SeriesInfo> {
    const { adapter, session, ref } = target;
    return this.withRetry(() => adapter.getSeries(ref, session), signal);
  }

  /**
   * Find the adapter and session for a URL and log in when the platform needs it
   */
  async resolveTarget(url: string): Promise<ResolvedTarget> {
    const adapter = this.deps.registry.getForUrl(url);
    const session = this.deps.sessions.get(adapter.platform);
    const ref = await adapter.resolve(url, session);
    await this.authenticate(adapter, session);
    return { adapter, session, ref };
  }

  /**
   * Log in once per session; concurrent callers share the login
   */
  private async authenticate(adapter: SourceAdapter, session: SourceSession): Promise<void> {
    if (!adapter.requiresAuthentication()) return;
    await session.ensureAuthenticated(async (current) => {
      await adapter.authenticate?.(current);
    });
  }

  private targetFailed(target: string, error: unknown, hooks: DownloadHooks): DownloadResult {
    hooks.onStateChange?.(target, 'Failed');
    const { kind, message } = classifyFailure(error, hooks.signal);
    this.logger.error(`${target}: ${message}`);
    return { status: 'failed', target, kind, message };
  }

  private async downloadIssues(
    adapter: SourceAdapter,
    session: SourceSession,
    target: string,
    listed: IssueInfo[],
    hooks: DownloadHooks,
  ): Promise<DownloadResult[]> {
    const issues = hooks.filter ? listed.filter(hooks.filter) : listed;
    if (issues.length === 0) {
      this.logger.info(`${target}: nothing to download`);
      return [];
    }

    hooks.onStateChange?.(target, 'Downloading');
    this.logger.info(`${target}: ${issues.length} issue(s) to download`);

    return Promise.all(
      issues.map((issue) => this.issueLimit(() => this.downloadIssue(adapter, session, target, issue, hooks))),
    );
  }

  /**
   * Download one issue; never throws
   */
  private async downloadIssue(
    adapter: SourceAdapter,
    session: SourceSession,
    target: string,
    listed: IssueInfo,
    hooks: DownloadHooks,
  ): Promise<DownloadResult> {
    const { signal } = hooks;
    let issue = listed;
    let log = this.logger.child(describeIssue(issue));

    try {
      this.throwIfCancelled(signal);

      let detailed = false;
      if (!this.deps.template.isComplete(issue.metadata)) {
        issue = await this.withMetadata(adapter, session, issue, signal);
        log = this.logger.child(describeIssue(issue));
        detailed = true;
      }

      const outputPath = resolve(this.deps.template.render(issue, this.settings.format));

      if (!this.settings.overwrite && (await outputExists(outputPath))) {
        log.info(`Already exists, skipping: ${outputPath}`);
        return { status: 'skipped', issue, path: outputPath, reason: 'Output already exists' };
      }

      // Metadata files want the details the listing left out
      if (this.settings.writeMetadata && !detailed && !issue.metadata.title) {
        issue = await this.withMetadata(adapter, session, issue, signal);
        log = this.logger.child(describeIssue(issue));
      }

      const handles = await this.withRetry(() => adapter.listPages(issue.ref, session), signal);
      const pages = await this.fetchPages(adapter, session, this.checkPageOrder(handles, issue.ref.url), signal, log);

      this.throwIfCancelled(signal);
      hooks.onStateChange?.(target, 'Assembling', issue);

      const path = await this.deps.assembler.assemble(issue, pages, outputPath, {
        format: this.settings.format,
        writeMetadata: this.settings.writeMetadata,
        replace: this.settings.overwrite,
        signal,
      });
      log.success(`Saved ${pages.length} pages to ${path}`);

      await this.completeIssue(issue, path, hooks, log);
      return { status: 'success', issue, path };
    } catch (error) {
      const { kind, message } = classifyFailure(error, signal);
      if (kind !== 'Cancelled') {
        log.error(`Failed (${kind}): ${message}`);
      }
      return { status: 'failed', issue, target, kind, message };
    }
  }

  /**
   * Fetch and decode all pages; results are placed by page index
   *
   * After the first terminal failure no further page is started; pages
   * already in flight are awaited before the error is rethrown.
   */
  private async fetchPages(
    adapter: SourceAdapter,
    session: SourceSession,
    handles: PageHandle[],
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<PageData[]> {
    const pageLimit = pLimit(this.settings.concurrency.pages);
    const pages: PageData[] = new Array(handles.length);
    let failure: unknown;

    const tasks = handles.map((handle) =>
      pageLimit(async () => {
        if (failure !== undefined) return;
        try {
          this.throwIfCancelled(signal);
          const raw = await retryWithBackoff(() => adapter.fetchPage(handle, session), this.settings.retry, {
            retryIf: isRetryable,
            signal,
            onRetry: (attempt, error, delay) =>
              log.warning(`Page ${handle.index + 1}: ${error.message}, retry ${attempt + 1} in ${delay}ms`),
          });
          pages[handle.index] = decodePage(raw, handle.decode);
          log.debug(`Page ${handle.index + 1}/${handles.length} done`);
        } catch (error) {
          failure ??= error;
        }
      }),
    );

    await Promise.all(tasks);

    this.throwIfCancelled(signal);
    if (failure !== undefined) {
      throw failure;
    }
    return pages;
  }

  /**
   * Sort handles by index and require indices 0..n-1
   */
  private checkPageOrder(handles: PageHandle[], url: string): PageHandle[] {
    if (handles.length === 0) {
      throw new ParseError('Issue has no pages', url);
    }
    const sorted = [...handles].sort((a, b) => a.index - b.index);
    sorted.forEach((handle, position) => {
      if (handle.index !== position) {
        throw new ParseError(`Page indices are not contiguous (expected ${position}, got ${handle.index})`, url);
      }
    });
    return sorted;
  }

  /**
   * Fetch issue details and fill in what the series listing lacks
   */
  private async withMetadata(
    adapter: SourceAdapter,
    session: SourceSession,
    issue: IssueInfo,
    signal?: AbortSignal,
  ): Promise<IssueInfo> {
    const fetched = await this.withRetry(() => adapter.getIssue(issue.ref, session), signal);
    return { ...issue, metadata: mergeMetadata(issue.metadata, fetched.metadata) };
  }

  private async completeIssue(issue: IssueInfo, path: string, hooks: DownloadHooks, log: Logger): Promise<void> {
    if (!hooks.onIssueComplete) return;
    try {
      await hooks.onIssueComplete(issue, path);
    } catch (error) {
      log.warning(`Post-download step failed: ${errorMessage(error)}`);
    }
  }

  private withRetry<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return retryWithBackoff(fn, this.settings.retry, {
      retryIf: isRetryable,
      signal,
      onRetry: (attempt, error, delay) => this.logger.warning(`${error.message}, retry ${attempt + 1} in ${delay}ms`),
    });
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new CancelledError();
    }
  }
}

/**
 * Anything aborted counts as cancelled, whatever error surfaced first
 */
function classifyFailure(error: unknown, signal?: AbortSignal): { kind: ErrorKind; message: string } {
  if (signal?.aborted) {
    return { kind: 'Cancelled', message: 'Cancelled' };
  }
  return describeError(error);
}

/**
 * Prefer fetched issue metadata, keep listing values it lacks
 */
function mergeMetadata(listed: IssueMetadata, fetched: IssueMetadata): IssueMetadata {
  return {
    title: fetched.title ?? listed.title,
    series: fetched.series ?? listed.series,
    publisher: fetched.publisher ?? listed.publisher,
    issueNumber: fetched.issueNumber ?? listed.issueNumber,
    year: fetched.year ?? listed.year,
    month: fetched.month ?? listed.month,
    day: fetched.day ?? listed.day,
    description: fetched.description ?? listed.description,
    authors: fetched.authors?.length ? fetched.authors : listed.authors,
    readingDirection: fetched.readingDirection ?? listed.readingDirection,
    source: fetched.source ?? listed.source,
    pageCount: fetched.pageCount ?? listed.pageCount,
  };
}
