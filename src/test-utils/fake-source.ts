import { vi } from 'vitest';
import type { Assembler, OrchestratorSettings } from '../downloader/download-orchestrator';
import { InvalidUrlError, ParseError } from '../errors/custom-errors';
import type { SourceSession } from '../sources/session';
import type { IssueInfo, PageData, PageHandle, SeriesInfo, SourceUrl } from '../types/comic.types';
import type { SourceAdapter } from '../types/source.types';

export const BASE = 'https://fake.example';
export const SERIES_URL = `${BASE}/series/fs`;
export const PNG_HEADER = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export type FakeIssue = {
  id: string;
  order: number;
  title?: string;
  pages: number;
  /** Page indices to report instead of 0..pages-1 */
  indices?: number[];
};

export const ISSUES: FakeIssue[] = [
  { id: 'one', order: 1, title: 'Issue One', pages: 3 },
  { id: 'two', order: 2, title: 'Issue Two', pages: 3 },
  { id: 'three', order: 3, title: 'Issue Three', pages: 3 },
];

/**
 * In-memory platform: pages are tiny PNGs whose last byte is the page index
 */
export class FakeSource implements SourceAdapter {
  readonly platform = 'fake';
  readonly displayName = 'Fake';
  readonly calls = { getSeries: 0, getIssue: 0, listPages: 0, fetchPage: 0 };
  readonly completed: number[] = [];
  readonly authenticate = vi.fn(async (_session: SourceSession) => {});
  pageDelay: (handle: PageHandle) => number = () => 0;
  pageError: (handle: PageHandle, attempt: number) => Error | undefined = () => undefined;
  beforeFetch: (handle: PageHandle) => void = () => {};
  afterFetch: (handle: PageHandle) => void = () => {};
  onListPages: (ref: SourceUrl) => void = () => {};
  seriesError: (attempt: number) => Error | undefined = () => undefined;
  private attempts = new Map<string, number>();

  constructor(
    private readonly issues: FakeIssue[] = ISSUES,
    private readonly needsAuth = false,
  ) {}

  supports(url: string): boolean {
    return url.startsWith(BASE);
  }

  async resolve(url: string): Promise<SourceUrl> {
    const match = /\/(series|issue)\/([\w-]+)$/.exec(url);
    if (!match?.[1] || !match[2]) {
      throw new InvalidUrlError('Not a fake URL', url);
    }
    return { platform: this.platform, kind: match[1] === 'series' ? 'series' : 'issue', id: match[2], url };
  }

  async getSeries(ref: SourceUrl): Promise<SeriesInfo> {
    const error = this.seriesError(this.calls.getSeries++);
    if (error) throw error;
    return {
      ref,
      title: 'Fake Series',
      ended: false,
      issues: this.issues.map((issue) => ({
        ref: this.issueRef(issue.id),
        order: issue.order,
        metadata: { series: 'Fake Series', title: issue.title, source: this.displayName },
      })),
    };
  }

  async getIssue(ref: SourceUrl): Promise<IssueInfo> {
    this.calls.getIssue++;
    const issue = this.find(ref.id);
    return {
      ref,
      order: issue.order,
      metadata: { series: 'Fake Series', title: issue.title ?? `Fetched ${issue.id}`, issueNumber: issue.order },
    };
  }

  async listPages(ref: SourceUrl): Promise<PageHandle[]> {
    this.calls.listPages++;
    this.onListPages(ref);
    const issue = this.find(ref.id);
    const indices = issue.indices ?? Array.from({ length: issue.pages }, (_, index) => index);
    return indices.map((index): PageHandle => ({
      issueId: ref.id,
      index,
      url: `${BASE}/page/${ref.id}/${index}`,
      decode: { type: 'identity' },
    }));
  }

  async fetchPage(handle: PageHandle): Promise<Uint8Array> {
    this.calls.fetchPage++;
    const attempt = this.attempts.get(handle.url) ?? 0;
    this.attempts.set(handle.url, attempt + 1);
    this.beforeFetch(handle);

    try {
      await new Promise((resolve) => setTimeout(resolve, this.pageDelay(handle)));
    } finally {
      this.afterFetch(handle);
    }

    const error = this.pageError(handle, attempt);
    if (error) throw error;

    this.completed.push(handle.index);
    return new Uint8Array([...PNG_HEADER, handle.index]);
  }

  requiresAuthentication(): boolean {
    return this.needsAuth;
  }

  private issueRef(id: string): SourceUrl {
    return { platform: this.platform, kind: 'issue', id, url: `${BASE}/issue/${id}` };
  }

  private find(id: string): FakeIssue {
    const issue = this.issues.find((candidate) => candidate.id === id);
    if (!issue) throw new ParseError(`No issue ${id}`);
    return issue;
  }
}

export class RecordingAssembler implements Assembler {
  readonly calls: Array<{ issue: IssueInfo; pages: PageData[]; outputPath: string }> = [];
  onAssemble: (issue: IssueInfo) => void = () => {};

  async assemble(issue: IssueInfo, pages: PageData[], outputPath: string): Promise<string> {
    this.onAssemble(issue);
    this.calls.push({ issue, pages, outputPath });
    return outputPath;
  }
}

export const settings = (overrides: Partial<OrchestratorSettings> = {}): OrchestratorSettings => ({
  format: 'cbz',
  overwrite: false,
  writeMetadata: false,
  concurrency: { issues: 2, pages: 3 },
  retry: { maxRetries: 2, initialTimeout: 0, backoffMultiplier: 2, jitterPercentage: 0 },
  ...overrides,
});
