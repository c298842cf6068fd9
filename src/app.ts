import { readFile } from 'node:fs/promises';
import {
  boolean,
  command,
  flag,
  number,
  oneOf,
  option,
  optional,
  positional,
  restPositionals,
  string,
  subcommands,
} from 'cmd-ts';
import { ArchiveAssembler } from './archive/archive-assembler';
import { loadConfig } from './config/config-loader';
import { type CliOverrides, ConfigResolver } from './config/config-resolver';
import { LogLevelSchema } from './config/config-schema';
import type { ResolvedConfig } from './config/resolved-config.types';
import { type Assembler, DownloadOrchestrator } from './downloader/download-orchestrator';
import { ConfigError, IoError, errorMessage } from './errors/custom-errors';
import { SessionPool } from './sources/session';
import { createDefaultRegistry } from './sources/source-registry';
import { UpdateStore } from './state/update-store';
import { PathTemplate } from './template/output-template';
import { ComicFormatSchema, type DownloadResult, describeIssue } from './types/comic.types';
import type { SourceRegistry } from './types/source.types';
import type { UpdateRecord } from './types/update.types';
import { Updater } from './update/updater';
import { logger } from './utils/logger';

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  readTextFile: (path: string) => Promise<string>;
  createRegistry: () => SourceRegistry;
  createAssembler: () => Assembler;
  loadUpdateStore: (path: string) => Promise<UpdateStore>;
  /** Machine-readable output (JSON, listings); logs go through the logger */
  write: (text: string) => void;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  readTextFile: (path) => readFile(path, 'utf8'),
  createRegistry: createDefaultRegistry,
  createAssembler: () => new ArchiveAssembler(),
  loadUpdateStore: (path) => UpdateStore.load(path),
  write: (text) => {
    process.stdout.write(text);
  },
};

/**
 * Options shared by every command
 */
export type GlobalOptions = {
  config?: string;
  logLevel?: string;
};

export type DownloadOptions = GlobalOptions & {
  urls: string[];
  file?: string;
  template?: string;
  format?: string;
  overwrite: boolean;
  noMetadata: boolean;
  issues?: number;
  pages?: number;
};

type Services = {
  config: ResolvedConfig;
  orchestrator: DownloadOrchestrator;
};

/**
 * Links from a link file: one per line, blank lines and `#` comments ignored
 */
export function parseLinks(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Summary line plus one line per failure
 */
export function formatSummary(results: DownloadResult[]): string[] {
  const count = (status: DownloadResult['status']) => results.filter((result) => result.status === status).length;
  const lines = [`${count('success')} succeeded, ${count('skipped')} skipped, ${count('failed')} failed`];

  for (const result of results) {
    if (result.status === 'failed') {
      const label = result.issue ? describeIssue(result.issue) : result.target;
      lines.push(`  ${label} [${result.kind}] ${result.message}`);
    }
  }
  return lines;
}

function report(results: DownloadResult[]): number {
  const [summary, ...failures] = formatSummary(results);
  const failed = failures.length > 0;

  if (summary) {
    if (failed) logger.warning(summary);
    else logger.success(summary);
  }
  for (const line of failures) {
    logger.error(line);
  }
  return failed ? 1 : 0;
}

function parseOverrides(options: GlobalOptions & Partial<DownloadOptions>): CliOverrides {
  const overrides: CliOverrides = {
    template: options.template,
    issues: options.issues,
    pages: options.pages,
    overwrite: options.overwrite || undefined,
    writeMetadata: options.noMetadata ? false : undefined,
  };

  if (options.format !== undefined) {
    const format = ComicFormatSchema.safeParse(options.format);
    if (!format.success) {
      throw new ConfigError(`Unknown format "${options.format}" (expected cbz or dir)`);
    }
    overrides.format = format.data;
  }

  if (options.logLevel !== undefined) {
    const level = LogLevelSchema.safeParse(options.logLevel);
    if (!level.success) {
      throw new ConfigError(`Unknown log level "${options.logLevel}"`);
    }
    overrides.logLevel = level.data;
  }

  return overrides;
}

async function createServices(
  options: GlobalOptions & Partial<DownloadOptions>,
  deps: AppDependencies,
): Promise<Services> {
  const overrides = parseOverrides(options);
  const file = await deps.loadConfig(options.config);
  const config = new ConfigResolver(file).resolve(overrides);
  logger.setLevel(config.logLevel);

  const orchestrator = new DownloadOrchestrator(
    {
      format: config.format,
      overwrite: config.overwrite,
      writeMetadata: config.writeMetadata,
      concurrency: config.concurrency,
      retry: config.retry,
    },
    {
      registry: deps.createRegistry(),
      sessions: new SessionPool(config.sources),
      assembler: deps.createAssembler(),
      template: new PathTemplate(config.template),
    },
  );

  return { config, orchestrator };
}

async function collectUrls(urls: string[], file: string | undefined, deps: AppDependencies): Promise<string[]> {
  const all = [...urls];
  if (file) {
    let content: string;
    try {
      content = await deps.readTextFile(file);
    } catch (error) {
      throw new IoError(`Cannot read link file: ${errorMessage(error)}`, file);
    }
    all.push(...parseLinks(content));
  }

  const unique = [...new Set(all)];
  if (unique.length === 0) {
    throw new ConfigError('No URLs given');
  }
  return unique;
}

/**
 * Download every target and report the outcome
 *
 * @returns Process exit code
 */
export async function runDownload(
  options: DownloadOptions,
  signal?: AbortSignal,
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const urls = await collectUrls(options.urls, options.file, deps);
  const { orchestrator } = await createServices(options, deps);

  logger.info(`Downloading ${urls.length} target(s)`);
  const results = await orchestrator.downloadAll(urls, {
    signal,
    onStateChange: (target, state, issue) => {
      logger.debug(`${issue ? describeIssue(issue) : target}: ${state}`);
    },
  });

  return report(results);
}

/**
 * Print issue metadata of every target as JSON
 *
 * @returns Process exit code
 */
export async function runMetadata(
  options: GlobalOptions & { urls: string[] },
  signal?: AbortSignal,
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const urls = await collectUrls(options.urls, undefined, deps);
  const { orchestrator } = await createServices(options, deps);

  const targets: Array<{ url: string; issues: object[] }> = [];
  let failed = false;

  for (const url of urls) {
    try {
      // biome-ignore lint/performance/noAwaitInLoops: Targets are described in order
      const issues = await orchestrator.describe(url, signal);
      targets.push({
        url,
        issues: issues.map((issue) => ({ ...issue.metadata, ...issue.ref, order: issue.order })),
      });
    } catch (error) {
      failed = true;
      logger.error(`${url}: ${errorMessage(error)}`);
    }
  }

  deps.write(`${JSON.stringify(targets, null, 2)}\n`);
  return failed ? 1 : 0;
}

async function createUpdater(options: GlobalOptions, deps: AppDependencies): Promise<Updater> {
  const { config, orchestrator } = await createServices(options, deps);
  const store = await deps.loadUpdateStore(config.updateFile);
  return new Updater(store, orchestrator);
}

/**
 * One line per tracked series
 */
export function formatRecord(record: UpdateRecord): string {
  const latest = record.latest ? `#${record.latest.order}` : 'none';
  const ended = record.ended ? ', ended' : '';
  return `${record.platform}\t${record.seriesId}\t${record.title} (latest: ${latest}${ended})`;
}

export async function runUpdateAdd(
  options: GlobalOptions & { urls: string[] },
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const urls = await collectUrls(options.urls, undefined, deps);
  const updater = await createUpdater(options, deps);
  const results = await updater.addSeries(urls);
  return results.some((result) => result.status === 'failed') ? 1 : 0;
}

export async function runUpdateRemove(
  options: GlobalOptions & { platform: string; seriesId: string },
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const updater = await createUpdater(options, deps);
  if (await updater.removeSeries(options.platform, options.seriesId)) {
    logger.success(`No longer tracking ${options.platform}:${options.seriesId}`);
    return 0;
  }
  logger.warning(`Not tracking ${options.platform}:${options.seriesId}`);
  return 1;
}

export async function runUpdateList(
  options: GlobalOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const updater = await createUpdater(options, deps);
  const records = updater.listSeries();
  if (records.length === 0) {
    logger.info('No series tracked');
    return 0;
  }
  deps.write(`${records.map(formatRecord).join('\n')}\n`);
  return 0;
}

export async function runUpdate(
  options: GlobalOptions,
  signal?: AbortSignal,
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const updater = await createUpdater(options, deps);
  const updates = await updater.updateAll(signal);
  return report(updates.flatMap((update) => update.results));
}

/**
 * Abort the returned signal on SIGINT/SIGTERM; a second signal exits at once
 */
export function createShutdownSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const onSignal = (name: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warning(`Received ${name}, cancelling (press again to force quit)...`);
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

async function execute(task: (signal: AbortSignal) => Promise<number>): Promise<void> {
  const { signal, dispose } = createShutdownSignal();
  try {
    process.exitCode = await task(signal);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration error: ${error.message}`);
    } else {
      logger.error(`Fatal error: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  } finally {
    dispose();
  }
}

const globalArgs = {
  config: option({
    type: optional(string),
    long: 'config',
    short: 'c',
    description: 'Path to configuration file (default: ./panelgrab.yaml)',
  }),
  logLevel: option({
    type: optional(string),
    long: 'log-level',
    description: 'debug, info, success, warning, error or highlight',
  }),
};

const urlsArg = restPositionals({
  type: string,
  displayName: 'urls',
  description: 'Series or issue URLs, or .cbz files to rewrite',
});

const downloadCommand = command({
  name: 'download',
  description: 'Download series or issues',
  args: {
    ...globalArgs,
    urls: urlsArg,
    file: option({
      type: optional(string),
      long: 'file',
      short: 'f',
      description: 'Read more URLs from a file, one per line',
    }),
    template: option({
      type: optional(string),
      long: 'template',
      short: 't',
      description: 'Output path template, e.g. "{series}/{series} #{issuenumber}"',
    }),
    format: option({
      type: optional(oneOf(['cbz', 'dir'])),
      long: 'format',
      description: 'Output format: cbz or dir',
    }),
    overwrite: flag({
      type: boolean,
      long: 'overwrite',
      description: 'Replace issues that were already downloaded',
    }),
    noMetadata: flag({
      type: boolean,
      long: 'no-metadata',
      description: 'Do not write ComicInfo.xml and panelgrab.json',
    }),
    issues: option({
      type: optional(number),
      long: 'issues',
      description: 'Issues downloaded at the same time',
    }),
    pages: option({
      type: optional(number),
      long: 'pages',
      description: 'Pages downloaded at the same time per issue',
    }),
  },
  handler: (args) => execute((signal) => runDownload(args, signal)),
});

const metadataCommand = command({
  name: 'metadata',
  description: 'Print issue metadata as JSON without downloading',
  args: { ...globalArgs, urls: urlsArg },
  handler: (args) => execute((signal) => runMetadata(args, signal)),
});

const updateCommand = subcommands({
  name: 'update',
  description: 'Track series and download new issues',
  cmds: {
    add: command({
      name: 'add',
      description: 'Start tracking series',
      args: { ...globalArgs, urls: urlsArg },
      handler: (args) => execute(() => runUpdateAdd(args)),
    }),
    remove: command({
      name: 'remove',
      description: 'Stop tracking a series',
      args: {
        ...globalArgs,
        platform: positional({ type: string, displayName: 'platform' }),
        seriesId: positional({ type: string, displayName: 'seriesId' }),
      },
      handler: (args) => execute(() => runUpdateRemove(args)),
    }),
    list: command({
      name: 'list',
      description: 'List tracked series',
      args: globalArgs,
      handler: (args) => execute(() => runUpdateList(args)),
    }),
    run: command({
      name: 'run',
      description: 'Download issues released since the last run',
      args: globalArgs,
      handler: (args) => execute((signal) => runUpdate(args, signal)),
    }),
  },
});

// Define CLI using cmd-ts
export const cli = subcommands({
  name: 'panelgrab',
  description: 'Download comics from web platforms into CBZ archives',
  version: '0.1.0',
  cmds: {
    download: downloadCommand,
    metadata: metadataCommand,
    update: updateCommand,
  },
});
