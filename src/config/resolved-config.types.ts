import type { ComicFormat } from '../types/comic.types';
import type { RetryConfig } from '../types/config.types';
import type { LogLevel } from '../utils/logger';
import type { SourceSettings } from './config-schema';

/**
 * Concurrency limits with all fields required
 */
export type ResolvedConcurrency = {
  issues: number;
  pages: number;
};

/**
 * Fully resolved configuration (CLI > file > defaults)
 */
export type ResolvedConfig = {
  template: string;
  format: ComicFormat;
  overwrite: boolean;
  writeMetadata: boolean;
  updateFile: string;
  logLevel: LogLevel;
  concurrency: ResolvedConcurrency;
  retry: RetryConfig;
  sources: Record<string, SourceSettings>;
};
