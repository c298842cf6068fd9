import { ConfigError } from '../errors/custom-errors';
import type { ComicFormat } from '../types/comic.types';
import type { RetryConfig } from '../types/config.types';
import type { LogLevel } from '../utils/logger';
import { getDefaults } from './config-defaults';
import type { Config, RetrySettings, SourceSettings } from './config-schema';
import type { ResolvedConcurrency, ResolvedConfig } from './resolved-config.types';

/**
 * Settings given on the command line
 */
export type CliOverrides = {
  template?: string;
  format?: ComicFormat;
  overwrite?: boolean;
  writeMetadata?: boolean;
  logLevel?: LogLevel;
  issues?: number;
  pages?: number;
};

/**
 * Centralized configuration resolver
 *
 * Handles the merging hierarchy:
 * 1. Command line (Highest Priority)
 * 2. Config file
 * 3. Default Config (Lowest Priority)
 */
export class ConfigResolver {
  private readonly file: Config;

  constructor(file: Config = {}) {
    this.file = file;
  }

  /**
   * Produce a full configuration object with no missing values
   */
  public resolve(cli: CliOverrides = {}): ResolvedConfig {
    const defaults = getDefaults();

    const config: ResolvedConfig = {
      template: cli.template ?? this.file.template ?? defaults.template,
      format: cli.format ?? this.file.format ?? defaults.format,
      overwrite: cli.overwrite ?? this.file.overwrite ?? defaults.overwrite,
      writeMetadata: cli.writeMetadata ?? this.file.writeMetadata ?? defaults.writeMetadata,
      updateFile: this.file.updateFile ?? defaults.updateFile,
      logLevel: cli.logLevel ?? this.file.logLevel ?? defaults.logLevel,
      concurrency: this.mergeConcurrency(cli, defaults.concurrency),
      retry: this.mergeRetrySettings(this.file.retry, defaults.retry),
      sources: this.normalizeSources(this.file.sources ?? {}),
    };

    this.validate(config);
    return config;
  }

  private mergeConcurrency(cli: CliOverrides, defaults: ResolvedConcurrency): ResolvedConcurrency {
    return {
      issues: cli.issues ?? this.file.concurrency?.issues ?? defaults.issues,
      pages: cli.pages ?? this.file.concurrency?.pages ?? defaults.pages,
    };
  }

  private mergeRetrySettings(file: RetrySettings | undefined, defaults: RetryConfig): RetryConfig {
    return {
      maxRetries: file?.maxRetries ?? defaults.maxRetries,
      initialTimeout: file?.initialTimeout ?? defaults.initialTimeout,
      backoffMultiplier: file?.backoffMultiplier ?? defaults.backoffMultiplier,
      jitterPercentage: file?.jitterPercentage ?? defaults.jitterPercentage,
    };
  }

  /**
   * Platform ids are matched case-insensitively
   */
  private normalizeSources(sources: Record<string, SourceSettings>): Record<string, SourceSettings> {
    return Object.fromEntries(Object.entries(sources).map(([platform, settings]) => [platform.toLowerCase(), settings]));
  }

  /**
   * Validate values the command line can set without schema checks
   */
  private validate(config: ResolvedConfig): void {
    if (!Number.isInteger(config.concurrency.issues) || config.concurrency.issues < 1)
      throw new ConfigError(`Invalid issue concurrency: ${config.concurrency.issues}`);
    if (!Number.isInteger(config.concurrency.pages) || config.concurrency.pages < 1)
      throw new ConfigError(`Invalid page concurrency: ${config.concurrency.pages}`);
    if (config.template.trim() === '') throw new ConfigError('Output template is empty');
  }
}
