/**
 * Zod schemas for configuration validation
 *
 * Types are inferred from the schemas so they stay in sync.
 */

import { z } from 'zod';
import { ConfigError } from '../errors/custom-errors';
import { ComicFormatSchema } from '../types/comic.types';
import { LogLevel } from '../utils/logger';

/**
 * Log level, case-insensitive ("debug" and "DEBUG" both work)
 */
export const LogLevelSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toUpperCase() : value),
  z.enum(LogLevel),
);

export const ConcurrencySettingsSchema = z.object({
  issues: z.number().int().positive().optional().describe('Issues downloaded at the same time'),
  pages: z.number().int().positive().optional().describe('Pages fetched at the same time per issue'),
});

export type ConcurrencySettings = z.infer<typeof ConcurrencySettingsSchema>;

export const RetrySettingsSchema = z.object({
  maxRetries: z.number().int().nonnegative().optional().describe('Maximum number of retry attempts'),
  initialTimeout: z.number().positive().optional().describe('Initial retry delay in milliseconds'),
  backoffMultiplier: z.number().min(1).optional().describe('Multiplier for exponential backoff'),
  jitterPercentage: z.number().int().min(0).max(100).optional().describe('Jitter percentage for retry delays'),
});

export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

/**
 * Credentials and cookies for one platform
 */
export const SourceSettingsSchema = z.object({
  apiKey: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  cookies: z.record(z.string(), z.string()).optional().describe('Cookies sent with every request'),
});

export type SourceSettings = z.infer<typeof SourceSettingsSchema>;

/**
 * Main configuration schema
 */
export const ConfigSchema = z.object({
  template: z.string().min(1).optional().describe('Output path template'),
  format: ComicFormatSchema.optional().describe('Output format'),
  overwrite: z.boolean().optional().describe('Replace existing output'),
  writeMetadata: z.boolean().optional().describe('Write ComicInfo.xml and panelgrab.json'),
  updateFile: z.string().min(1).optional().describe('Path to update file'),
  logLevel: LogLevelSchema.optional(),
  concurrency: ConcurrencySettingsSchema.optional(),
  retry: RetrySettingsSchema.optional(),
  sources: z.record(z.string(), SourceSettingsSchema).optional().describe('Per-platform settings'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Validate configuration using Zod
 *
 * @throws ConfigError if validation fails
 */
export function validateConfig(rawConfig: unknown): Config {
  const result = ConfigSchema.safeParse(rawConfig ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Validate with custom error formatting
 */
export function validateConfigSafe(rawConfig: unknown): { success: true } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(rawConfig ?? {});
  return result.success ? { success: true } : { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}
