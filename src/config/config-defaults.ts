import { ComicFormat } from '../types/comic.types';
import { LogLevel } from '../utils/logger';
import type { ResolvedConfig } from './resolved-config.types';

export const DEFAULT_TEMPLATE = '{series}/{title}';

export const defaults: ResolvedConfig = {
  template: DEFAULT_TEMPLATE,
  format: ComicFormat.CBZ,
  overwrite: false,
  writeMetadata: true,
  updateFile: 'panelgrab-updates.json',
  logLevel: LogLevel.INFO,
  concurrency: {
    issues: 2,
    pages: 4,
  },
  retry: {
    maxRetries: 3,
    initialTimeout: 1000,
    backoffMultiplier: 2,
    jitterPercentage: 10,
  },
  sources: {},
};

/**
 * Default configuration values
 */
export function getDefaults(): ResolvedConfig {
  return structuredClone(defaults);
}
