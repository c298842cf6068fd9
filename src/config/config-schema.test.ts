import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors/custom-errors';
import { LogLevel } from '../utils/logger';
import { validateConfig, validateConfigSafe } from './config-schema';

describe('Config schema', () => {
  it('should accept a complete configuration', () => {
    const config = validateConfig({
      template: '{series}/{series} #{issuenumber}',
      format: 'dir',
      overwrite: true,
      writeMetadata: false,
      updateFile: 'updates.json',
      logLevel: 'debug',
      concurrency: { issues: 1, pages: 8 },
      retry: { maxRetries: 5, initialTimeout: 200, backoffMultiplier: 1.5, jitterPercentage: 0 },
      sources: { DCUniverseInfinite: { apiKey: 'test-secret', cookies: { session: 'abc' } } },
    });

    expect(config.format).toBe('dir');
    expect(config.logLevel).toBe(LogLevel.DEBUG);
    expect(config.sources?.DCUniverseInfinite?.apiKey).toBe('test-secret');
  });

  it('should accept an empty file', () => {
    expect(validateConfig(undefined)).toEqual({});
    expect(validateConfig(null)).toEqual({});
  });

  it('should reject an unknown format', () => {
    expect(() => validateConfig({ format: 'pdf' })).toThrow(ConfigError);
  });

  it('should name the failing key', () => {
    const result = validateConfigSafe({ concurrency: { issues: 0 } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatch(/^"concurrency\.issues" .+ \[TOO_SMALL\]$/);
    }
  });

  it('should reject non-integer concurrency', () => {
    expect(validateConfigSafe({ concurrency: { pages: 2.5 } }).success).toBe(false);
  });

  it('should reject jitter above 100 percent', () => {
    expect(validateConfigSafe({ retry: { jitterPercentage: 150 } }).success).toBe(false);
  });

  it('should reject non-string credentials', () => {
    expect(() => validateConfig({ sources: { izneo: { password: 1234 } } })).toThrow(
      /^Invalid configuration: "sources\.izneo\.password"/,
    );
  });
});
