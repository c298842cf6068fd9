import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { resolveEnv, resolveEnvRecursive } from './env-resolver';

describe('Env Resolver', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('resolveEnv', () => {
    it('should resolve existing environment variable', () => {
      process.env.TEST_VAR = 'resolved_value';
      expect(resolveEnv('Value is ${TEST_VAR}')).toBe('Value is resolved_value');
    });

    it('should return string as is if no variables', () => {
      expect(resolveEnv('No variables here')).toBe('No variables here');
    });

    it('should throw error for missing environment variable', () => {
      delete process.env.MISSING_VAR;
      expect(() => resolveEnv('Value is ${MISSING_VAR}')).toThrow('Environment variable "MISSING_VAR" is not set');
    });

    it('should resolve multiple variables', () => {
      process.env.VAR1 = 'one';
      process.env.VAR2 = 'two';
      expect(resolveEnv('${VAR1} and ${VAR2}')).toBe('one and two');
    });
  });

  describe('resolveEnvRecursive', () => {
    it('should resolve variables in nested object', () => {
      process.env.PANEL_KEY = 'test-secret';
      process.env.PANEL_USER = 'reader';

      const config = {
        sources: {
          izneo: { apiKey: '${PANEL_KEY}', username: '${PANEL_USER}' },
        },
        template: '{series}/{title}',
        concurrency: { issues: 2 },
      };

      expect(resolveEnvRecursive(config)).toEqual({
        sources: {
          izneo: { apiKey: 'test-secret', username: 'reader' },
        },
        template: '{series}/{title}',
        concurrency: { issues: 2 },
      });
    });

    it('should resolve variables in array', () => {
      process.env.ITEM1 = 'item1';
      expect(resolveEnvRecursive(['static', '${ITEM1}'])).toEqual(['static', 'item1']);
    });

    it('should keep non-string scalars', () => {
      expect(resolveEnvRecursive(null)).toBeNull();
      expect(resolveEnvRecursive(3)).toBe(3);
      expect(resolveEnvRecursive(true)).toBe(true);
    });

    it('should not modify the input', () => {
      process.env.ITEM1 = 'item1';
      const input = { value: '${ITEM1}' };
      resolveEnvRecursive(input);
      expect(input.value).toBe('${ITEM1}');
    });
  });
});
