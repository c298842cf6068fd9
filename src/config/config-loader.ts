import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors';
import { resolveEnvRecursive } from '../utils/env-resolver';
import { type Config, validateConfig } from './config-schema';

/**
 * Default config file path
 */
export const DEFAULT_CONFIG_PATH = './panelgrab.yaml';

/**
 * Load and parse configuration from YAML file
 *
 * A missing file at the default path means "no configuration"; a missing file
 * the user asked for explicitly is an error.
 *
 * @param configPath - Path to config file, relative to the working directory
 * @throws ConfigError if the file is unreadable or invalid
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  const absolutePath = resolve(process.cwd(), configPath ?? DEFAULT_CONFIG_PATH);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf8');
  } catch (error) {
    if (configPath === undefined && isNotFound(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read configuration file "${absolutePath}": ${errorMessage(error)}`);
  }

  let rawConfig: unknown;
  try {
    rawConfig = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${errorMessage(error)}`);
  }

  // Resolve environment variables before validation so ${VAR} works for any key
  return validateConfig(resolveEnvRecursive(rawConfig));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
