/**
 * Loads `converter.config.yaml` and validates it against the config schema.
 * A missing file yields the defaults; an invalid one is a ConfigError.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { ConfigError } from '../ingestion/errors.js';
import { createLogger } from '../utils/logger.js';
import { validateYaml } from '../utils/yaml.js';
import { ConverterConfigSchema, type ConverterConfig } from './schema.js';

const logger = createLogger('config');

export const DEFAULT_CONFIG_FILE = 'converter.config.yaml';

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(data: unknown, path?: string): ConverterConfig {
  // An empty YAML document parses to null.
  const result = ConverterConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`, path);
  }
  return result.data;
}

/**
 * Read and validate a config file. When no path is given the default file in
 * the working directory is used if it exists.
 */
export async function loadConfig(path?: string): Promise<ConverterConfig> {
  const resolved = resolve(path ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(resolved)) {
    if (path) {
      throw new ConfigError(`Config file not found: ${resolved}`, resolved);
    }
    logger.debug('No config file found, using defaults');
    return parseConfig({});
  }

  const content = await readFile(resolved, 'utf-8');
  const parsed = validateYaml(content);
  if (!parsed.valid) {
    throw new ConfigError(`Config file is not valid YAML: ${parsed.error}`, resolved);
  }

  logger.debug(`Loaded config from ${resolved}`);
  return parseConfig(parsed.data, resolved);
}
