/**
 * Conversion settings: defaults, optional JSON config file, CLI overrides
 */

import { readFile } from 'node:fs/promises';
import type { ConversionConfig } from '../schemas/index.js';
import {
  formatValidationErrors,
  safeValidateConfigFile,
  safeValidateConversionConfig,
  validateConversionConfig,
} from '../schemas/index.js';
import type { ValidatedConfigFile } from '../schemas/index.js';
import { ConfigError, errorMessage } from './errors.js';

/**
 * Settings of a run with no config file and no flags
 */
export const DEFAULT_CONFIG: Readonly<ConversionConfig> = validateConversionConfig({});

export interface ResolveConfigOptions {
  /** JSON config file to load (must exist when given) */
  configPath?: string;
  /** Values taking precedence over the config file; undefined entries are ignored */
  overrides?: Partial<ConversionConfig>;
}

/**
 * Load and validate a JSON config file
 *
 * @throws ConfigError if the file is missing, not JSON, or has invalid settings
 */
export async function loadConfigFile(configPath: string): Promise<ValidatedConfigFile> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw new ConfigError(`Failed to read config file ${configPath}: ${errorMessage(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${configPath}: ${errorMessage(error)}`);
  }

  const result = safeValidateConfigFile(data);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${configPath}`, formatValidationErrors(result.error));
  }
  return result.data;
}

function definedEntries(values: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Merge defaults, config file and overrides into validated settings
 *
 * @throws ConfigError if the merged settings are invalid
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<ConversionConfig> {
  const fromFile = options.configPath ? await loadConfigFile(options.configPath) : {};
  const overrides = definedEntries(options.overrides ?? {});

  const result = safeValidateConversionConfig({ ...fromFile, ...overrides });
  if (!result.success) {
    throw new ConfigError('Invalid settings', formatValidationErrors(result.error));
  }
  return result.data;
}
