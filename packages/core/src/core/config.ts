import { join } from 'path';
import type { LayerkitConfig, StrategyName } from '../types/index.js';
import { isStrategyName } from '../types/index.js';
import { DEFAULT_CONFIG, FILE_PATTERNS } from '../constants/index.js';
import { exists, readJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, toError } from '../utils/errors.js';

/**
 * Project configuration for layerkit.
 * Read from layerkit.jsonc (or layerkit.json) in the working directory;
 * JSONC allows comments and trailing commas. Missing keys take defaults.
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

const KNOWN_KEYS: ReadonlyArray<keyof LayerkitConfig> = [
  'templatesDir',
  'maxDepth',
  'defaultStrategy',
  'fileStrategies',
  'includeDev'
];

export interface LoadedConfig {
  config: LayerkitConfig;
  /** Absent when no config file exists */
  path?: string;
}

/**
 * Find the config file in a directory, preferring .jsonc over .json
 */
export async function findConfigFile(cwd: string): Promise<string | undefined> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const path = join(cwd, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return undefined;
}

export async function loadConfig(cwd: string): Promise<LoadedConfig> {
  const path = await findConfigFile(cwd);
  if (!path) {
    logger.debug('Config file not found, using defaults');
    return { config: defaultConfig() };
  }

  logger.debug(`Loading config from: ${path}`);
  let raw: unknown;
  try {
    raw = await readJsoncFile(path);
  } catch (error) {
    throw new ConfigError(`Failed to load configuration: ${toError(error).message}`, { path });
  }

  return { config: parseConfig(raw, path), path };
}

/**
 * Validate a raw config value and merge it over the defaults.
 */
export function parseConfig(raw: unknown, source: string = 'config'): LayerkitConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: configuration must be an object`);
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.some(known => known === key)) {
      logger.warn(`${source}: ignoring unknown configuration key '${key}'`);
    }
  }

  const config = defaultConfig();

  if (raw.templatesDir !== undefined) {
    if (typeof raw.templatesDir !== 'string' || raw.templatesDir.trim() === '') {
      throw new ConfigError(`${source}: 'templatesDir' must be a non-empty string`);
    }
    config.templatesDir = raw.templatesDir;
  }

  if (raw.maxDepth !== undefined) {
    config.maxDepth = parseMaxDepth(raw.maxDepth, `${source}: 'maxDepth'`);
  }

  if (raw.defaultStrategy !== undefined) {
    config.defaultStrategy = parseStrategy(raw.defaultStrategy, `${source}: 'defaultStrategy'`);
  }

  if (raw.fileStrategies !== undefined) {
    if (!isRecord(raw.fileStrategies)) {
      throw new ConfigError(`${source}: 'fileStrategies' must map glob patterns to strategies`);
    }
    const fileStrategies: Record<string, StrategyName> = {};
    for (const [pattern, strategy] of Object.entries(raw.fileStrategies)) {
      fileStrategies[pattern] = parseStrategy(strategy, `${source}: 'fileStrategies.${pattern}'`);
    }
    config.fileStrategies = fileStrategies;
  }

  if (raw.includeDev !== undefined) {
    if (typeof raw.includeDev !== 'boolean') {
      throw new ConfigError(`${source}: 'includeDev' must be a boolean`);
    }
    config.includeDev = raw.includeDev;
  }

  return config;
}

export function parseStrategy(value: unknown, label: string): StrategyName {
  if (!isStrategyName(value)) {
    throw new ConfigError(`${label} must be one of replace, override, merge (got ${JSON.stringify(value)})`);
  }
  return value;
}

export function parseMaxDepth(value: unknown, label: string): number {
  const depth = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof depth !== 'number' || !Number.isInteger(depth) || depth < 0) {
    throw new ConfigError(`${label} must be a non-negative integer (got ${JSON.stringify(value)})`);
  }
  return depth;
}

function defaultConfig(): LayerkitConfig {
  return { ...DEFAULT_CONFIG, fileStrategies: { ...DEFAULT_CONFIG.fileStrategies } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
