/**
 * Execution Context Module
 *
 * Creates the ExecutionContext for a command: resolves the working directory,
 * loads the project config and applies command-line overrides on top.
 */

import { isAbsolute, resolve } from 'path';
import type { ExecutionContext } from '../types/execution-context.js';
import { isDirectory } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { loadConfig, parseMaxDepth, parseStrategy } from './config.js';

export interface ExecutionOptions {
  /** Working directory (default: process.cwd()) */
  cwd?: string;
  /** Overrides config.templatesDir */
  templates?: string;
  /** Overrides config.maxDepth; strings come straight from the command line */
  maxDepth?: number | string;
  /** Overrides config.defaultStrategy */
  strategy?: string;
  /** Overrides config.includeDev */
  includeDev?: boolean;
}

/**
 * Priority: command-line option > layerkit.jsonc > defaults.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const cwd = resolve(process.cwd(), options.cwd ?? '.');

  if (!(await isDirectory(cwd))) {
    throw new ConfigError(`Working directory does not exist: ${cwd}`);
  }

  const { config, path } = await loadConfig(cwd);

  if (options.templates !== undefined) config.templatesDir = options.templates;
  if (options.maxDepth !== undefined) config.maxDepth = parseMaxDepth(options.maxDepth, '--max-depth');
  if (options.strategy !== undefined) config.defaultStrategy = parseStrategy(options.strategy, '--strategy');
  if (options.includeDev !== undefined) config.includeDev = options.includeDev;

  const templatesDir = isAbsolute(config.templatesDir) ? config.templatesDir : resolve(cwd, config.templatesDir);

  logger.debug('Created execution context', { cwd, templatesDir, configPath: path });

  return { cwd, templatesDir, config };
}
