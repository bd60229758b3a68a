/**
 * Execution Context Types
 *
 * Carries the resolved configuration and the port implementations a command
 * runs with, so the same core logic can be driven by the CLI or by tests.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { ProgressPort } from '../core/ports/progress.js';
import type { LayerkitConfig } from './index.js';

export interface ExecutionContext {
  /**
   * Absolute working directory. The templates directory and the config file
   * are resolved against it.
   */
  cwd: string;

  /** Absolute path of the templates directory */
  templatesDir: string;

  /** Effective configuration (file values merged over defaults, then CLI overrides) */
  config: LayerkitConfig;

  /**
   * Output port for user-facing messages.
   * When not provided, defaults to consoleOutput.
   */
  output?: OutputPort;

  /**
   * Progress port for pipeline events.
   * When not provided, defaults to silentProgress.
   */
  progress?: ProgressPort;
}
