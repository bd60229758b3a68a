/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations.
 * Command handlers use this instead of calling createExecutionContext()
 * directly so ports are always injected.
 */

import type { ExecutionContext } from '@layerkit/core/types/execution-context.js';
import { createExecutionContext, type ExecutionOptions } from '@layerkit/core/core/execution-context.js';
import type { OutputPort } from '@layerkit/core/core/ports/output.js';
import { consoleProgress } from '@layerkit/core/core/ports/console-progress.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
  /** Stream pipeline progress events as log lines */
  verboseProgress?: boolean;
}

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;

function getCliOutput(isInteractive: boolean): OutputPort {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  cachedPlainOutput ??= createPlainOutput();
  return cachedPlainOutput;
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  ctx.output = getCliOutput(detectInteractive(options.interactive));
  if (options.verboseProgress) {
    ctx.progress = consoleProgress;
  }
  return ctx;
}

/** Options registered on the root program, visible to every command. */
export type GlobalOptions = {
  cwd?: string;
  templates?: string;
  maxDepth?: string;
  strategy?: string;
  excludeDev?: boolean;
  progress?: boolean;
};

export function toContextOptions(globals: GlobalOptions): CliContextOptions {
  return {
    cwd: globals.cwd,
    templates: globals.templates,
    maxDepth: globals.maxDepth,
    strategy: globals.strategy,
    includeDev: globals.excludeDev ? false : undefined,
    verboseProgress: globals.progress,
  };
}
