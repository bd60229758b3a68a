/**
 * Port Resolution Helpers
 *
 * Resolve OutputPort and ProgressPort from a context, falling back to safe
 * defaults when ports are not explicitly provided.
 */

import type { OutputPort } from './output.js';
import type { ProgressPort } from './progress.js';
import { consoleOutput } from './console-output.js';
import { silentProgress } from './console-progress.js';

export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}

/**
 * Progress events are opt-in: the default is silent, not consoleProgress.
 */
export function resolveProgress(ctx?: { progress?: ProgressPort }): ProgressPort {
  return ctx?.progress ?? silentProgress;
}
