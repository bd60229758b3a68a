/**
 * Core Ports
 *
 * Boundary between the engine and external concerns (terminal UI, CI logs).
 */

export type { OutputPort, UnifiedSpinner } from './output.js';
export type {
  ProgressPort,
  ProgressEvent,
  ProgressLogLevel,
  ProgressEventBase,
  PipelineStage,
  PipelineProgressEvent,
  EmissionProgressEvent,
} from './progress.js';
export { progressEvent } from './progress.js';
export { consoleOutput } from './console-output.js';
export { consoleProgress, silentProgress } from './console-progress.js';
export { resolveOutput, resolveProgress } from './resolve.js';
