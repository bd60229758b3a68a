/**
 * Console Progress Adapter (Default/CI)
 *
 * Logs structured events as single-line messages.
 */

import type { ProgressPort, ProgressEvent, ProgressLogLevel } from './progress.js';

export const consoleProgress: ProgressPort = {
  emit(event: ProgressEvent): void {
    switch (event.type) {
      case 'pipeline:start':
        console.log(`[progress] Planning ${event.template}`);
        break;
      case 'pipeline:stage':
        if (event.status !== 'started') {
          console.log(`[progress] ${event.stage} ${event.status}${event.detail ? `: ${event.detail}` : ''}`);
        }
        break;
      case 'pipeline:complete':
        console.log(`[progress] ${event.template} ${event.success ? 'planned' : 'failed'}`);
        break;
      case 'emit:file':
        // Quiet per file; the summary covers it
        break;
      case 'emit:complete':
        console.log(`[progress] Emit complete: ${event.summary.written} written`);
        break;
    }
  },

  log(level: ProgressLogLevel, message: string): void {
    switch (level) {
      case 'debug':
        break;
      case 'info':
        console.log(`[info] ${message}`);
        break;
      case 'warn':
        console.warn(`[warn] ${message}`);
        break;
      case 'error':
        console.error(`[error] ${message}`);
        break;
    }
  },
};

/**
 * Silent progress adapter. Discards all events.
 */
export const silentProgress: ProgressPort = {
  emit(_event: ProgressEvent): void {
    // No-op
  },
  log(_level: ProgressLogLevel, _message: string): void {
    // No-op
  },
};
