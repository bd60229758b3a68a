/**
 * Clack Output Adapter
 *
 * CLI implementations of the core OutputPort: @clack/prompts for interactive
 * terminals, plain console output (with an ora spinner) for CI and pipes.
 */

import { log, spinner as clackSpinner, confirm as clackConfirm, note as clackNote, isCancel, cancel } from '@clack/prompts';
import ora from 'ora';
import type { OutputPort, UnifiedSpinner } from '@layerkit/core/core/ports/output.js';
import { UserCancellationError } from '@layerkit/core/utils/errors.js';

export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    async confirm(message: string, options?: { initial?: boolean }): Promise<boolean> {
      const result = await clackConfirm({
        message,
        initialValue: options?.initial ?? false,
      });
      if (isCancel(result)) {
        cancel('Operation cancelled.');
        throw new UserCancellationError();
      }
      return result;
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        },
      };
    },
  };
}

/**
 * Plain console OutputPort for non-interactive sessions (CI, piped output).
 * Confirmations take their default answer.
 */
export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.log(message);
    },

    step(message: string): void {
      console.log(message);
    },

    message(message: string): void {
      console.log(message);
    },

    success(message: string): void {
      console.log(`✓ ${message}`);
    },

    error(message: string): void {
      console.error(`✗ ${message}`);
    },

    warn(message: string): void {
      console.log(`⚠ ${message}`);
    },

    note(content: string, title?: string): void {
      console.log(title ? `\n${title}\n${content}` : `\n${content}`);
    },

    async confirm(_message: string, options?: { initial?: boolean }): Promise<boolean> {
      return options?.initial ?? false;
    },

    spinner(): UnifiedSpinner {
      const s = ora({ spinner: 'dots', isEnabled: process.stderr.isTTY === true });

      return {
        start(message: string) {
          s.start(message);
        },
        stop(finalMessage?: string) {
          if (finalMessage) {
            s.succeed(finalMessage);
          } else {
            s.stop();
          }
        },
        message(text: string) {
          s.text = text;
        },
      };
    },
  };
}
