/**
 * Clack Output Adapter
 *
 * CLI OutputPort implementation that routes to @clack/prompts for
 * interactive terminal sessions.
 */

import { log, spinner as clackSpinner, confirm as clackConfirm, note as clackNote, isCancel, cancel } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';
import { UserCancellationError } from '../utils/errors.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
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
        throw new UserCancellationError('Operation cancelled by user');
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
