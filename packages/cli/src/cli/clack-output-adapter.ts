/**
 * Clack Output Adapter
 *
 * CLI implementations of the core OutputPort: @clack/prompts for
 * interactive terminals, console plus an ora spinner otherwise.
 */

import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import { consoleOutput, type OutputPort, type UnifiedSpinner } from '@pkgformula/core';
import { Spinner } from '../utils/spinner.js';

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
 * Console output for CI and piped sessions. Spinners go through ora,
 * which stays quiet when stdout is not a TTY.
 */
export function createPlainOutput(): OutputPort {
  return {
    ...consoleOutput,

    spinner(): UnifiedSpinner {
      let active: Spinner | null = null;
      let text = '';

      return {
        start(message: string) {
          if (active) return;
          text = message;
          active = new Spinner(message);
          active.start();
        },
        stop(finalMessage?: string) {
          if (!active) return;
          active.succeed(finalMessage ?? text);
          active = null;
        },
        message(next: string) {
          text = next;
          active?.update(next);
        },
      };
    },
  };
}
