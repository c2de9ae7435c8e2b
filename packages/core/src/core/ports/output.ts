/**
 * Output Port Interface
 *
 * Contract for all user-facing output. Core code writes through this
 * interface instead of console.log or a terminal UI library.
 *
 * Implementations:
 *   - consoleOutput (core): plain console.log, safe for CI and pipes
 *   - createClackOutput (cli): @clack/prompts for interactive terminals
 */

/**
 * Spinner interface that works across all output backends.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display an error message */
  error(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;

  /** Create a spinner for long-running operations */
  spinner(): UnifiedSpinner;
}
