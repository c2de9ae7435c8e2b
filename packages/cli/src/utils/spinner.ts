/**
 * Ora-backed spinner for plain (non-interactive) output.
 *
 * Ora only animates on a TTY; elsewhere start() is silent and the final
 * message is still printed.
 */

import ora, { type Ora } from 'ora';

export class Spinner {
  private spinner: Ora;

  constructor(message: string = 'Loading...') {
    this.spinner = ora({ text: message, spinner: 'dots' });
  }

  start(): void {
    this.spinner.start();
  }

  update(message: string): void {
    this.spinner.text = message;
  }

  succeed(message: string): void {
    this.spinner.succeed(message);
  }
}
