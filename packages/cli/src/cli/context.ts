/**
 * CLI output selection.
 *
 * Rich (clack) output for interactive terminals, plain console output for
 * CI and pipes. The choice is made once per process.
 */

import type { OutputPort } from '@pkgformula/core';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';

export type OutputMode = 'rich' | 'plain';

let cachedOutput: { mode: OutputMode; output: OutputPort } | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectOutputMode(env: NodeJS.ProcessEnv = process.env): OutputMode {
  const isTTY = process.stdout.isTTY === true;
  return isTTY && env.CI !== 'true' ? 'rich' : 'plain';
}

export function getCliOutput(mode: OutputMode = detectOutputMode()): OutputPort {
  if (cachedOutput?.mode !== mode) {
    cachedOutput = { mode, output: mode === 'rich' ? createClackOutput() : createPlainOutput() };
  }
  return cachedOutput.output;
}
