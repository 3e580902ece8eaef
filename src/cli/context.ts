/**
 * CLI output selection
 *
 * Interactive sessions (TTY, not CI) get the Clack adapter; everything else
 * gets plain console output.
 */

import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { createClackOutput } from './clack-output-adapter.js';

/** Cached port for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true && process.stdout.isTTY === true;
  return isTTY && env.CI !== 'true';
}

export function getCliOutput(interactive?: boolean): OutputPort {
  if (detectInteractive(interactive)) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  return consoleOutput;
}
