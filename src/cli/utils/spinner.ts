/**
 * Spinner helpers shared by long-running commands.
 */

import ora, { type Ora } from 'ora';

import type { CommandContext } from '../types.js';
import type { Logger } from '../../utils/index.js';

/**
 * Start a spinner unless the output is JSON or not a terminal.
 */
export function startSpinner(ctx: CommandContext, text: string): Ora | null {
  return !ctx.options.json && process.stdout.isTTY ? ora(text).start() : null;
}

/**
 * Route library logs around a running spinner.
 */
export function spinnerLogger(ctx: CommandContext, spinner: Ora | null): Logger {
  const around = (write: (message: string) => void) => (message: string) => {
    if (!spinner?.isSpinning) {
      write(message);
      return;
    }
    spinner.clear();
    write(message);
    spinner.render();
  };
  return { info: around(ctx.info), warn: around(ctx.warn), debug: around(ctx.debug) };
}
