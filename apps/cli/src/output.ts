/**
 * chalk-based console output.
 */

import chalk from 'chalk';
import { messages } from '@taskmate/core';
import type { OutputSink } from '@taskmate/core';

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Sink ---

/** Console sink for the core: dividers dimmed, errors in red */
export function createConsoleSink(): OutputSink {
  return {
    print(line: string): void {
      info(line === messages.DIVIDER ? chalk.dim(line) : line);
    },
    error(line: string): void {
      error(line);
    },
  };
}
