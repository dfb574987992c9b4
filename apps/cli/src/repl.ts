import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { handleInput, greet } from '@taskmate/core';
import type { OutputSink, TaskList } from '@taskmate/core';

/**
 * Feed each input line to the session until `bye`, end of input, or `signal` aborts.
 * Lines are handled one at a time, in order.
 */
export async function runRepl(
  input: Readable,
  tasks: TaskList,
  sink: OutputSink,
  assistantName: string,
  signal?: AbortSignal,
): Promise<void> {
  greet(sink, assistantName);

  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false, signal });
  // Leaving the loop early, or aborting, closes the interface
  for await (const line of rl) {
    if (handleInput(line, tasks, sink) === 'exit') break;
  }
}
