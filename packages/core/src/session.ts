/**
 * One step of the read loop: parse a line, report a parse failure or run the command.
 */

import type { OutputSink } from './types/output.js';
import type { TaskList } from './collection/task-list.js';
import { parseCommand } from './parsers/command-parser.js';
import { executeCommand } from './commands/command-executor.js';
import { greeting } from './commands/messages.js';

export type SessionStep = 'continue' | 'exit';

export function handleInput(raw: string, tasks: TaskList, sink: OutputSink): SessionStep {
  const parsed = parseCommand(raw);
  if (parsed.type === 'error') {
    sink.error(parsed.error.message);
    return 'continue';
  }
  return executeCommand(parsed.command, tasks, sink).type === 'exit' ? 'exit' : 'continue';
}

export function greet(sink: OutputSink, name: string): void {
  for (const line of greeting(name)) sink.print(line);
}
