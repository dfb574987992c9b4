// Types
export { TaskType } from './types/index.js';
export type {
  Task, TodoTask, DeadlineTask, EventTask,
  Command, ByeCmd, ListCmd, FindCmd, MarkCmd, UnmarkCmd, DeleteCmd,
  AddTodoCmd, AddDeadlineCmd, AddEventCmd,
  ParseErrorKind, ParseError, ParseResult, ExecutionResult, OutputSink,
} from './types/index.js';

// Tasks
export { createTodo, createDeadline, createEvent, formatTask, taskMarker } from './tasks/task.js';
export { TaskList } from './collection/task-list.js';

// Parsing and execution
export { parseCommand } from './parsers/index.js';
export { executeCommand, messages } from './commands/index.js';
export { handleInput, greet } from './session.js';
export type { SessionStep } from './session.js';
export { createBufferSink } from './buffer-sink.js';
export type { BufferSink } from './buffer-sink.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, closeDb, getDefaultDbPath } from './db.js';
export type { TaskmateDb } from './db.js';

// Queries
export * from './queries/index.js';
