export { TaskType } from './task.js';
export type { Task, TodoTask, DeadlineTask, EventTask } from './task.js';
export type {
  Command, ByeCmd, ListCmd, FindCmd, MarkCmd, UnmarkCmd, DeleteCmd,
  AddTodoCmd, AddDeadlineCmd, AddEventCmd,
} from './command.js';
export type { ParseErrorKind, ParseError, ParseResult, ExecutionResult } from './results.js';
export type { OutputSink } from './output.js';
