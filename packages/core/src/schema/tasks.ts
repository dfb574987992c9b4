import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import type { TaskType } from '../types/task.js';

export const tasks = sqliteTable('tasks', {
  /** 0-based place in the list; rewritten on every save */
  position: integer('position').primaryKey(),
  type: text('type').$type<TaskType>().notNull(),
  description: text('description').notNull(),
  isDone: integer('is_done', { mode: 'boolean' }).notNull().default(false),
  /** Deadline only */
  by: text('by'),
  /** Event only */
  from: text('event_from'),
  to: text('event_to'),
});
