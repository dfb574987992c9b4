/**
 * Key-value config storage operations.
 */

import { eq } from 'drizzle-orm';
import type { TaskmateDb } from '../db.js';
import { config } from '../schema/index.js';

const ASSISTANT_NAME_KEY = 'assistant_name';
export const DEFAULT_ASSISTANT_NAME = 'taskmate';

/** Get a config value by key */
export function getConfig(db: TaskmateDb, key: string): string | null {
  const row = db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
  return row?.value ?? null;
}

/** Set a config value */
export function setConfig(db: TaskmateDb, key: string, value: string): void {
  db.insert(config).values({ key, value }).onConflictDoUpdate({ target: config.key, set: { value } }).run();
}

/** Name the assistant greets the user with */
export function getAssistantName(db: TaskmateDb): string {
  return getConfig(db, ASSISTANT_NAME_KEY) ?? DEFAULT_ASSISTANT_NAME;
}

export function setAssistantName(db: TaskmateDb, name: string): void {
  setConfig(db, ASSISTANT_NAME_KEY, name);
}
