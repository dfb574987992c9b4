/**
 * CLI helpers: database path resolution, error handling.
 */

import { getDefaultDbPath, setAssistantName } from '@taskmate/core';
import type { TaskmateDb } from '@taskmate/core';
import * as out from './output.js';

export const DB_PATH_ENV = 'TASKMATE_DB';

/**
 * Resolve the database path.
 * Priority: --db option > TASKMATE_DB > platform default.
 */
export function resolveDbPath(
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicitPath) return explicitPath;
  const fromEnv = env[DB_PATH_ENV];
  if (fromEnv) return fromEnv;
  return getDefaultDbPath();
}

/** Persist a new assistant name and confirm it */
export function renameAssistant(db: TaskmateDb, name: string): void {
  setAssistantName(db, name);
  out.success(`Assistant name set to '${name}'`);
}

/**
 * Run an action, printing any thrown error in red and setting a failing
 * exit code instead of crashing.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
    process.exitCode = 1;
  }
}
