/**
 * Turns one line of user input into a Command.
 *
 * Classification is ordered and first match wins:
 * bye, mark <n>, list, delete <n>, find, unmark <n>, todo, deadline, event.
 * Index commands must match their whole pattern (n in 1..100), so `mark 0`
 * or `mark 1 2` falls through to "doesn't exist as a command".
 *
 * Field extraction is literal: a field starts exactly one character after
 * its prefix and ends at the first occurrence of the next marker.
 */

import type { Command } from '../types/command.js';
import type { ParseError, ParseResult } from '../types/results.js';
import { createTodo, createDeadline, createEvent } from '../tasks/task.js';

const MARK_RE = /^mark (100|[1-9]|[1-9][0-9])$/;
const UNMARK_RE = /^unmark (100|[1-9]|[1-9][0-9])$/;
const DELETE_RE = /^delete (100|[1-9]|[1-9][0-9])$/;
const INTEGER_RE = /^[+-]?\d+$/;

const TODO_PREFIX_LENGTH = 'todo '.length;

type Extractor = (raw: string) => Command | null;

/** Split on single spaces, dropping trailing empty pieces */
export function tokenize(raw: string): string[] {
  const parts = raw.split(' ');
  while (parts.length > 0 && parts[parts.length - 1] === '') parts.pop();
  return parts;
}

function firstTokenIs(raw: string, keyword: string): boolean {
  return tokenize(raw)[0] === keyword;
}

/**
 * Text between `prefix` and `marker`. Null when the marker is missing or
 * comes before the start offset.
 */
export function extractBetween(raw: string, prefix: string, marker: string): string | null {
  const start = raw.indexOf(prefix) + prefix.length + 1;
  const end = raw.indexOf(marker);
  if (end < 0 || start > end) return null;
  return raw.substring(start, end).trimEnd();
}

/** Text after `prefix` to the end of input. Null when the start offset runs past the end. */
export function extractToEnd(raw: string, prefix: string): string | null {
  const start = raw.indexOf(prefix) + prefix.length + 1;
  if (start > raw.length) return null;
  return raw.substring(start);
}

function parseIndex(token: string | undefined): number | null {
  if (token === undefined || !INTEGER_RE.test(token)) return null;
  return parseInt(token, 10);
}

// --- Extractors ---

function extractMark(raw: string): Command | null {
  const index = parseIndex(tokenize(raw)[1]);
  return index === null ? null : { $type: 'mark', index };
}

function extractUnmark(raw: string): Command | null {
  const index = parseIndex(tokenize(raw)[1]);
  return index === null ? null : { $type: 'unmark', index };
}

function extractDelete(raw: string): Command | null {
  const index = parseIndex(tokenize(raw)[1]);
  return index === null ? null : { $type: 'delete', index };
}

/** `find  x` (two spaces) yields an empty keyword, which matches every task */
function extractFind(raw: string): Command | null {
  const keyword = tokenize(raw)[1];
  if (keyword === undefined) return null;
  return { $type: 'find', keyword };
}

function extractTodo(raw: string): Command | null {
  if (raw.length < TODO_PREFIX_LENGTH) return null;
  const description = raw.substring(TODO_PREFIX_LENGTH);
  if (!description) return null;
  return { $type: 'add-todo', task: createTodo(description) };
}

function extractDeadline(raw: string): Command | null {
  const description = extractBetween(raw, 'deadline', '/by');
  const by = extractToEnd(raw, '/by');
  if (!description || by === null) return null;
  return { $type: 'add-deadline', task: createDeadline(description, by) };
}

function extractEvent(raw: string): Command | null {
  const description = extractBetween(raw, 'event', '/from');
  const from = extractBetween(raw, '/from', '/to');
  const to = extractToEnd(raw, '/to');
  if (!description || from === null || to === null) return null;
  return { $type: 'add-event', task: createEvent(description, from, to) };
}

// --- Classification ---

interface Rule {
  readonly name: string;
  readonly matches: (raw: string) => boolean;
  readonly extract: Extractor;
}

/** Order matters */
const RULES: readonly Rule[] = [
  { name: 'bye', matches: raw => raw === 'bye', extract: () => ({ $type: 'bye' }) },
  { name: 'mark', matches: raw => MARK_RE.test(raw), extract: extractMark },
  { name: 'list', matches: raw => raw === 'list', extract: () => ({ $type: 'list' }) },
  { name: 'delete', matches: raw => DELETE_RE.test(raw), extract: extractDelete },
  { name: 'find', matches: raw => firstTokenIs(raw, 'find'), extract: extractFind },
  { name: 'unmark', matches: raw => UNMARK_RE.test(raw), extract: extractUnmark },
  { name: 'todo', matches: raw => firstTokenIs(raw, 'todo'), extract: extractTodo },
  { name: 'deadline', matches: raw => firstTokenIs(raw, 'deadline'), extract: extractDeadline },
  { name: 'event', matches: raw => firstTokenIs(raw, 'event'), extract: extractEvent },
];

function failure(error: ParseError): ParseResult {
  return { type: 'error', error };
}

export function parseCommand(raw: string): ParseResult {
  const rule = RULES.find(r => r.matches(raw));
  if (!rule) {
    return failure({ kind: 'unrecognized-command', message: `${raw} doesn't exist as a command` });
  }

  const command = rule.extract(raw);
  if (!command) {
    return failure({ kind: 'invalid-input', message: `Invalid input for ${rule.name}!` });
  }
  return { type: 'success', command };
}
