/**
 * CLI helpers: argument parsing, line splitting, error handling.
 */

import type { Priority as PriorityType, TaskId, Timestamp } from '@task-registry/core';
import { Priority } from '@task-registry/core';
import type { Session } from './session.js';
import * as out from './output.js';

/**
 * Parse a priority string into a Priority value, or null if unrecognised.
 */
export function parsePriorityArg(level: string): PriorityType | null {
  switch (level.toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.High;
    case 'medium': case '2': case 'p2': return Priority.Medium;
    case 'low': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

export function requirePriority(level: string): PriorityType {
  const priority = parsePriorityArg(level);
  if (priority === null) throw new Error(`Invalid priority '${level}'. Use high, medium or low`);
  return priority;
}

function parseWholeNumber(value: string, label: string): number {
  if (!/^\d+$/.test(value)) throw new Error(`Invalid ${label} '${value}'. Expected a whole number`);
  const n = Number(value);
  if (!Number.isSafeInteger(n)) throw new Error(`Invalid ${label} '${value}'. Number is too large`);
  return n;
}

export function parseTaskId(value: string): TaskId {
  return parseWholeNumber(value, 'task id');
}

export function parseTimestamp(value: string): Timestamp {
  return parseWholeNumber(value, 'timestamp');
}

export function parseCount(value: string): number {
  return parseWholeNumber(value, 'number');
}

/**
 * Split a command line into arguments. Single and double quotes group
 * words; a backslash escapes the next character outside single quotes.
 */
export function splitArgs(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let inArg = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (ch === '\\' && i + 1 < line.length) {
      current += line.charAt(++i);
      inArg = true;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') quote = null;
      else current += ch;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inArg = true;
    } else if (/\s/.test(ch)) {
      if (inArg) {
        args.push(current);
        current = '';
        inArg = false;
      }
    } else {
      current += ch;
      inArg = true;
    }
  }

  if (quote !== null) throw new Error(`Unterminated ${quote} quote`);
  if (inArg) args.push(current);
  return args;
}

/**
 * Wrap a command action with error handling. A failure is printed and
 * counted on the session; the session keeps going.
 */
export function $try(session: Session, fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    session.failures += 1;
    out.error(out.formatError(err));
  }
}

