import { z } from 'zod';
import { type Result, ok, err } from 'neverthrow';
import type { GrammarMismatchError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';

/**
 * Session directory names: `{type}{index}[-{YYYY-MM-DD}]`, e.g. `session003`
 * or `rest12-2020-03-14`.
 */
export interface ParsedSessionName {
  readonly type: string;
  readonly index: number;
  readonly date?: string;
}

const SESSION_NAME_PATTERN = /^([A-Za-z]+)(\d+)(?:-(\d{4}-\d{2}-\d{2}))?$/;

export const SessionDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'session dates are written as YYYY-MM-DD')
  .refine((value) => !Number.isNaN(Date.parse(value)), 'not a calendar date');

export function parseSessionName(name: string): Result<ParsedSessionName, GrammarMismatchError> {
  const match = SESSION_NAME_PATTERN.exec(name);
  if (!match) {
    return err(Err.grammarMismatch('session', name));
  }
  const [, type, index, date] = match;
  if (type === undefined || index === undefined) {
    return err(Err.grammarMismatch('session', name));
  }
  if (date !== undefined && !SessionDateSchema.safeParse(date).success) {
    return err(Err.grammarMismatch('session', name));
  }
  return ok({ type, index: Number.parseInt(index, 10), date });
}

export function formatSessionName(type: string, index: number, date: string | undefined, width: number): string {
  const base = `${type}${String(index).padStart(width, '0')}`;
  return date === undefined ? base : `${base}-${date}`;
}

/**
 * Whether a directory entry can be a session: not hidden, and following
 * the session naming convention.
 */
export function isSessionDirectoryName(name: string): boolean {
  return !name.startsWith('.') && parseSessionName(name).isOk();
}
