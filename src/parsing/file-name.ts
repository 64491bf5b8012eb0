import { type Result, ok, err } from 'neverthrow';
import type { GrammarMismatchError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';

export type BlockType = 'trial' | 'run';

/**
 * Fields of a data file name:
 *
 *   {subject}_{session}_{domain}[_{blocktype}{index}|_all{blocktype}s][_{channel}][{suffix}]
 *
 * e.g. `sub01_sess001_ephys_run002_ch1-ch2.csv`
 *
 * File-level fields are left raw (`channel` may hold `-`-joined channels);
 * `FileSpec` validates them.
 */
export interface ParsedFileName {
  readonly subject: string;
  readonly session: string;
  readonly domain: string;
  readonly blocktype?: BlockType;
  readonly index?: number;
  readonly channel?: string;
  readonly suffix?: string;
}

const FILE_NAME_PATTERN =
  /^([^_/]+)_([^_/]+)_([^_./]+)(?:_(?:(trial|run)(\d+)|all(trial|run)s))?(?:_([^_./]+))?(\.[^_/]+)?$/;

export function parseFileName(name: string): Result<ParsedFileName, GrammarMismatchError> {
  const match = FILE_NAME_PATTERN.exec(name);
  if (!match) {
    return err(Err.grammarMismatch('file', name));
  }
  const [, subject, session, domain, blocktype, index, allBlocktype, channel, suffix] = match;
  if (subject === undefined || session === undefined || domain === undefined) {
    return err(Err.grammarMismatch('file', name));
  }
  return ok({
    subject,
    session,
    domain,
    blocktype: toBlockType(blocktype ?? allBlocktype),
    index: index === undefined ? undefined : Number.parseInt(index, 10),
    channel,
    suffix,
  });
}

function toBlockType(value: string | undefined): BlockType | undefined {
  if (value === 'trial' || value === 'run') return value;
  return undefined;
}

export function isBlockType(value: unknown): value is BlockType {
  return value === 'trial' || value === 'run';
}
