/**
 * Path formatting configuration - parse, don't validate.
 *
 * - Zod validates the environment at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 * - `DEFAULT_PATH_CONFIG` applies when callers pass no configuration
 */

import { z } from 'zod';
import { type Result, ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import { ModeSchema, type Mode } from '../predicate/modes.js';

// =============================================================================
// Branded primitives
// =============================================================================

/** Number of digits indices are zero-padded to. */
export type IndexWidth = Brand<number, 'IndexWidth'>;

export interface PathConfig {
  /** padding of run/trial indices in file names (`run007`) */
  readonly runIndexWidth: IndexWidth;
  /** padding of session indices when a session name is formatted from type + index */
  readonly sessionIndexWidth: IndexWidth;
  /** mode of predicates built without one */
  readonly defaultMode: Mode;
}

export type ValidatedConfig = ValidatedAppConfig<PathConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const IndexWidthSchema = (variable: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int(`${variable} must be an integer`)
        .min(1, `${variable} must be at least 1`)
        .max(12, `${variable} cannot exceed 12`)
        .default(3)
    );

const EnvSchema = z.object({
  RECTREE_RUN_INDEX_WIDTH: IndexWidthSchema('RECTREE_RUN_INDEX_WIDTH'),
  RECTREE_SESSION_INDEX_WIDTH: IndexWidthSchema('RECTREE_SESSION_INDEX_WIDTH'),
  RECTREE_DEFAULT_MODE: ModeSchema.default('read'),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export const DEFAULT_PATH_CONFIG: PathConfig = buildConfig(EnvSchema.parse({}));

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): PathConfig {
  return {
    runIndexWidth: env.RECTREE_RUN_INDEX_WIDTH as IndexWidth,
    sessionIndexWidth: env.RECTREE_SESSION_INDEX_WIDTH as IndexWidth,
    defaultMode: env.RECTREE_DEFAULT_MODE,
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
