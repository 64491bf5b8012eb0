/**
 * Error Hierarchy - Discriminated Unions
 *
 * Errors are data: every failure of the predicate layer and of the
 * container layer is one of the tagged records below. Throwing
 * conveniences wrap them in `SpecificationError` (see ./specification-error.ts).
 */

import type { Brand } from '../runtime/brand.js';
import type { DataLevel } from '../predicate/levels.js';
import type { SelectionStatus } from '../predicate/selection-status.js';

// ============================================================================
// Specification Errors (predicate, file and session specs)
// ============================================================================

export type SpecError =
  | InvalidSpecificationError
  | ConflictingSpecificationError
  | InvalidIndexError
  | UnresolvablePathError
  | WrongBlockTypeError
  | GrammarMismatchError;

export interface InvalidSpecificationError {
  readonly _tag: 'InvalidSpecification';
  readonly field: string;
  readonly value: string;
  readonly message: string;
}

export interface ConflictingSpecificationError {
  readonly _tag: 'ConflictingSpecification';
  readonly fields: readonly string[];
  readonly message: string;
}

export interface InvalidIndexError {
  readonly _tag: 'InvalidIndex';
  readonly label: string;
  readonly value: string;
  readonly message: string;
}

export interface UnresolvablePathError {
  readonly _tag: 'UnresolvablePath';
  readonly level: DataLevel;
  readonly status: SelectionStatus;
  readonly message: string;
}

export interface WrongBlockTypeError {
  readonly _tag: 'WrongBlockType';
  readonly expected: 'trial' | 'run';
  readonly actual: 'trial' | 'run' | 'none';
  readonly message: string;
}

export interface GrammarMismatchError {
  readonly _tag: 'GrammarMismatch';
  readonly grammar: 'file' | 'session';
  readonly input: string;
  readonly message: string;
}

// ============================================================================
// Container Errors (opening a resolved predicate on disk)
// ============================================================================

export type ContainerError =
  | SpecError
  | WrongLevelError
  | NotFoundError
  | FileSystemError;

export interface WrongLevelError {
  readonly _tag: 'WrongLevel';
  readonly expected: DataLevel;
  readonly actual: DataLevel;
  readonly message: string;
}

export interface NotFoundError {
  readonly _tag: 'NotFound';
  readonly level: DataLevel;
  readonly path: string;
  readonly message: string;
}

export interface FileSystemError {
  readonly _tag: 'FileSystem';
  readonly code: string;
  readonly path: string;
  readonly message: string;
}

// ============================================================================
// Configuration Errors
// ============================================================================

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export interface ConfigInvalidError {
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}

export type AppError = ContainerError | ConfigInvalidError;

/**
 * Branded config type: proves the configuration went through `loadConfig`.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
