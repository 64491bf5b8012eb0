/**
 * Error Factories - Consistent Error Construction
 *
 * `Err` namespace for all error constructors, so messages stay uniform.
 */

import type {
  ConfigInvalidError,
  ConfigIssue,
  ConflictingSpecificationError,
  FileSystemError,
  GrammarMismatchError,
  InvalidIndexError,
  InvalidSpecificationError,
  NotFoundError,
  UnresolvablePathError,
  WrongBlockTypeError,
  WrongLevelError,
} from './app-error.js';
import type { DataLevel } from '../predicate/levels.js';
import type { SelectionStatus } from '../predicate/selection-status.js';

function describe(value: unknown): string {
  if (typeof value === 'function') return '<selector>';
  if (typeof value === 'string') return `'${value}'`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export const Err = {
  // ==========================================================================
  // Specification Errors
  // ==========================================================================

  invalidSpecification: (field: string, value: unknown, details?: string): InvalidSpecificationError => ({
    _tag: 'InvalidSpecification',
    field,
    value: describe(value),
    message: details
      ? `unexpected ${field} specification ${describe(value)}: ${details}`
      : `unexpected ${field} specification: ${describe(value)}`,
  }),

  conflictingSpecification: (fields: readonly string[], details: string): ConflictingSpecificationError => ({
    _tag: 'ConflictingSpecification',
    fields,
    message: details,
  }),

  invalidIndex: (label: string, value: unknown, details: string): InvalidIndexError => ({
    _tag: 'InvalidIndex',
    label,
    value: describe(value),
    message: `${label} ${details} (got ${describe(value)})`,
  }),

  unresolvablePath: (level: DataLevel, status: SelectionStatus): UnresolvablePathError => ({
    _tag: 'UnresolvablePath',
    level,
    status,
    message: `cannot compute a path: not specifying a single condition (status: '${status}', level: '${level}')`,
  }),

  wrongBlockType: (expected: 'trial' | 'run', actual: 'trial' | 'run' | undefined): WrongBlockTypeError => ({
    _tag: 'WrongBlockType',
    expected,
    actual: actual ?? 'none',
    message: actual
      ? `this file is specified in terms of ${actual}s, not ${expected}s`
      : `this file is not specified in terms of ${expected}s`,
  }),

  grammarMismatch: (grammar: 'file' | 'session', input: string): GrammarMismatchError => ({
    _tag: 'GrammarMismatch',
    grammar,
    input,
    message: `'${input}' does not follow the ${grammar} naming convention`,
  }),

  // ==========================================================================
  // Container Errors
  // ==========================================================================

  wrongLevel: (expected: DataLevel, actual: DataLevel): WrongLevelError => ({
    _tag: 'WrongLevel',
    expected,
    actual,
    message: `cannot specify a ${expected} from the predicate level: '${actual}'`,
  }),

  notFound: (level: DataLevel, path: string): NotFoundError => ({
    _tag: 'NotFound',
    level,
    path,
    message: `${level} does not exist: ${path}`,
  }),

  fileSystem: (code: string, path: string, details: string): FileSystemError => ({
    _tag: 'FileSystem',
    code,
    path,
    message: details,
  }),

  // ==========================================================================
  // Configuration Errors
  // ==========================================================================

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Configuration invalid',
  }),
};
