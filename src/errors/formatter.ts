import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'ConflictingSpecification':
      return `${error.message} [${error.fields.join(', ')}]`;

    case 'UnresolvablePath':
    case 'WrongLevel':
    case 'WrongBlockType':
    case 'InvalidSpecification':
    case 'InvalidIndex':
    case 'GrammarMismatch':
    case 'NotFound':
      return error.message;

    case 'FileSystem':
      return `${error.message} [${error.code}]`;

    default:
      return assertNever(error);
  }
}
