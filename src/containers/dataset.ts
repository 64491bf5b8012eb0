import type { ResultAsync } from 'neverthrow';
import type { ContainerError } from '../errors/app-error.js';
import { DataLevel } from '../predicate/levels.js';
import type { StringAxisInput } from '../predicate/selection-status.js';
import { Container } from './container.js';
import type { DataRoot } from './data-root.js';
import type { Subject } from './subject.js';

export class Dataset extends Container {
  readonly level = DataLevel.DATASET;

  root(): ResultAsync<DataRoot, ContainerError> {
    return this.ancestor(DataLevel.ROOT);
  }

  subjects(filter?: StringAxisInput): ResultAsync<readonly Subject[], ContainerError> {
    return this.children(DataLevel.SUBJECT, { subject: filter });
  }

  subject(name: string): ResultAsync<Subject, ContainerError> {
    return this.child(DataLevel.SUBJECT, { subject: name });
  }
}
