import type { ResultAsync } from 'neverthrow';
import type { ContainerError } from '../errors/app-error.js';
import { DataLevel } from '../predicate/levels.js';
import type { FileLike } from '../predicate/predicate.js';
import { Container } from './container.js';
import type { DataRoot } from './data-root.js';
import type { Dataset } from './dataset.js';
import type { Subject } from './subject.js';
import type { Session } from './session.js';
import type { Datafile } from './datafile.js';

/** One recording modality of a session (`ephys`, `video`, ...). */
export class Domain extends Container {
  readonly level = DataLevel.DOMAIN;

  root(): ResultAsync<DataRoot, ContainerError> {
    return this.ancestor(DataLevel.ROOT);
  }

  dataset(): ResultAsync<Dataset, ContainerError> {
    return this.ancestor(DataLevel.DATASET);
  }

  subject(): ResultAsync<Subject, ContainerError> {
    return this.ancestor(DataLevel.SUBJECT);
  }

  session(): ResultAsync<Session, ContainerError> {
    return this.ancestor(DataLevel.SESSION);
  }

  /** Data files of this domain; all of them without a filter. */
  files(filter?: FileLike): ResultAsync<readonly Datafile[], ContainerError> {
    return this.children(DataLevel.FILE, { file: filter });
  }

  file(spec: FileLike): ResultAsync<Datafile, ContainerError> {
    return this.child(DataLevel.FILE, { file: spec });
  }
}
