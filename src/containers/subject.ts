import { type ResultAsync, errAsync } from 'neverthrow';
import type { ContainerError } from '../errors/app-error.js';
import { DataLevel } from '../predicate/levels.js';
import { type SessionLike, verifySessionSpec } from '../predicate/session-spec.js';
import { Container } from './container.js';
import type { DataRoot } from './data-root.js';
import type { Dataset } from './dataset.js';
import type { Session } from './session.js';

export class Subject extends Container {
  readonly level = DataLevel.SUBJECT;

  root(): ResultAsync<DataRoot, ContainerError> {
    return this.ancestor(DataLevel.ROOT);
  }

  dataset(): ResultAsync<Dataset, ContainerError> {
    return this.ancestor(DataLevel.DATASET);
  }

  /** Sessions of this subject; all of them without a filter. */
  sessions(filter?: SessionLike): ResultAsync<readonly Session[], ContainerError> {
    const session = verifySessionSpec(filter, { acceptEmpty: true });
    if (session.isErr()) return errAsync(session.error);
    return this.children(DataLevel.SESSION, { session: session.value });
  }

  session(spec: SessionLike): ResultAsync<Session, ContainerError> {
    const session = verifySessionSpec(spec, { acceptEmpty: false });
    if (session.isErr()) return errAsync(session.error);
    return this.child(DataLevel.SESSION, { session: session.value });
  }
}
