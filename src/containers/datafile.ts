import type { ResultAsync } from 'neverthrow';
import type { ContainerError } from '../errors/app-error.js';
import type { BlockType } from '../parsing/file-name.js';
import { DataLevel } from '../predicate/levels.js';
import type { FileSpec } from '../predicate/file-spec.js';
import type { AxisValue } from '../predicate/selection-status.js';
import { Container } from './container.js';
import type { DataRoot } from './data-root.js';
import type { Dataset } from './dataset.js';
import type { Subject } from './subject.js';
import type { Session } from './session.js';
import type { Domain } from './domain.js';

export class Datafile extends Container {
  readonly level = DataLevel.FILE;

  get fileSpec(): FileSpec {
    return this.spec.file;
  }

  get blocktype(): BlockType | undefined {
    return this.spec.blocktype;
  }

  get index(): AxisValue<number> {
    return this.spec.index;
  }

  /** Throws a `WrongBlockType` SpecificationError unless the file is trial-related. */
  get trial(): AxisValue<number> {
    return this.spec.trial;
  }

  /** Throws a `WrongBlockType` SpecificationError unless the file is run-related. */
  get run(): AxisValue<number> {
    return this.spec.run;
  }

  get channel(): AxisValue<string> {
    return this.spec.channel;
  }

  get suffix(): AxisValue<string> {
    return this.spec.suffix;
  }

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

  domain(): ResultAsync<Domain, ContainerError> {
    return this.ancestor(DataLevel.DOMAIN);
  }
}
