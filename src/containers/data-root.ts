import type { ResultAsync } from 'neverthrow';
import type { ContainerError } from '../errors/app-error.js';
import { DataLevel } from '../predicate/levels.js';
import type { StringAxisInput } from '../predicate/selection-status.js';
import { Container } from './container.js';
import type { Dataset } from './dataset.js';

/** The directory every dataset lives in. */
export class DataRoot extends Container {
  readonly level = DataLevel.ROOT;

  datasets(filter?: StringAxisInput): ResultAsync<readonly Dataset[], ContainerError> {
    return this.children(DataLevel.DATASET, { dataset: filter });
  }

  dataset(name: string): ResultAsync<Dataset, ContainerError> {
    return this.child(DataLevel.DATASET, { dataset: name });
  }
}
