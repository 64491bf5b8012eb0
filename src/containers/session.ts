import type { ResultAsync } from 'neverthrow';
import type { ContainerError } from '../errors/app-error.js';
import { DataLevel } from '../predicate/levels.js';
import type { AxisValue, StringAxisInput } from '../predicate/selection-status.js';
import { Container } from './container.js';
import type { DataRoot } from './data-root.js';
import type { Dataset } from './dataset.js';
import type { Subject } from './subject.js';
import type { Domain } from './domain.js';

export class Session extends Container {
  readonly level = DataLevel.SESSION;

  get type(): AxisValue<string> {
    return this.spec.sessionType;
  }

  get index(): AxisValue<number> {
    return this.spec.sessionIndex;
  }

  get date(): AxisValue<string> {
    return this.spec.sessionDate;
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

  domains(filter?: StringAxisInput): ResultAsync<readonly Domain[], ContainerError> {
    return this.children(DataLevel.DOMAIN, { domain: filter });
  }

  domain(name: string): ResultAsync<Domain, ContainerError> {
    return this.child(DataLevel.DOMAIN, { domain: name });
  }
}
