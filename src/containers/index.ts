export { Container } from './container.js';
export type { ContainerByLevel, ContainerOpener } from './container.js';
export { DataRoot } from './data-root.js';
export { Dataset } from './dataset.js';
export { Subject } from './subject.js';
export { Session } from './session.js';
export { Domain } from './domain.js';
export { Datafile } from './datafile.js';
export { ContainerRegistry } from './registry.js';
export { predicateFromPath, verifySpec } from './resolve-path.js';
export type { SpecLike } from './resolve-path.js';
