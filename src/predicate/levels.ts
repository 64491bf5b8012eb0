/**
 * Hierarchy levels of the recording tree, coarsest first.
 *
 *   root / dataset / subject / session / domain / file
 *
 * `na` is the level of a predicate that specifies nothing at all.
 */
export const DataLevel = {
  NA: 'na',
  ROOT: 'root',
  DATASET: 'dataset',
  SUBJECT: 'subject',
  SESSION: 'session',
  DOMAIN: 'domain',
  FILE: 'file',
} as const;

export type DataLevel = (typeof DataLevel)[keyof typeof DataLevel];

/** Levels a container can be opened at (everything but `na`). */
export type ContainerLevel = Exclude<DataLevel, 'na'>;

export const CONTAINER_LEVELS: readonly ContainerLevel[] = [
  DataLevel.ROOT,
  DataLevel.DATASET,
  DataLevel.SUBJECT,
  DataLevel.SESSION,
  DataLevel.DOMAIN,
  DataLevel.FILE,
];

/** Depth below the root: na = -1, root = 0, ..., file = 5. */
export function levelDepth(level: DataLevel): number {
  return level === DataLevel.NA ? -1 : CONTAINER_LEVELS.indexOf(level);
}

export function isFinerThan(level: DataLevel, other: DataLevel): boolean {
  return levelDepth(level) > levelDepth(other);
}
