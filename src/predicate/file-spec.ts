import * as path from 'path';
import { type Result, ok, err } from 'neverthrow';
import type { InvalidSpecificationError, SpecError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { unwrapOrThrow, SpecificationError } from '../errors/specification-error.js';
import { DEFAULT_PATH_CONFIG } from '../config/app-config.js';
import { type BlockType, isBlockType, parseFileName } from '../parsing/file-name.js';
import {
  type Axis,
  type AxisValue,
  type SelectionStatus,
  axisMatches,
  axisStatus,
  axisValue,
  combineStatuses,
  singleValue,
} from './selection-status.js';
import {
  type ChannelInput,
  type IndexInput,
  type SuffixInput,
  validateChannels,
  validateIndex,
  validateSuffix,
} from './validators.js';

export interface FileSpecInput {
  /** a suffix, or a whole file name to decompose */
  readonly suffix?: SuffixInput;
  readonly trial?: IndexInput;
  readonly run?: IndexInput;
  readonly channel?: ChannelInput;
  readonly blocktype?: string | null;
  readonly index?: IndexInput;
}

export interface FileSpecFields {
  readonly suffix: Axis<string>;
  readonly blocktype: BlockType | undefined;
  readonly index: Axis<number>;
  readonly channel: Axis<string>;
}

/** What a file name is built from, besides the file spec itself. */
export interface FileNameContext {
  readonly subject: string;
  readonly sessionName: string;
  readonly domain: string;
}

export interface FilePathContext extends FileNameContext {
  readonly domainPath: string;
}

function given(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * A part of a file name may not hold the characters the file-name grammar
 * splits on at its position, or the name would read back differently.
 */
function checkNamePart(field: string, value: string, reserved: readonly string[]): Result<string, InvalidSpecificationError> {
  const found = reserved.find((character) => value.includes(character));
  if (found !== undefined) {
    return err(Err.invalidSpecification(field, value, `cannot contain '${found}' in a file name`));
  }
  return ok(value);
}

const NAME_SEPARATORS = ['_', '/'] as const;
const NAME_AND_SUFFIX_SEPARATORS = ['_', '.', '/'] as const;

/**
 * The file axis of a predicate: suffix, block type (trial or run), block
 * index and channel(s).
 *
 * Immutable; `withValues` returns a new spec.
 */
export class FileSpec {
  private constructor(readonly fields: FileSpecFields) {}

  /**
   * A string is first read as a file name (`sub01_sess001_ephys_run002.csv`);
   * when it does not follow the naming convention it is taken as a suffix.
   */
  static parse(input: string | FileSpecInput = {}): Result<FileSpec, SpecError> {
    const spec: FileSpecInput = typeof input === 'string' ? { suffix: input } : input;
    return FileSpec.build(decomposeFileName(spec));
  }

  static of(input: string | FileSpecInput = {}): FileSpec {
    return unwrapOrThrow(FileSpec.parse(input));
  }

  static empty(): FileSpec {
    return EMPTY_FILE_SPEC;
  }

  private static build(input: FileSpecInput): Result<FileSpec, SpecError> {
    let blocktype: BlockType | undefined = undefined;
    let rawIndex: IndexInput = undefined;

    if (given(input.blocktype)) {
      if (given(input.trial)) {
        return err(Err.conflictingSpecification(['blocktype', 'trial'], "cannot specify 'trial' when 'blocktype' is specified"));
      }
      if (given(input.run)) {
        return err(Err.conflictingSpecification(['blocktype', 'run'], "cannot specify 'run' when 'blocktype' is specified"));
      }
      if (!isBlockType(input.blocktype)) {
        return err(
          Err.conflictingSpecification(
            ['blocktype'],
            `string ('trial' or 'run') was expected for 'blocktype', but got '${String(input.blocktype)}'`
          )
        );
      }
      blocktype = input.blocktype;
      rawIndex = input.index;
    } else {
      if (given(input.trial) && given(input.run)) {
        return err(Err.conflictingSpecification(['trial', 'run'], 'trial and run cannot be specified at the same time'));
      }
      if (given(input.index)) {
        return err(Err.conflictingSpecification(['index', 'blocktype'], "cannot specify index when 'blocktype' is not specified"));
      }
      if (given(input.trial)) {
        blocktype = 'trial';
        rawIndex = input.trial;
      } else if (given(input.run)) {
        blocktype = 'run';
        rawIndex = input.run;
      }
    }

    return validateIndex(rawIndex, `${blocktype ?? 'block'} index`).andThen((index) =>
      validateSuffix(input.suffix).andThen((suffix) =>
        validateChannels(input.channel).map((channel) => new FileSpec({ suffix, blocktype, index, channel }))
      )
    );
  }

  // ==========================================================================
  // Caller-facing values
  // ==========================================================================

  get suffix(): AxisValue<string> {
    return axisValue(this.fields.suffix);
  }

  get blocktype(): BlockType | undefined {
    return this.fields.blocktype;
  }

  get index(): AxisValue<number> {
    return axisValue(this.fields.index);
  }

  get channel(): AxisValue<string> {
    return axisValue(this.fields.channel);
  }

  /** Throws a `WrongBlockType` SpecificationError unless this spec addresses trials. */
  get trial(): AxisValue<number> {
    return this.blockIndex('trial');
  }

  /** Throws a `WrongBlockType` SpecificationError unless this spec addresses runs. */
  get run(): AxisValue<number> {
    return this.blockIndex('run');
  }

  private blockIndex(expected: BlockType): AxisValue<number> {
    if (this.fields.blocktype !== expected) {
      throw new SpecificationError(Err.wrongBlockType(expected, this.fields.blocktype));
    }
    return axisValue(this.fields.index);
  }

  // ==========================================================================
  // Selection
  // ==========================================================================

  /**
   * Whether this spec denotes exactly one file name, suitable for writing.
   * NONE and DYNAMIC dominate; several suffixes or indices make it MULTIPLE;
   * otherwise it is SINGLE once a block type is set.
   */
  computeWriteStatus(): SelectionStatus {
    return combineStatuses(
      {
        suffix: axisStatus(this.fields.suffix),
        index: axisStatus(this.fields.index),
        channel: axisStatus(this.fields.channel),
      },
      { disallowMultiple: ['suffix', 'index'], discriminated: this.fields.blocktype !== undefined }
    );
  }

  get status(): SelectionStatus {
    return this.computeWriteStatus();
  }

  get hasDynamic(): boolean {
    const { suffix, index, channel } = this.fields;
    return [suffix.kind, index.kind, channel.kind].includes('dynamic');
  }

  /**
   * Whether `other` falls within this spec. Unset fields on this spec
   * match anything.
   */
  test(other: FileSpec): boolean {
    const self = this.fields;
    return (
      axisMatches(self.suffix, other.fields.suffix) &&
      (self.blocktype === undefined || self.blocktype === other.fields.blocktype) &&
      axisMatches(self.index, other.fields.index) &&
      axisMatches(self.channel, other.fields.channel)
    );
  }

  // ==========================================================================
  // Formatting
  // ==========================================================================

  formatRun(digits: number = DEFAULT_PATH_CONFIG.runIndexWidth): Result<string, InvalidSpecificationError> {
    const { blocktype, index } = this.fields;
    if (blocktype === undefined) {
      return ok('');
    }
    if (index.kind === 'unspecified') {
      return ok(`_all${blocktype}s`);
    }
    const value = singleValue(index);
    if (value === undefined) {
      return err(Err.invalidSpecification(`${blocktype} index`, axisValue(index), 'cannot format more than one index'));
    }
    return ok(`_${blocktype}${String(value).padStart(digits, '0')}`);
  }

  formatChannel(): Result<string, InvalidSpecificationError> {
    const { channel } = this.fields;
    switch (channel.kind) {
      case 'unspecified':
        return ok('');
      case 'literal':
        return checkNamePart('channel', channel.value, NAME_AND_SUFFIX_SEPARATORS).map((value) => `_${value}`);
      case 'many': {
        if (channel.values.length === 0) {
          return err(Err.invalidSpecification('channel', channel.values, 'cannot compute a channel from an empty selection'));
        }
        for (const value of channel.values) {
          const checked = checkNamePart('channel', value, NAME_AND_SUFFIX_SEPARATORS);
          if (checked.isErr()) {
            return err(checked.error);
          }
        }
        return ok(`_${channel.values.join('-')}`);
      }
      case 'dynamic':
        return err(Err.invalidSpecification('channel', channel.select, 'cannot compute a channel from a selector'));
    }
  }

  formatSuffix(): Result<string, InvalidSpecificationError> {
    const { suffix } = this.fields;
    if (suffix.kind === 'unspecified') {
      return ok('');
    }
    const value = singleValue(suffix);
    if (value === undefined) {
      return err(Err.invalidSpecification('suffix', axisValue(suffix), 'cannot compute a suffix from this specification'));
    }
    return checkNamePart('suffix', value, NAME_SEPARATORS);
  }

  /**
   * `{subject}_{sessionName}_{domain}[_{blocktype}{index}|_all{blocktype}s][_{channel}][{suffix}]`
   */
  formatName(context: FileNameContext, digits?: number): Result<string, InvalidSpecificationError> {
    const prefix = checkNamePart('subject', context.subject, NAME_SEPARATORS)
      .andThen(() => checkNamePart('session name', context.sessionName, NAME_SEPARATORS))
      .andThen(() => checkNamePart('domain', context.domain, NAME_AND_SUFFIX_SEPARATORS))
      .map(() => `${context.subject}_${context.sessionName}_${context.domain}`);
    return prefix.andThen((head) =>
      this.formatRun(digits).andThen((run) =>
        this.formatChannel().andThen((channel) => this.formatSuffix().map((suffix) => `${head}${run}${channel}${suffix}`))
      )
    );
  }

  computePath(context: FilePathContext, digits?: number): Result<string, InvalidSpecificationError> {
    return this.formatName(context, digits).map((name) => path.join(context.domainPath, name));
  }

  // ==========================================================================
  // Copy with overrides
  // ==========================================================================

  /**
   * `trial`/`run` replace the block type and index, and cannot be combined
   * with `blocktype`/`index` (or with each other) in the same call.
   * `null` clears a field.
   */
  withValues(overrides: FileSpecInput): Result<FileSpec, SpecError> {
    const next: {
      suffix?: SuffixInput;
      channel?: ChannelInput;
      blocktype?: string | null;
      index?: IndexInput;
    } = {};

    let blockFromOverride: BlockType | undefined;
    for (const blocktype of ['run', 'trial'] as const) {
      const value = overrides[blocktype];
      if (value === undefined) continue;
      for (const key of ['blocktype', 'index'] as const) {
        if (overrides[key] !== undefined) {
          return err(Err.conflictingSpecification([key, blocktype], `cannot specify '${key}' when '${blocktype}' is already set`));
        }
      }
      if (blockFromOverride !== undefined) {
        return err(Err.conflictingSpecification(['run', 'trial'], "cannot specify 'run' and 'trial' at the same time"));
      }
      blockFromOverride = blocktype;
      next.blocktype = value === null ? null : blocktype;
      next.index = value;
    }

    if (blockFromOverride === undefined) {
      next.blocktype = overrides.blocktype !== undefined ? overrides.blocktype : this.fields.blocktype;
      next.index = overrides.index !== undefined ? overrides.index : toIndexInput(this.fields.index);
    }
    next.suffix = overrides.suffix !== undefined ? overrides.suffix : axisValue(this.fields.suffix);
    next.channel = overrides.channel !== undefined ? overrides.channel : axisValue(this.fields.channel);

    return FileSpec.build(next);
  }
}

function toIndexInput(axis: Axis<number>): IndexInput {
  return axisValue(axis);
}

/**
 * Replace every field with those of a conventional file name, when
 * `suffix` holds one. Otherwise the given fields stand and the string
 * stays a suffix.
 */
function decomposeFileName(input: FileSpecInput): FileSpecInput {
  if (typeof input.suffix !== 'string') {
    return input;
  }
  const parsed = parseFileName(path.basename(input.suffix));
  if (parsed.isErr()) {
    return input;
  }
  const { suffix, blocktype, index, channel } = parsed.value;
  return { suffix, blocktype, index, channel };
}

const EMPTY_FILE_SPEC = FileSpec.of();
