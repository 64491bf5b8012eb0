import { describe, expect, it } from 'vitest';
import { enumerate } from '../../../src/search/enumerate.js';
import { Predicate } from '../../../src/predicate/predicate.js';
import { createRecordingTree } from '../../helpers/recording-tree.js';
import { CapturingLoggerFactory } from '../../helpers/capturing-logger.js';
import { expectErrAsync, expectOkAsync } from '../../helpers/result-helpers.js';

const paths = (predicates: readonly Predicate[]): string[] => predicates.map((predicate) => predicate.path);

describe('enumerate', () => {
  it('walks the whole tree down to the predicate level', async () => {
    const found = await expectOkAsync(enumerate(Predicate.of({ root: '/data', run: 1 }), createRecordingTree()), 'run 1');
    expect(paths(found)).toEqual([
      '/data/ds1/S1/session001/ephys/S1_session001_ephys_run001.csv',
      '/data/ds1/S1/session001/video/S1_session001_video_run001.mp4',
      '/data/ds1/S1/session002-2021-05-06/ephys/S1_session002-2021-05-06_ephys_run001.csv',
    ]);
    expect(found.every((predicate) => predicate.status === 'single')).toBe(true);
  });

  it('applies selectors', async () => {
    const predicate = Predicate.of({ root: '/data', dataset: 'ds1', subject: (name: string) => name.endsWith('2') });
    const found = await expectOkAsync(enumerate(predicate, createRecordingTree()), 'selector');
    expect(found.map((p) => p.subject)).toEqual(['S2']);
  });

  it('lists only conventional session directories', async () => {
    const predicate = Predicate.of({ root: '/data', dataset: 'ds1', subject: 'S1' });
    const found = await expectOkAsync(enumerate(predicate, createRecordingTree(), { level: 'session' }), 'sessions');
    expect(found.map((p) => p.sessionName)).toEqual(['session001', 'session002-2021-05-06']);
  });

  it('filters sessions on their parsed fields', async () => {
    const predicate = Predicate.of({ root: '/data', dataset: 'ds1', subject: 'S1', sessionIndex: 2 });
    const found = await expectOkAsync(enumerate(predicate, createRecordingTree()), 'index 2');
    expect(found.map((p) => p.sessionDate)).toEqual(['2021-05-06']);
  });

  it('skips files that belong elsewhere or are not named canonically', async () => {
    const fs = createRecordingTree()
      .touch('/data/ds1/S1/session001/ephys/S1_session001_ephys_run1.csv')
      .touch('/data/ds1/S1/session001/ephys/S9_session001_ephys_run003.csv');
    const predicate = Predicate.of({ root: '/data', dataset: 'ds1', subject: 'S1', session: 'session001', domain: 'ephys' });
    const found = await expectOkAsync(enumerate(predicate, fs, { level: 'file' }), 'files');
    expect(found.map((p) => p.run)).toEqual([1, 2]);
  });

  it('returns nothing for an empty selection', async () => {
    const found = await expectOkAsync(enumerate(Predicate.of({ root: '/data', dataset: [] }), createRecordingTree()), 'none');
    expect(found).toEqual([]);
  });

  it('lists a missing directory as empty', async () => {
    const fs = createRecordingTree();
    expect(await expectOkAsync(enumerate(Predicate.of({ root: '/nowhere', dataset: 'ds1' }), fs), 'missing')).toEqual([]);
    expect(await expectOkAsync(enumerate(Predicate.of({ root: '/nowhere' }), fs), 'missing root')).toEqual([]);
  });

  it('returns the root itself at root level', async () => {
    const found = await expectOkAsync(enumerate(Predicate.of({ root: '/data' }), createRecordingTree()), 'root');
    expect(paths(found)).toEqual(['/data']);
  });

  it('needs a root and a level', async () => {
    const fs = createRecordingTree();
    const noRoot = await expectErrAsync(enumerate(Predicate.of({ dataset: 'ds1' }), fs), 'no root');
    expect(noRoot._tag).toBe('InvalidSpecification');
    expect(noRoot.message).toBe('unexpected root specification undefined: enumeration needs a root directory');

    const empty = await expectErrAsync(enumerate(Predicate.of(), fs), 'empty');
    expect(empty.message).toBe("unexpected level specification 'na': nothing to enumerate for an empty predicate");
  });

  it('reports other filesystem failures', async () => {
    const fs = createRecordingTree().touch('/flat');
    const error = await expectErrAsync(enumerate(Predicate.of({ root: '/flat', dataset: 'x' }), fs), 'not a dir');
    expect(error).toEqual({
      _tag: 'FileSystem',
      code: 'FS_NOT_A_DIRECTORY',
      path: '/flat',
      message: 'Not a directory: /flat',
    });
  });

  it('logs each listing and the total', async () => {
    const loggers = new CapturingLoggerFactory();
    const predicate = Predicate.of({ root: '/data', dataset: 'ds1' });
    await expectOkAsync(enumerate(predicate, createRecordingTree(), { logger: loggers.create('search') }), 'logged');
    expect(loggers.messages('search')).toEqual(['listed directory', 'enumerated predicates']);
    expect(loggers.lines[1]).toMatchObject({ level: 20, dataLevel: 'dataset', count: 1, root: '/data' });
  });
});
