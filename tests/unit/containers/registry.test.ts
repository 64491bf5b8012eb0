import { beforeEach, describe, expect, it } from 'vitest';
import { ContainerRegistry } from '../../../src/containers/registry.js';
import { DEFAULT_PATH_CONFIG } from '../../../src/config/app-config.js';
import { Predicate } from '../../../src/predicate/predicate.js';
import { SpecificationError } from '../../../src/errors/specification-error.js';
import { createRecordingTree } from '../../helpers/recording-tree.js';
import { CapturingLoggerFactory } from '../../helpers/capturing-logger.js';
import { expectErrAsync, expectOkAsync } from '../../helpers/result-helpers.js';

const names = (containers: readonly { readonly name: string }[]): string[] => containers.map((c) => c.name);

describe('ContainerRegistry', () => {
  let loggers: CapturingLoggerFactory;
  let registry: ContainerRegistry;

  beforeEach(() => {
    loggers = new CapturingLoggerFactory('debug');
    registry = new ContainerRegistry(createRecordingTree(), loggers, DEFAULT_PATH_CONFIG);
  });

  describe('open', () => {
    it('opens a root from its path', async () => {
      const root = await expectOkAsync(registry.root('/data'), 'root');
      expect(root.level).toBe('root');
      expect(root.path).toBe('/data');
      expect(root.mode).toBe('read');
    });

    it('cuts a deeper predicate back to the level', async () => {
      const predicate = Predicate.of({
        root: '/data',
        dataset: 'ds1',
        subject: 'S1',
        session: 'session001',
        domain: 'ephys',
        run: 1,
        suffix: 'csv',
      });
      const session = await expectOkAsync(registry.session(predicate), 'session');
      expect(session.path).toBe('/data/ds1/S1/session001');
      expect(session.spec.level).toBe('session');
      expect(session.type).toBe('session');
      expect(session.index).toBe(1);
    });

    it('rejects predicates above the level', async () => {
      const error = await expectErrAsync(registry.datafile(Predicate.of({ root: '/data' })), 'root as file');
      expect(error._tag).toBe('WrongLevel');
      expect(error.message).toBe("cannot specify a file from the predicate level: 'root'");
    });

    it('rejects predicates that denote several entities', async () => {
      const predicate = Predicate.of({ root: '/data', dataset: ['ds1', 'ds2'], subject: 'S1' });
      const error = await expectErrAsync(registry.subject(predicate), 'two datasets');
      expect(error).toMatchObject({ _tag: 'UnresolvablePath', status: 'multiple', level: 'subject' });
    });

    it('requires the entity to exist in read mode only', async () => {
      const predicate = Predicate.of({ root: '/data', dataset: 'ds1', subject: 'S1', session: 'session009' });
      const error = await expectErrAsync(registry.session(predicate), 'missing');
      expect(error.message).toBe('session does not exist: /data/ds1/S1/session009');

      const written = await expectOkAsync(registry.session(predicate, 'write'), 'write mode');
      expect(written.path).toBe('/data/ds1/S1/session009');
      expect(written.mode).toBe('write');
    });

    it('reads file fields from a file path', async () => {
      const file = await expectOkAsync(
        registry.datafile('/data/ds1/S1/session001/ephys/S1_session001_ephys_run002.csv'),
        'file'
      );
      expect(file.blocktype).toBe('run');
      expect(file.run).toBe(2);
      expect(file.index).toBe(2);
      expect(file.suffix).toBe('.csv');
      expect(file.channel).toBeUndefined();
      expect(file.fileSpec.status).toBe('single');
      expect(() => file.trial).toThrow(SpecificationError);
    });

    it('logs opened containers and failures', async () => {
      await expectOkAsync(registry.dataset('/data/ds1'), 'dataset');
      await expectErrAsync(registry.dataset('/data/ds3'), 'missing dataset');
      expect(loggers.messages('ContainerRegistry')).toEqual([
        'opened container',
        'dataset does not exist: /data/ds3',
      ]);
      const registryLines = loggers.lines.filter((line) => line['component'] === 'ContainerRegistry');
      expect(registryLines[0]).toMatchObject({ level: 20, dataLevel: 'dataset', path: '/data/ds1' });
      expect(registryLines[1]).toMatchObject({ level: 20, dataLevel: 'dataset', error: 'NotFound' });
    });
  });

  describe('navigation', () => {
    it('lists children at every level', async () => {
      const root = await expectOkAsync(registry.root('/data'), 'root');
      expect(names(await expectOkAsync(root.datasets(), 'datasets'))).toEqual(['ds1', 'ds2']);

      const dataset = await expectOkAsync(root.dataset('ds1'), 'ds1');
      expect(names(await expectOkAsync(dataset.subjects(), 'subjects'))).toEqual(['S1', 'S2']);

      const subject = await expectOkAsync(dataset.subject('S1'), 'S1');
      expect(names(await expectOkAsync(subject.sessions(), 'sessions'))).toEqual([
        'session001',
        'session002-2021-05-06',
      ]);

      const session = await expectOkAsync(subject.session('session001'), 'session001');
      expect(names(await expectOkAsync(session.domains(), 'domains'))).toEqual(['ephys', 'video']);

      const domain = await expectOkAsync(session.domain('ephys'), 'ephys');
      const files = await expectOkAsync(domain.files(), 'files');
      expect(names(files)).toEqual(['S1_session001_ephys_run001.csv', 'S1_session001_ephys_run002.csv']);
    });

    it('filters children', async () => {
      const subject = await expectOkAsync(registry.subject('/data/ds1/S1'), 'S1');
      const sessions = await expectOkAsync(subject.sessions({ index: 2 }), 'index 2');
      expect(names(sessions)).toEqual(['session002-2021-05-06']);
      expect(sessions.map((session) => session.date)).toEqual(['2021-05-06']);

      const domain = await expectOkAsync(registry.domain('/data/ds1/S1/session001/ephys'), 'ephys');
      const files = await expectOkAsync(domain.files({ run: 2 }), 'run 2');
      expect(files.map((file) => file.path)).toEqual(['/data/ds1/S1/session001/ephys/S1_session001_ephys_run002.csv']);
    });

    it('opens a single child by spec', async () => {
      const domain = await expectOkAsync(registry.domain('/data/ds1/S1/session001/video'), 'video');
      const file = await expectOkAsync(domain.file({ run: 1, suffix: 'mp4' }), 'video file');
      expect(file.path).toBe('/data/ds1/S1/session001/video/S1_session001_video_run001.mp4');
    });

    it('returns empty lists for leaves', async () => {
      const session = await expectOkAsync(registry.session('/data/ds1/S2/session001'), 'S2 session');
      expect(await expectOkAsync(session.domains(), 'domains')).toEqual([]);
    });

    it('opens ancestors of a file', async () => {
      const file = await expectOkAsync(
        registry.datafile('/data/ds1/S1/session002-2021-05-06/ephys/S1_session002-2021-05-06_ephys_run001.csv'),
        'file'
      );
      const session = await expectOkAsync(file.session(), 'session');
      expect(session.path).toBe('/data/ds1/S1/session002-2021-05-06');
      expect(session.date).toBe('2021-05-06');
      expect((await expectOkAsync(file.domain(), 'domain')).name).toBe('ephys');
      expect((await expectOkAsync(file.subject(), 'subject')).name).toBe('S1');
      expect((await expectOkAsync(file.dataset(), 'dataset')).name).toBe('ds1');
      expect((await expectOkAsync(file.root(), 'root')).path).toBe('/data');
    });
  });
});
