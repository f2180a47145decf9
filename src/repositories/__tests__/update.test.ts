/**
 * Update and status change tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initDb, closeDb } from '../../db';
import { NotFoundError, ValidationError } from '../../errors';
import { setLogLevel } from '../../logging';
import { Lane, MetricFlag, ReadsetState, SequencingType, Status } from '../../types';
import type { Job, Operation } from '../../types';
import { repositories } from '../index';
import { seedHierarchy } from './helpers';

describe('updates', () => {
  let operation: Operation;
  let job: Job;

  beforeEach(() => {
    setLogLevel('silent');
    initDb({ dbPath: ':memory:' });
    const { project } = seedHierarchy(repositories);
    operation = repositories.operations.create({ project, name: 'align' });
    job = repositories.jobs.create({ operation, name: 'bwa' });
  });

  afterEach(() => {
    closeDb();
  });

  describe('metrics', () => {
    it('should reject a flag outside the vocabulary on create', () => {
      const input = { job, name: 'coverage', value: '30', flag: MetricFlag.PASS };
      Reflect.set(input, 'flag', 'BOGUS');

      expect(() => repositories.metrics.create(input)).toThrow(ValidationError);
      expect(repositories.metrics.count()).toBe(0);
    });

    it('should reject a flag outside the vocabulary on update', () => {
      const metric = repositories.metrics.create({ job, name: 'coverage', value: '30' });
      const patch = { flag: MetricFlag.WARNING };
      Reflect.set(patch, 'flag', 'BOGUS');

      expect(() => repositories.metrics.update(metric.id, patch)).toThrow(ValidationError);
      expect(repositories.metrics.getById(metric.id).flag).toBeNull();
    });

    it('should change only the given fields', () => {
      const metric = repositories.metrics.create({ job, name: 'coverage', value: '30' });

      const updated = repositories.metrics.update(metric.id, { flag: MetricFlag.FAILED, deliverable: true });

      expect(updated.flag).toBe('FAILED');
      expect(updated.deliverable).toBe(true);
      expect(updated.value).toBe('30');
    });
  });

  describe('readsets', () => {
    it('should update state and layout', () => {
      const readset = repositories.readsets.findByName('RS-1');
      expect(readset?.state).toBe(ReadsetState.VALID);

      const updated = repositories.readsets.update(readset?.id ?? 0, {
        state: ReadsetState.ON_HOLD,
        lane: Lane.TWO,
        sequencingType: SequencingType.SINGLE_END,
        alias: { lims: 'RS-ALIAS' },
      });

      expect(updated.state).toBe('ON_HOLD');
      expect(updated.lane).toBe('2');
      expect(updated.sequencingType).toBe('SINGLE_END');
      expect(updated.alias).toEqual({ lims: 'RS-ALIAS' });
      expect(updated.name).toBe('RS-1');
    });

    it('should reject an unknown state', () => {
      const readset = repositories.readsets.findByName('RS-1');
      const patch = { state: ReadsetState.INVALID };
      Reflect.set(patch, 'state', 'ARCHIVED');

      expect(() => repositories.readsets.update(readset?.id ?? 0, patch)).toThrow(ValidationError);
    });
  });

  describe('jobs', () => {
    it('should set status and normalise timestamps', () => {
      const updated = repositories.jobs.update(job.id, {
        status: Status.RUNNING,
        start: new Date(Date.UTC(2024, 0, 2)),
      });

      expect(updated.status).toBe('RUNNING');
      expect(updated.start).toBe('2024-01-02T00:00:00.000Z');
      expect(updated.stop).toBeNull();
      expect(repositories.jobs.setStatus(job.id, Status.OUT_OF_MEMORY).status).toBe('OUT_OF_MEMORY');
    });

    it('should report a missing job', () => {
      expect(() => repositories.jobs.setStatus(999, Status.FAILED)).toThrow(NotFoundError);
    });
  });

  describe('operations', () => {
    it('should start pending and move through statuses', () => {
      expect(operation.status).toBe('PENDING');

      expect(repositories.operations.setStatus(operation.id, Status.COMPLETED).status).toBe('COMPLETED');

      const updated = repositories.operations.update(operation.id, { cmdLine: 'bwa mem ref.fa', platform: 'slurm' });
      expect(updated.cmdLine).toBe('bwa mem ref.fa');
      expect(updated.platform).toBe('slurm');
      expect(updated.status).toBe('COMPLETED');
    });
  });
});
