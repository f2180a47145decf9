/**
 * Flat projection tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initDb, closeDb } from '../../db';
import { setLogLevel } from '../../logging';
import { repositories } from '../../repositories';
import { seedHierarchy } from '../../repositories/__tests__/helpers';
import { LinkTable, MetricFlag, Status } from '../../types';
import { dumps, toFlatScalar } from '../index';

describe('flat projection', () => {
  beforeEach(() => {
    setLogLevel('silent');
    initDb({ dbPath: ':memory:' });
  });

  afterEach(() => {
    closeDb();
  });

  it('should nest the locations of a file in id order', () => {
    const file = repositories.files.create({ name: 'reads.bam', md5sum: 'abc' });
    const second = repositories.locations.fromUri({ file, uri: 's3:///bucket/reads.bam' });
    const first = repositories.locations.fromUri({ file, uri: 'abacus:///lb/reads.bam', deliverable: true });

    const flat = repositories.files.flat(file.id);

    expect(flat.tablename).toBe('file');
    expect(flat.name).toBe('reads.bam');
    expect(flat.md5sum).toBe('abc');
    expect(flat.readsets).toEqual([]);
    expect(flat.jobs).toEqual([]);
    expect(flat.locations).toEqual([
      {
        id: second.id,
        deprecated: false,
        deleted: false,
        creation: second.creation,
        modification: second.modification,
        extraMetadata: null,
        extId: null,
        extSrc: null,
        fileId: file.id,
        uri: 's3:///bucket/reads.bam',
        endpoint: 's3',
        deliverable: false,
        tablename: 'location',
      },
      {
        id: first.id,
        deprecated: false,
        deleted: false,
        creation: first.creation,
        modification: first.modification,
        extraMetadata: null,
        extId: null,
        extSrc: null,
        fileId: file.id,
        uri: 'abacus:///lb/reads.bam',
        endpoint: 'abacus',
        deliverable: true,
        tablename: 'location',
      },
    ]);
  });

  it('should list parents as ids and collections as sorted id arrays', () => {
    const { project, sample, experiment, run, readset } = seedHierarchy(repositories);
    const operation = repositories.operations.create({ project, name: 'align', status: Status.RUNNING });
    const jobB = repositories.jobs.create({ operation, name: 'b' });
    const jobA = repositories.jobs.create({ operation, name: 'a' });
    repositories.links.link(LinkTable.READSET_JOB, readset, jobA);
    repositories.links.link(LinkTable.READSET_JOB, readset, jobB);
    repositories.links.link(LinkTable.READSET_OPERATION, readset, operation);

    const flat = repositories.readsets.flat(readset.id);

    expect(flat.tablename).toBe('readset');
    expect(flat.sampleId).toBe(sample.id);
    expect(flat.experimentId).toBe(experiment.id);
    expect(flat.runId).toBe(run.id);
    expect(flat.state).toBe('VALID');
    expect(flat.jobs).toEqual([jobB.id, jobA.id]);
    expect(flat.operations).toEqual([operation.id]);
    expect(flat.files).toEqual([]);
    expect(flat.metrics).toEqual([]);

    const flatOperation = repositories.operations.flat(operation.id);
    expect(flatOperation.status).toBe('RUNNING');
    expect(flatOperation.jobs).toEqual([jobB.id, jobA.id]);
    expect(flatOperation.readsets).toEqual([readset.id]);
    expect(flatOperation.operationConfigId).toBeNull();
  });

  it('should render every field of a metric', () => {
    const { project, readset } = seedHierarchy(repositories);
    const operation = repositories.operations.create({ project });
    const job = repositories.jobs.create({ operation });
    const metric = repositories.metrics.create({
      job,
      name: 'coverage',
      value: '31.5',
      flag: MetricFlag.PASS,
      deliverable: true,
    });
    repositories.links.link(LinkTable.READSET_METRIC, readset, metric);

    const flat = repositories.metrics.flat(metric.id);

    expect(Object.keys(flat)).toEqual([
      'tablename',
      'id',
      'deprecated',
      'deleted',
      'creation',
      'modification',
      'extraMetadata',
      'extId',
      'extSrc',
      'jobId',
      'name',
      'value',
      'flag',
      'deliverable',
      'aggregate',
      'readsets',
    ]);
    expect(flat.flag).toBe('PASS');
    expect(flat.deliverable).toBe(true);
    expect(flat.aggregate).toBeNull();
    expect(flat.readsets).toEqual([readset.id]);
  });

  it('should render binary payloads as base64', () => {
    const config = repositories.operationConfigs.create({ name: 'align', data: Buffer.from('abc') });

    expect(repositories.operationConfigs.flat(config.id).data).toBe('YWJj');
  });

  it('should include metadata maps as objects', () => {
    const project = repositories.projects.create({ name: 'PRJ-A', alias: { lims: 'P1' }, extraMetadata: { k: 'v' } });

    const flat = repositories.projects.flat(project.id);

    expect(flat.alias).toEqual({ lims: 'P1' });
    expect(flat.extraMetadata).toEqual({ k: 'v' });
    expect(flat.specimens).toEqual([]);
    expect(flat.operations).toEqual([]);
  });

  it('should serialize to JSON', () => {
    const project = repositories.projects.create({ name: 'PRJ-A' });

    const parsed: unknown = JSON.parse(dumps(repositories.projects.flat(project.id)));

    expect(parsed).toEqual(repositories.projects.flat(project.id));
  });

  describe('toFlatScalar', () => {
    it('should convert dates and bigints', () => {
      expect(toFlatScalar(new Date('2024-05-01T12:00:00.000Z'))).toBe('2024-05-01T12:00:00.000Z');
      expect(toFlatScalar(BigInt(12))).toBe(12);
      expect(toFlatScalar(undefined)).toBeNull();
    });
  });
});
