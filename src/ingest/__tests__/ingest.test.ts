/**
 * Ingestion Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initDb, closeDb, getDb, withSession, Session } from '../../db';
import { ValidationError } from '../../errors';
import { setLogLevel } from '../../logging';
import { createRepositories } from '../../repositories';
import type { Repositories } from '../../repositories';
import { Lane, MetricFlag, NucleicAcidType, SequencingType, Status } from '../../types';
import { ingestOperation, ingestRunProcessing, RUN_PROCESSING_OPERATION } from '../index';
import type { OperationPayload, RunProcessingPayload } from '../index';

const CONFIG_DATA = Buffer.from('threads=8').toString('base64');

function runPayload(): RunProcessingPayload {
  return {
    project: 'PRJ-A',
    run: { name: 'RUN-1', instrument: 'NovaSeq', date: '2024-03-01T00:00:00Z' },
    readsets: [
      {
        specimen: 'SP-1',
        sample: 'SA-1',
        name: 'RS-1',
        lane: Lane.ONE,
        sequencingType: SequencingType.PAIRED_END,
        experiment: { nucleicAcidType: NucleicAcidType.DNA, sequencingTechnology: 'ILLUMINA', libraryKit: 'KIT-A' },
        files: [{ name: 'RS-1_R1.fastq.gz', uri: 's3:///bucket/RS-1_R1.fastq.gz' }],
        metrics: [{ name: 'yield', value: 1200, flag: MetricFlag.PASS }],
      },
      {
        specimen: 'SP-1',
        sample: 'SA-2',
        name: 'RS-2',
        experiment: { nucleicAcidType: NucleicAcidType.DNA, sequencingTechnology: 'ILLUMINA', libraryKit: 'KIT-A' },
        files: [{ name: 'RS-2_R1.fastq.gz', uri: 's3:///bucket/RS-2_R1.fastq.gz' }],
      },
    ],
  };
}

function operationPayload(): OperationPayload {
  return {
    project: 'PRJ-A',
    operation: {
      name: 'align',
      platform: 'slurm',
      status: Status.COMPLETED,
      config: { name: 'bwa', version: '0.7', md5sum: 'cfg-md5', data: CONFIG_DATA },
      reference: { name: 'GRCh38', assembly: 'GRCh38', source: 'ensembl' },
    },
    readsets: ['RS-1', 'RS-2'],
    jobs: [
      {
        name: 'align-RS-1',
        readsets: ['RS-1'],
        files: [{ name: 'RS-1.bam', uri: 'abacus:///lb/RS-1.bam' }],
        metrics: [{ name: 'mapped', value: '0.98' }],
      },
      { name: 'merge' },
    ],
  };
}

/** Read committed state in a throwaway session */
function read<T>(fn: (repos: Repositories) => T): T {
  return withSession((session) => fn(createRepositories(session)));
}

function validationIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) {
      return err.issues;
    }
    throw err;
  }
  return [];
}

describe('Ingestion', () => {
  beforeEach(() => {
    setLogLevel('silent');
    initDb({ dbPath: ':memory:' });
  });

  afterEach(() => {
    closeDb();
  });

  describe('ingestRunProcessing', () => {
    it('should load the hierarchy, files and metrics', () => {
      const report = ingestRunProcessing(runPayload());

      expect(report.readsetIds).toHaveLength(2);
      expect(report.jobIds).toHaveLength(1);
      expect(report.fileIds).toHaveLength(2);
      expect(report.conflicts).toEqual([]);

      read((repos) => {
        expect(repos.projects.count()).toBe(1);
        expect(repos.specimens.count()).toBe(1);
        expect(repos.samples.count()).toBe(2);
        expect(repos.experiments.count()).toBe(1);
        expect(repos.runs.count()).toBe(1);

        const operation = repos.operations.getById(report.operationId);
        expect(operation.name).toBe(RUN_PROCESSING_OPERATION);
        expect(operation.status).toBe('COMPLETED');

        const [first, second] = report.readsetIds;
        const flat = repos.readsets.flat(first);
        expect(flat.lane).toBe('1');
        expect(flat.sequencingType).toBe('PAIRED_END');
        expect(flat.operations).toEqual([report.operationId]);
        expect(flat.jobs).toEqual(report.jobIds);
        expect(flat.files).toEqual([report.fileIds[0]]);
        expect(repos.readsets.flat(second).metrics).toEqual([]);

        const [metric] = repos.metrics.findByJob(report.jobIds[0]);
        expect(metric.name).toBe('yield');
        expect(metric.value).toBe('1200');
        expect(metric.flag).toBe('PASS');
        expect(repos.metrics.flat(metric.id).readsets).toEqual([first]);

        const location = repos.locations.findByUri('s3:///bucket/RS-1_R1.fastq.gz');
        expect(location?.endpoint).toBe('s3');
        expect(location?.fileId).toBe(report.fileIds[0]);
      });
    });

    it('should reuse resolved entities when loaded twice', () => {
      const first = ingestRunProcessing(runPayload());
      const second = ingestRunProcessing(runPayload());

      expect(second.readsetIds).toEqual(first.readsetIds);
      expect(second.fileIds).toEqual(first.fileIds);
      expect(second.operationId).not.toBe(first.operationId);

      read((repos) => {
        expect(repos.projects.count()).toBe(1);
        expect(repos.readsets.count()).toBe(2);
        expect(repos.files.count()).toBe(2);
        expect(repos.locations.count()).toBe(2);
        expect(repos.operations.count()).toBe(2);
      });
    });

    it('should report a sample already owned by another specimen', () => {
      ingestRunProcessing(runPayload());
      const payload = runPayload();
      payload.readsets[0].specimen = 'SP-2';

      const report = ingestRunProcessing(payload);

      expect(report.conflicts).toHaveLength(1);
      expect(report.conflicts[0].table).toBe('sample');
      expect(report.conflicts[0].relation).toBe('specimen');
      read((repos) => {
        expect(repos.specimens.count()).toBe(2);
        const sample = repos.samples.findByName('SA-1');
        expect(sample?.specimenId).toBe(repos.specimens.findByName('SP-1')?.id);
      });
    });

    it('should reject a payload without readsets', () => {
      expect(() => ingestRunProcessing({ project: 'PRJ-A', run: {}, readsets: [] })).toThrow(ValidationError);
      expect(read((repos) => repos.projects.count())).toBe(0);
    });

    it('should leave committing to the caller when given a session', () => {
      const session = new Session(getDb());
      const repos = createRepositories(session);

      ingestRunProcessing(runPayload(), session);
      expect(repos.readsets.count()).toBe(2);

      session.rollback();
      expect(repos.readsets.count()).toBe(0);
      session.close();
    });
  });

  describe('ingestOperation', () => {
    beforeEach(() => {
      ingestRunProcessing(runPayload());
    });

    it('should load the operation, its jobs and their outputs', () => {
      const report = ingestOperation(operationPayload());
      const [rs1, rs2] = read((repos) => [repos.readsets.findByName('RS-1'), repos.readsets.findByName('RS-2')]);

      expect(report.readsetIds).toEqual([rs1?.id, rs2?.id]);
      expect(report.jobIds).toHaveLength(2);
      expect(report.fileIds).toHaveLength(1);

      read((repos) => {
        const operation = repos.operations.flat(report.operationId);
        expect(operation.name).toBe('align');
        expect(operation.platform).toBe('slurm');
        expect(operation.jobs).toEqual(report.jobIds);
        expect(operation.readsets).toEqual(report.readsetIds);

        const config = repos.operationConfigs.findByMd5sum('cfg-md5');
        expect(operation.operationConfigId).toBe(config?.id);
        expect(config?.data?.toString('utf-8')).toBe('threads=8');
        expect(operation.referenceId).toBe(repos.references.findAll()[0].id);

        const [alignJob, mergeJob] = report.jobIds;
        expect(repos.jobs.flat(alignJob).readsets).toEqual([rs1?.id]);
        expect(repos.jobs.flat(alignJob).files).toEqual(report.fileIds);
        expect(repos.jobs.flat(mergeJob).readsets).toEqual(report.readsetIds);
        expect(repos.metrics.findByJob(alignJob).map((metric) => metric.value)).toEqual(['0.98']);
        expect(repos.locations.findByUri('abacus:///lb/RS-1.bam')?.endpoint).toBe('abacus');
      });
    });

    it('should reuse the config and reference when loaded twice', () => {
      ingestOperation(operationPayload());
      ingestOperation(operationPayload());

      read((repos) => {
        expect(repos.operationConfigs.count()).toBe(1);
        expect(repos.references.count()).toBe(1);
        expect(repos.files.count()).toBe(3);
      });
    });

    it('should reject unknown readsets', () => {
      const payload = operationPayload();
      payload.readsets = ['RS-1', 'RS-9'];

      expect(validationIssues(() => ingestOperation(payload))).toEqual(['readsets: unknown readset RS-9']);
    });

    it('should reject a config payload that is not base64', () => {
      const payload = operationPayload();
      payload.operation.config = { name: 'bwa', md5sum: 'cfg-md5', data: '!!!not base64!!!' };

      expect(validationIssues(() => ingestOperation(payload))).toEqual(['operation.config.data: Invalid base64']);
      expect(read((repos) => repos.operationConfigs.count())).toBe(0);
    });

    it('should reject an unknown project', () => {
      const payload = operationPayload();
      payload.project = 'PRJ-X';

      expect(validationIssues(() => ingestOperation(payload))).toEqual(['project: unknown project PRJ-X']);
    });

    it('should roll back everything when a job names a foreign readset', () => {
      const payload = operationPayload();
      payload.readsets = ['RS-2'];
      const before = read((repos) => repos.operations.count());

      expect(() => ingestOperation(payload)).toThrow(ValidationError);

      read((repos) => {
        expect(repos.operations.count()).toBe(before);
        expect(repos.operationConfigs.count()).toBe(0);
      });
    });
  });
});
