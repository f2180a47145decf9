/**
 * Get-or-create resolution tests
 *
 * Uses actual in-memory SQLite database through initDb
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initDb, closeDb, getSession } from '../../db';
import { ConstraintViolation, OwnershipConflict, ValidationError } from '../../errors';
import { eventBus, resetEventBus } from '../../events';
import type { OwnershipConflictEvent } from '../../events';
import { setLogLevel } from '../../logging';
import { NucleicAcidType, ReadsetState } from '../../types';
import { endpointFromUri, repositories } from '../index';
import { seedHierarchy } from './helpers';

describe('get-or-create resolution', () => {
  beforeEach(() => {
    setLogLevel('silent');
    initDb({ dbPath: ':memory:' });
  });

  afterEach(() => {
    closeDb();
    resetEventBus();
  });

  describe('projects.fromName', () => {
    it('should return the same project for the same name', () => {
      const first = repositories.projects.fromName({ name: 'PRJ-A' });
      const second = repositories.projects.fromName({ name: 'PRJ-A' });

      expect(second.id).toBe(first.id);
      expect(repositories.projects.count()).toBe(1);
    });

    it('should resolve a soft-deleted project instead of creating a new one', () => {
      const project = repositories.projects.fromName({ name: 'PRJ-A' });
      repositories.projects.markDeleted(project.id);

      const resolved = repositories.projects.fromName({ name: 'PRJ-A' });

      expect(resolved.id).toBe(project.id);
      expect(resolved.deleted).toBe(true);
      expect(repositories.projects.count({ includeDeleted: true })).toBe(1);
    });

    it('should reject an empty name', () => {
      expect(() => repositories.projects.fromName({ name: '' })).toThrow(ValidationError);
    });
  });

  describe('specimens.fromName', () => {
    it('should be idempotent for the same project', () => {
      const project = repositories.projects.fromName({ name: 'PRJ-A' });
      const first = repositories.specimens.fromName({ name: 'SP-1', project, cohort: 'C1' });
      const second = repositories.specimens.fromName({ name: 'SP-1', project: project.id });

      expect(second.id).toBe(first.id);
      expect(second.cohort).toBe('C1');
      expect(getSession().conflicts).toEqual([]);
    });

    it('should keep the existing project and report a conflict', () => {
      const projectA = repositories.projects.fromName({ name: 'PRJ-A' });
      const projectB = repositories.projects.fromName({ name: 'PRJ-B' });
      const specimen = repositories.specimens.fromName({ name: 'SP-1', project: projectA });

      const events: OwnershipConflictEvent[] = [];
      eventBus.on('ownership:conflict', (event) => events.push(event));

      const resolved = repositories.specimens.fromName({ name: 'SP-1', project: projectB });

      expect(resolved.id).toBe(specimen.id);
      expect(resolved.projectId).toBe(projectA.id);
      expect(repositories.specimens.count()).toBe(1);

      const conflicts = getSession().conflicts;
      expect(conflicts).toHaveLength(1);
      expect(conflicts[0]).toBeInstanceOf(OwnershipConflict);
      expect(conflicts[0].table).toBe('specimen');
      expect(conflicts[0].key).toBe('SP-1');
      expect(conflicts[0].relation).toBe('project');
      expect(conflicts[0].existingId).toBe(specimen.id);
      expect(conflicts[0].existingParentId).toBe(projectA.id);
      expect(conflicts[0].requestedParentId).toBe(projectB.id);

      expect(events).toHaveLength(1);
      expect(events[0].conflict).toBe(conflicts[0]);
    });
  });

  describe('samples.fromName', () => {
    it('should report a sample attached to another specimen', () => {
      const project = repositories.projects.fromName({ name: 'PRJ-A' });
      const specimenA = repositories.specimens.fromName({ name: 'SP-A', project });
      const specimenB = repositories.specimens.fromName({ name: 'SP-B', project });
      const sample = repositories.samples.fromName({ name: 'SA-1', specimen: specimenA, tumour: true });

      const resolved = repositories.samples.fromName({ name: 'SA-1', specimen: specimenB });

      expect(resolved.id).toBe(sample.id);
      expect(resolved.specimenId).toBe(specimenA.id);
      expect(resolved.tumour).toBe(true);
      expect(getSession().conflicts.map((conflict) => conflict.relation)).toEqual(['specimen']);
    });

    it('should default tumour to false', () => {
      const project = repositories.projects.fromName({ name: 'PRJ-A' });
      const specimen = repositories.specimens.fromName({ name: 'SP-A', project });

      expect(repositories.samples.fromName({ name: 'SA-1', specimen }).tumour).toBe(false);
    });
  });

  describe('readsets.fromName', () => {
    it('should create a readset in VALID state and resolve it again', () => {
      const { sample, experiment, run, readset } = seedHierarchy(repositories);

      expect(readset.state).toBe(ReadsetState.VALID);
      expect(readset.sampleId).toBe(sample.id);

      const again = repositories.readsets.fromName({ name: 'RS-1', sample, experiment, run });
      expect(again.id).toBe(readset.id);
      expect(getSession().conflicts).toEqual([]);
    });

    it('should report each differing parent separately', () => {
      const first = seedHierarchy(repositories, '1');
      const second = seedHierarchy(repositories, '2');

      const resolved = repositories.readsets.fromName({
        name: 'RS-1',
        sample: second.sample,
        experiment: second.experiment,
        run: first.run,
      });

      expect(resolved.id).toBe(first.readset.id);
      expect(getSession().conflicts.map((conflict) => conflict.relation)).toEqual(['sample', 'experiment']);
    });
  });

  describe('experiments.fromAttributes', () => {
    it('should match on the whole tuple with absent members matching null', () => {
      const first = repositories.experiments.fromAttributes({
        nucleicAcidType: NucleicAcidType.RNA,
        libraryKit: 'KIT-1',
      });
      const same = repositories.experiments.fromAttributes({
        nucleicAcidType: NucleicAcidType.RNA,
        libraryKit: 'KIT-1',
        sequencingTechnology: null,
      });
      const other = repositories.experiments.fromAttributes({
        nucleicAcidType: NucleicAcidType.RNA,
        libraryKit: 'KIT-2',
      });

      expect(same.id).toBe(first.id);
      expect(other.id).not.toBe(first.id);
      expect(repositories.experiments.count()).toBe(2);
    });

    it('should treat a Date and its ISO string as the same expiration date', () => {
      const first = repositories.experiments.fromAttributes({
        nucleicAcidType: NucleicAcidType.DNA,
        kitExpirationDate: new Date(Date.UTC(2030, 0, 31)),
      });
      const second = repositories.experiments.fromAttributes({
        nucleicAcidType: NucleicAcidType.DNA,
        kitExpirationDate: '2030-01-31T00:00:00.000Z',
      });

      expect(second.id).toBe(first.id);
      expect(first.kitExpirationDate).toBe('2030-01-31T00:00:00.000Z');
    });
  });

  describe('runs.fromAttributes', () => {
    it('should include the external reference in the tuple', () => {
      const lims = repositories.runs.fromAttributes({ name: 'RUN-1', extId: 7, extSrc: 'lims' });
      const again = repositories.runs.fromAttributes({ name: 'RUN-1', extId: 7, extSrc: 'lims' });
      const local = repositories.runs.fromAttributes({ name: 'RUN-1' });

      expect(again.id).toBe(lims.id);
      expect(local.id).not.toBe(lims.id);
      expect(lims.extSrc).toBe('lims');
    });
  });

  describe('operationConfigs.fromAttributes', () => {
    it('should match on name, version, checksum and payload', () => {
      const data = Buffer.from('threads: 4\n');
      const first = repositories.operationConfigs.fromAttributes({ name: 'align', version: '1.0', md5sum: 'abc', data });
      const second = repositories.operationConfigs.fromAttributes({
        name: 'align',
        version: '1.0',
        md5sum: 'abc',
        data: Buffer.from('threads: 4\n'),
      });

      expect(second.id).toBe(first.id);
      expect(second.data?.toString()).toBe('threads: 4\n');
    });

    it('should fail when a known checksum comes with another version', () => {
      repositories.operationConfigs.fromAttributes({ name: 'align', version: '1.0', md5sum: 'abc' });

      let caught: unknown;
      try {
        repositories.operationConfigs.fromAttributes({ name: 'align', version: '2.0', md5sum: 'abc' });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ConstraintViolation);
      if (caught instanceof ConstraintViolation) {
        expect(caught.kind).toBe('unique');
        expect(caught.table).toBe('operation_config');
      }
    });
  });

  describe('references.fromAttributes', () => {
    it('should reuse a reference with the same attributes', () => {
      const first = repositories.references.fromAttributes({ name: 'Homo sapiens', assembly: 'GRCh38', taxonId: '9606' });
      const second = repositories.references.fromAttributes({ name: 'Homo sapiens', assembly: 'GRCh38', taxonId: '9606' });
      const other = repositories.references.fromAttributes({ name: 'Homo sapiens', assembly: 'GRCh37', taxonId: '9606' });

      expect(second.id).toBe(first.id);
      expect(other.id).not.toBe(first.id);
    });
  });

  describe('locations.fromUri', () => {
    it('should derive the endpoint from the uri', () => {
      const file = repositories.files.create({ name: 'reads.bam' });
      const location = repositories.locations.fromUri({ file, uri: 's3:///bucket/key' });

      expect(location.endpoint).toBe('s3');
      expect(location.fileId).toBe(file.id);
    });

    it('should keep an explicit endpoint', () => {
      const file = repositories.files.create({ name: 'reads.bam' });
      const location = repositories.locations.fromUri({ file, uri: 'abacus:///lb/project/reads.bam', endpoint: 'beluga' });

      expect(location.endpoint).toBe('beluga');
    });

    it('should return the existing location and report a different file', () => {
      const fileA = repositories.files.create({ name: 'a.bam' });
      const fileB = repositories.files.create({ name: 'b.bam' });
      const location = repositories.locations.fromUri({ file: fileA, uri: 's3:///bucket/a.bam' });

      const resolved = repositories.locations.fromUri({ file: fileB, uri: 's3:///bucket/a.bam' });

      expect(resolved.id).toBe(location.id);
      expect(resolved.fileId).toBe(fileA.id);
      expect(repositories.locations.count()).toBe(1);
      expect(getSession().conflicts.map((conflict) => conflict.relation)).toEqual(['file']);
    });
  });

  describe('endpointFromUri', () => {
    it('should take the text before the first separator', () => {
      expect(endpointFromUri('s3:///bucket/key')).toBe('s3');
      expect(endpointFromUri('abacus:///a:///b')).toBe('abacus');
    });

    it('should return the whole uri without a separator', () => {
      expect(endpointFromUri('/scratch/reads.bam')).toBe('/scratch/reads.bam');
    });
  });
});
