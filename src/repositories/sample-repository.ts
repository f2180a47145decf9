/**
 * Sample Repository
 */

import { TableName } from '../types';
import type { CreateSampleInput, Sample } from '../types';
import { CreateSampleSchema, assertValid } from '../validation';
import { BaseRepository, refId } from './base-repository';
import { toBoolColumn, toJsonColumn, toSample } from './rows';
import type { SampleRow } from './rows';

export class SampleRepository extends BaseRepository<TableName.SAMPLE, SampleRow> {
  protected readonly table = TableName.SAMPLE;

  protected toEntity(row: SampleRow): Sample {
    return toSample(row);
  }

  /**
   * Create a new sample
   *
   * @throws ConstraintViolation if the name is taken or the specimen is missing
   */
  create(input: CreateSampleInput): Sample {
    assertValid(CreateSampleSchema, input, 'sample');
    return this.insert(
      {
        specimen_id: refId(input.specimen),
        name: input.name,
        alias: toJsonColumn(input.alias),
        tumour: toBoolColumn(input.tumour),
      },
      input
    );
  }

  findByName(name: string): Sample | null {
    return this.findOneWhere('name = ?', [name]);
  }

  /**
   * Get the sample with this name, creating it under `specimen` if needed
   *
   * A sample already attached to another specimen keeps its specimen;
   * the mismatch is reported.
   */
  fromName(input: CreateSampleInput): Sample {
    const existing = this.findByName(input.name);
    if (!existing) {
      return this.create(input);
    }
    this.checkOwnership(existing, existing.name, 'specimen', existing.specimenId, input.specimen);
    return existing;
  }
}

export const sampleRepository = new SampleRepository();
