/**
 * Reference Repository - reference genomes used by operations
 */

import { TableName } from '../types';
import type { CreateReferenceInput, Reference } from '../types';
import { CreateReferenceSchema, assertValid } from '../validation';
import { BaseRepository } from './base-repository';
import { toReference } from './rows';
import type { ReferenceRow } from './rows';

export class ReferenceRepository extends BaseRepository<TableName.REFERENCE, ReferenceRow> {
  protected readonly table = TableName.REFERENCE;

  protected toEntity(row: ReferenceRow): Reference {
    return toReference(row);
  }

  create(input: CreateReferenceInput): Reference {
    assertValid(CreateReferenceSchema, input, 'reference');
    return this.insert(
      {
        name: input.name ?? null,
        alias: input.alias ?? null,
        assembly: input.assembly ?? null,
        version: input.version ?? null,
        taxon_id: input.taxonId ?? null,
        source: input.source ?? null,
      },
      input
    );
  }

  findByAttributes(input: CreateReferenceInput): Reference | null {
    return this.findOneWhere(
      'name IS ? AND alias IS ? AND assembly IS ? AND version IS ? AND taxon_id IS ? AND source IS ?',
      [
        input.name ?? null,
        input.alias ?? null,
        input.assembly ?? null,
        input.version ?? null,
        input.taxonId ?? null,
        input.source ?? null,
      ]
    );
  }

  /**
   * Get the reference with these attributes, creating it if needed
   */
  fromAttributes(input: CreateReferenceInput): Reference {
    assertValid(CreateReferenceSchema, input, 'reference');
    return this.findByAttributes(input) ?? this.create(input);
  }
}

export const referenceRepository = new ReferenceRepository();
