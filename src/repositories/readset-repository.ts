/**
 * Readset Repository
 *
 * A readset is owned by its sample, experiment and run; deleting any of
 * the three removes it. Readsets are linked to files, operations, jobs
 * and metrics through join tables (see LinkRepository).
 */

import { ReadsetState, TableName } from '../types';
import type { CreateReadsetInput, Readset, UpdateReadsetInput } from '../types';
import { CreateReadsetSchema, assertValid } from '../validation';
import { BaseRepository, refId } from './base-repository';
import { toJsonColumn, toReadset } from './rows';
import type { ReadsetRow, SqlValue } from './rows';

export class ReadsetRepository extends BaseRepository<TableName.READSET, ReadsetRow> {
  protected readonly table = TableName.READSET;

  protected toEntity(row: ReadsetRow): Readset {
    return toReadset(row);
  }

  /**
   * Create a new readset
   *
   * @throws ConstraintViolation if the name is taken or a parent is missing
   */
  create(input: CreateReadsetInput): Readset {
    assertValid(CreateReadsetSchema, input, 'readset');
    return this.insert(
      {
        sample_id: refId(input.sample),
        experiment_id: refId(input.experiment),
        run_id: refId(input.run),
        name: input.name,
        alias: toJsonColumn(input.alias),
        lane: input.lane ?? null,
        adapter1: input.adapter1 ?? null,
        adapter2: input.adapter2 ?? null,
        sequencing_type: input.sequencingType ?? null,
        state: input.state ?? ReadsetState.VALID,
      },
      input
    );
  }

  findByName(name: string): Readset | null {
    return this.findOneWhere('name = ?', [name]);
  }

  /**
   * Get the readset with this name, creating it if needed
   *
   * Each of sample, experiment and run is compared with the existing
   * readset's; every mismatch is reported separately.
   */
  fromName(input: CreateReadsetInput): Readset {
    const existing = this.findByName(input.name);
    if (!existing) {
      return this.create(input);
    }
    this.checkOwnership(existing, existing.name, 'sample', existing.sampleId, input.sample);
    this.checkOwnership(existing, existing.name, 'experiment', existing.experimentId, input.experiment);
    this.checkOwnership(existing, existing.name, 'run', existing.runId, input.run);
    return existing;
  }

  update(id: number, input: UpdateReadsetInput): Readset {
    assertValid(CreateReadsetSchema.partial(), input, 'readset');
    const columns: Record<string, SqlValue> = {};

    if (input.state !== undefined) {
      columns.state = input.state;
    }
    if (input.lane !== undefined) {
      columns.lane = input.lane;
    }
    if (input.adapter1 !== undefined) {
      columns.adapter1 = input.adapter1;
    }
    if (input.adapter2 !== undefined) {
      columns.adapter2 = input.adapter2;
    }
    if (input.sequencingType !== undefined) {
      columns.sequencing_type = input.sequencingType;
    }
    if (input.alias !== undefined) {
      columns.alias = toJsonColumn(input.alias);
    }

    return this.updateColumns(id, columns);
  }
}

export const readsetRepository = new ReadsetRepository();
