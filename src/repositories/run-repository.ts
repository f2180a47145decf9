/**
 * Run Repository
 */

import { TableName } from '../types';
import type { CreateRunInput, Run } from '../types';
import { CreateRunSchema, assertValid, toIsoTimestamp } from '../validation';
import { BaseRepository } from './base-repository';
import { toRun } from './rows';
import type { RunRow } from './rows';

export class RunRepository extends BaseRepository<TableName.RUN, RunRow> {
  protected readonly table = TableName.RUN;

  protected toEntity(row: RunRow): Run {
    return toRun(row);
  }

  create(input: CreateRunInput): Run {
    assertValid(CreateRunSchema, input, 'run');
    return this.insert(
      {
        name: input.name ?? null,
        instrument: input.instrument ?? null,
        date: toIsoTimestamp(input.date, 'date'),
      },
      input
    );
  }

  /**
   * Find by external id, external source, name, instrument and date.
   * Absent attributes match NULL.
   */
  findByAttributes(input: CreateRunInput): Run | null {
    return this.findOneWhere('ext_id IS ? AND ext_src IS ? AND name IS ? AND instrument IS ? AND date IS ?', [
      input.extId ?? null,
      input.extSrc ?? null,
      input.name ?? null,
      input.instrument ?? null,
      toIsoTimestamp(input.date, 'date'),
    ]);
  }

  /**
   * Get the run with these attributes, creating it if needed
   */
  fromAttributes(input: CreateRunInput): Run {
    assertValid(CreateRunSchema, input, 'run');
    return this.findByAttributes(input) ?? this.create(input);
  }
}

export const runRepository = new RunRepository();
