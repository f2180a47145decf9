/**
 * Job Repository
 */

import { TableName } from '../types';
import type { CreateJobInput, Job, Status, UpdateJobInput } from '../types';
import { CreateJobSchema, assertValid, toIsoTimestamp } from '../validation';
import { BaseRepository, refId } from './base-repository';
import { toJob } from './rows';
import type { JobRow, SqlValue } from './rows';

export class JobRepository extends BaseRepository<TableName.JOB, JobRow> {
  protected readonly table = TableName.JOB;

  protected toEntity(row: JobRow): Job {
    return toJob(row);
  }

  create(input: CreateJobInput): Job {
    assertValid(CreateJobSchema, input, 'job');
    return this.insert(
      {
        operation_id: refId(input.operation),
        name: input.name ?? null,
        start: toIsoTimestamp(input.start, 'start'),
        stop: toIsoTimestamp(input.stop, 'stop'),
        status: input.status ?? null,
        type: input.type ?? null,
      },
      input
    );
  }

  findByOperation(operation: number): Job[] {
    return this.findAll().filter((job) => job.operationId === operation);
  }

  update(id: number, input: UpdateJobInput): Job {
    assertValid(CreateJobSchema.partial(), input, 'job');
    const columns: Record<string, SqlValue> = {};

    if (input.status !== undefined) {
      columns.status = input.status;
    }
    if (input.start !== undefined) {
      columns.start = toIsoTimestamp(input.start, 'start');
    }
    if (input.stop !== undefined) {
      columns.stop = toIsoTimestamp(input.stop, 'stop');
    }

    return this.updateColumns(id, columns);
  }

  setStatus(id: number, status: Status): Job {
    return this.update(id, { status });
  }
}

export const jobRepository = new JobRepository();
