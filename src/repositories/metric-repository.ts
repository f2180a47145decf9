/**
 * Metric Repository - QC values produced by jobs
 */

import { TableName } from '../types';
import type { CreateMetricInput, Metric, UpdateMetricInput } from '../types';
import { CreateMetricSchema, assertValid } from '../validation';
import { BaseRepository, refId } from './base-repository';
import { toBoolColumn, toMetric } from './rows';
import type { MetricRow, SqlValue } from './rows';

export class MetricRepository extends BaseRepository<TableName.METRIC, MetricRow> {
  protected readonly table = TableName.METRIC;

  protected toEntity(row: MetricRow): Metric {
    return toMetric(row);
  }

  /**
   * Create a new metric
   *
   * @throws ValidationError if flag or aggregate is outside its enumeration
   */
  create(input: CreateMetricInput): Metric {
    assertValid(CreateMetricSchema, input, 'metric');
    return this.insert(
      {
        job_id: refId(input.job),
        name: input.name,
        value: input.value ?? null,
        flag: input.flag ?? null,
        deliverable: toBoolColumn(input.deliverable),
        aggregate: input.aggregate ?? null,
      },
      input
    );
  }

  findByJob(job: number): Metric[] {
    return this.findAll().filter((metric) => metric.jobId === job);
  }

  update(id: number, input: UpdateMetricInput): Metric {
    assertValid(CreateMetricSchema.partial(), input, 'metric');
    const columns: Record<string, SqlValue> = {};

    if (input.value !== undefined) {
      columns.value = input.value;
    }
    if (input.flag !== undefined) {
      columns.flag = input.flag;
    }
    if (input.deliverable !== undefined) {
      columns.deliverable = toBoolColumn(input.deliverable);
    }
    if (input.aggregate !== undefined) {
      columns.aggregate = input.aggregate;
    }

    return this.updateColumns(id, columns);
  }
}

export const metricRepository = new MetricRepository();
