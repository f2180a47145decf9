/**
 * Operation Repository
 *
 * An operation is one pipeline execution for a project. It may name the
 * config and reference it ran with; deleting either removes the operation
 * and, through it, its jobs and their metrics.
 */

import { Status, TableName } from '../types';
import type { CreateOperationInput, Operation, UpdateOperationInput } from '../types';
import { CreateOperationSchema, assertValid } from '../validation';
import { BaseRepository, refId } from './base-repository';
import { toOperation } from './rows';
import type { OperationRow, SqlValue } from './rows';

export class OperationRepository extends BaseRepository<TableName.OPERATION, OperationRow> {
  protected readonly table = TableName.OPERATION;

  protected toEntity(row: OperationRow): Operation {
    return toOperation(row);
  }

  /**
   * Create a new operation, PENDING unless a status is given
   */
  create(input: CreateOperationInput): Operation {
    assertValid(CreateOperationSchema, input, 'operation');
    return this.insert(
      {
        project_id: refId(input.project),
        operation_config_id: input.operationConfig ? refId(input.operationConfig) : null,
        reference_id: input.reference ? refId(input.reference) : null,
        platform: input.platform ?? null,
        cmd_line: input.cmdLine ?? null,
        name: input.name ?? null,
        status: input.status ?? Status.PENDING,
      },
      input
    );
  }

  findByProject(project: number): Operation[] {
    return this.findAll().filter((operation) => operation.projectId === project);
  }

  update(id: number, input: UpdateOperationInput): Operation {
    assertValid(CreateOperationSchema.partial(), input, 'operation');
    const columns: Record<string, SqlValue> = {};

    if (input.status !== undefined) {
      columns.status = input.status;
    }
    if (input.cmdLine !== undefined) {
      columns.cmd_line = input.cmdLine;
    }
    if (input.platform !== undefined) {
      columns.platform = input.platform;
    }

    return this.updateColumns(id, columns);
  }

  setStatus(id: number, status: Status): Operation {
    return this.update(id, { status });
  }
}

export const operationRepository = new OperationRepository();
