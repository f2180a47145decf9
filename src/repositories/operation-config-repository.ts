/**
 * Operation Config Repository
 *
 * A config is identified by name, version, checksum and payload together.
 * The checksum is unique on its own, so resolving a known checksum with a
 * different name, version or payload fails with ConstraintViolation.
 * Superseded configs are flagged with markDeprecated().
 */

import { TableName } from '../types';
import type { CreateOperationConfigInput, OperationConfig } from '../types';
import { CreateOperationConfigSchema, assertValid } from '../validation';
import { BaseRepository } from './base-repository';
import { toOperationConfig } from './rows';
import type { OperationConfigRow } from './rows';

export class OperationConfigRepository extends BaseRepository<TableName.OPERATION_CONFIG, OperationConfigRow> {
  protected readonly table = TableName.OPERATION_CONFIG;

  protected toEntity(row: OperationConfigRow): OperationConfig {
    return toOperationConfig(row);
  }

  /**
   * Create a new config
   *
   * @throws ConstraintViolation if the checksum is already stored
   */
  create(input: CreateOperationConfigInput): OperationConfig {
    assertValid(CreateOperationConfigSchema, input, 'operation_config');
    return this.insert(
      {
        name: input.name ?? null,
        version: input.version ?? null,
        md5sum: input.md5sum ?? null,
        data: input.data ?? null,
      },
      input
    );
  }

  findByMd5sum(md5sum: string): OperationConfig | null {
    return this.findOneWhere('md5sum = ?', [md5sum]);
  }

  findByAttributes(input: CreateOperationConfigInput): OperationConfig | null {
    return this.findOneWhere('name IS ? AND version IS ? AND md5sum IS ? AND data IS ?', [
      input.name ?? null,
      input.version ?? null,
      input.md5sum ?? null,
      input.data ?? null,
    ]);
  }

  /**
   * Get the config with these attributes, creating it if needed
   */
  fromAttributes(input: CreateOperationConfigInput): OperationConfig {
    assertValid(CreateOperationConfigSchema, input, 'operation_config');
    return this.findByAttributes(input) ?? this.create(input);
  }
}

export const operationConfigRepository = new OperationConfigRepository();
