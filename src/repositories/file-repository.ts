/**
 * File Repository
 *
 * A file is a logical artefact; where it is stored is tracked by its
 * locations, which are removed with it.
 */

import { TableName } from '../types';
import type { CreateFileInput, TrackedFile } from '../types';
import { CreateFileSchema, assertValid } from '../validation';
import { BaseRepository } from './base-repository';
import { toBoolColumn, toFile } from './rows';
import type { FileRow } from './rows';

export class FileRepository extends BaseRepository<TableName.FILE, FileRow> {
  protected readonly table = TableName.FILE;

  protected toEntity(row: FileRow): TrackedFile {
    return toFile(row);
  }

  create(input: CreateFileInput): TrackedFile {
    assertValid(CreateFileSchema, input, 'file');
    return this.insert(
      {
        name: input.name,
        type: input.type ?? null,
        md5sum: input.md5sum ?? null,
        deliverable: toBoolColumn(input.deliverable),
      },
      input
    );
  }

  /**
   * Files with this name, oldest first. Names are not unique.
   */
  findByName(name: string): TrackedFile[] {
    return this.findAll({ includeDeleted: true }).filter((file) => file.name === name);
  }

  setDeliverable(id: number, deliverable: boolean): TrackedFile {
    return this.updateColumns(id, { deliverable: toBoolColumn(deliverable) });
  }
}

export const fileRepository = new FileRepository();
