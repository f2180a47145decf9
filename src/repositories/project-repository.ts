/**
 * Project Repository
 *
 * Projects own specimens and operations; deleting one removes both.
 */

import { TableName } from '../types';
import type { CreateProjectInput, Project } from '../types';
import { CreateProjectSchema, assertValid } from '../validation';
import { BaseRepository } from './base-repository';
import { toJsonColumn, toProject } from './rows';
import type { ProjectRow } from './rows';

export class ProjectRepository extends BaseRepository<TableName.PROJECT, ProjectRow> {
  protected readonly table = TableName.PROJECT;

  protected toEntity(row: ProjectRow): Project {
    return toProject(row);
  }

  /**
   * Create a new project
   *
   * @throws ConstraintViolation if the name is taken
   */
  create(input: CreateProjectInput): Project {
    assertValid(CreateProjectSchema, input, 'project');
    return this.insert(
      {
        name: input.name,
        alias: toJsonColumn(input.alias),
      },
      input
    );
  }

  /**
   * Find a project by its unique name, deleted rows included
   */
  findByName(name: string): Project | null {
    return this.findOneWhere('name = ?', [name]);
  }

  /**
   * Get the project with this name, creating it if needed
   */
  fromName(input: CreateProjectInput): Project {
    return this.findByName(input.name) ?? this.create(input);
  }
}

export const projectRepository = new ProjectRepository();
