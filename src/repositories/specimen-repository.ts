/**
 * Specimen Repository
 *
 * Specimen names are globally unique. A specimen belongs to one project
 * and owns its samples.
 */

import { TableName } from '../types';
import type { CreateSpecimenInput, Specimen } from '../types';
import { CreateSpecimenSchema, assertValid } from '../validation';
import { BaseRepository, refId } from './base-repository';
import { toJsonColumn, toSpecimen } from './rows';
import type { SpecimenRow } from './rows';

export class SpecimenRepository extends BaseRepository<TableName.SPECIMEN, SpecimenRow> {
  protected readonly table = TableName.SPECIMEN;

  protected toEntity(row: SpecimenRow): Specimen {
    return toSpecimen(row);
  }

  /**
   * Create a new specimen
   *
   * @throws ConstraintViolation if the name is taken or the project is missing
   */
  create(input: CreateSpecimenInput): Specimen {
    assertValid(CreateSpecimenSchema, input, 'specimen');
    return this.insert(
      {
        project_id: refId(input.project),
        name: input.name,
        alias: toJsonColumn(input.alias),
        cohort: input.cohort ?? null,
        institution: input.institution ?? null,
      },
      input
    );
  }

  findByName(name: string): Specimen | null {
    return this.findOneWhere('name = ?', [name]);
  }

  findByProject(project: number): Specimen[] {
    return this.findAll().filter((specimen) => specimen.projectId === project);
  }

  /**
   * Get the specimen with this name, creating it under `project` if needed
   *
   * When the name already belongs to another project the conflict is
   * reported and the existing specimen is returned unchanged.
   */
  fromName(input: CreateSpecimenInput): Specimen {
    const existing = this.findByName(input.name);
    if (!existing) {
      return this.create(input);
    }
    this.checkOwnership(existing, existing.name, 'project', existing.projectId, input.project);
    return existing;
  }
}

export const specimenRepository = new SpecimenRepository();
