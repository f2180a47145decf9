/**
 * Experiment Repository
 *
 * Experiments have no name; two experiments are the same when their
 * technology, type, nucleic acid, library kit and kit expiration all match.
 */

import { TableName } from '../types';
import type { CreateExperimentInput, Experiment } from '../types';
import { CreateExperimentSchema, assertValid, toIsoTimestamp } from '../validation';
import { BaseRepository } from './base-repository';
import { toExperiment } from './rows';
import type { ExperimentRow } from './rows';

export class ExperimentRepository extends BaseRepository<TableName.EXPERIMENT, ExperimentRow> {
  protected readonly table = TableName.EXPERIMENT;

  protected toEntity(row: ExperimentRow): Experiment {
    return toExperiment(row);
  }

  create(input: CreateExperimentInput): Experiment {
    assertValid(CreateExperimentSchema, input, 'experiment');
    return this.insert(
      {
        sequencing_technology: input.sequencingTechnology ?? null,
        type: input.type ?? null,
        nucleic_acid_type: input.nucleicAcidType,
        library_kit: input.libraryKit ?? null,
        kit_expiration_date: toIsoTimestamp(input.kitExpirationDate, 'kitExpirationDate'),
      },
      input
    );
  }

  /**
   * Find by the full attribute tuple; absent attributes match NULL
   */
  findByAttributes(input: CreateExperimentInput): Experiment | null {
    return this.findOneWhere(
      'sequencing_technology IS ? AND type IS ? AND nucleic_acid_type = ? AND library_kit IS ? AND kit_expiration_date IS ?',
      [
        input.sequencingTechnology ?? null,
        input.type ?? null,
        input.nucleicAcidType,
        input.libraryKit ?? null,
        toIsoTimestamp(input.kitExpirationDate, 'kitExpirationDate'),
      ]
    );
  }

  /**
   * Get the experiment with these attributes, creating it if needed
   */
  fromAttributes(input: CreateExperimentInput): Experiment {
    assertValid(CreateExperimentSchema, input, 'experiment');
    return this.findByAttributes(input) ?? this.create(input);
  }
}

export const experimentRepository = new ExperimentRepository();
