/**
 * Row types and row-to-entity mappers
 *
 * Rows carry the raw column values better-sqlite3 returns:
 * snake_case names, 0/1 booleans, JSON as TEXT.
 */

import {
  AggregateSchema,
  LaneSchema,
  MetricFlagSchema,
  NucleicAcidTypeSchema,
  ReadsetStateSchema,
  SequencingTypeSchema,
  StatusSchema,
} from '../validation';
import type {
  BaseEntity,
  Experiment,
  Job,
  Location,
  MetadataMap,
  Metric,
  Operation,
  OperationConfig,
  Project,
  Readset,
  Reference,
  Run,
  Sample,
  Specimen,
  TrackedFile,
} from '../types';

/**
 * Values that can be bound to a statement parameter
 */
export type SqlValue = string | number | bigint | Buffer | null;

export interface EnvelopeRow {
  id: number;
  deprecated: number;
  deleted: number;
  creation: string;
  modification: string;
  extra_metadata: string | null;
  ext_id: number | null;
  ext_src: string | null;
}

export interface ProjectRow extends EnvelopeRow {
  name: string;
  alias: string | null;
}

export interface SpecimenRow extends EnvelopeRow {
  project_id: number;
  name: string;
  alias: string | null;
  cohort: string | null;
  institution: string | null;
}

export interface SampleRow extends EnvelopeRow {
  specimen_id: number;
  name: string;
  alias: string | null;
  tumour: number;
}

export interface ExperimentRow extends EnvelopeRow {
  sequencing_technology: string | null;
  type: string | null;
  nucleic_acid_type: string;
  library_kit: string | null;
  kit_expiration_date: string | null;
}

export interface RunRow extends EnvelopeRow {
  name: string | null;
  instrument: string | null;
  date: string | null;
}

export interface ReadsetRow extends EnvelopeRow {
  sample_id: number;
  experiment_id: number;
  run_id: number;
  name: string;
  alias: string | null;
  lane: string | null;
  adapter1: string | null;
  adapter2: string | null;
  sequencing_type: string | null;
  state: string;
}

export interface ReferenceRow extends EnvelopeRow {
  name: string | null;
  alias: string | null;
  assembly: string | null;
  version: string | null;
  taxon_id: string | null;
  source: string | null;
}

export interface OperationConfigRow extends EnvelopeRow {
  name: string | null;
  version: string | null;
  md5sum: string | null;
  data: Buffer | null;
}

export interface OperationRow extends EnvelopeRow {
  project_id: number;
  operation_config_id: number | null;
  reference_id: number | null;
  platform: string | null;
  cmd_line: string | null;
  name: string | null;
  status: string;
}

export interface JobRow extends EnvelopeRow {
  operation_id: number;
  name: string | null;
  start: string | null;
  stop: string | null;
  status: string | null;
  type: string | null;
}

export interface MetricRow extends EnvelopeRow {
  job_id: number;
  name: string;
  value: string | null;
  flag: string | null;
  deliverable: number;
  aggregate: string | null;
}

export interface FileRow extends EnvelopeRow {
  name: string;
  type: string | null;
  md5sum: string | null;
  deliverable: number;
}

export interface LocationRow extends EnvelopeRow {
  file_id: number;
  uri: string;
  endpoint: string;
  deliverable: number;
}

function isRecord(value: unknown): value is MetadataMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON map column; anything but an object reads as null
 */
export function parseJsonMap(text: string | null): MetadataMap | null {
  if (text === null) {
    return null;
  }
  const value: unknown = JSON.parse(text);
  return isRecord(value) ? value : null;
}

export function toJsonColumn(value: MetadataMap | null | undefined): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

export function toBoolColumn(value: boolean | null | undefined): number {
  return value ? 1 : 0;
}

export function toEnvelope(row: EnvelopeRow): BaseEntity {
  return {
    id: row.id,
    deprecated: row.deprecated === 1,
    deleted: row.deleted === 1,
    creation: row.creation,
    modification: row.modification,
    extraMetadata: parseJsonMap(row.extra_metadata),
    extId: row.ext_id,
    extSrc: row.ext_src,
  };
}

export function toProject(row: ProjectRow): Project {
  return {
    ...toEnvelope(row),
    name: row.name,
    alias: parseJsonMap(row.alias),
  };
}

export function toSpecimen(row: SpecimenRow): Specimen {
  return {
    ...toEnvelope(row),
    projectId: row.project_id,
    name: row.name,
    alias: parseJsonMap(row.alias),
    cohort: row.cohort,
    institution: row.institution,
  };
}

export function toSample(row: SampleRow): Sample {
  return {
    ...toEnvelope(row),
    specimenId: row.specimen_id,
    name: row.name,
    alias: parseJsonMap(row.alias),
    tumour: row.tumour === 1,
  };
}

export function toExperiment(row: ExperimentRow): Experiment {
  return {
    ...toEnvelope(row),
    sequencingTechnology: row.sequencing_technology,
    type: row.type,
    nucleicAcidType: NucleicAcidTypeSchema.parse(row.nucleic_acid_type),
    libraryKit: row.library_kit,
    kitExpirationDate: row.kit_expiration_date,
  };
}

export function toRun(row: RunRow): Run {
  return {
    ...toEnvelope(row),
    name: row.name,
    instrument: row.instrument,
    date: row.date,
  };
}

export function toReadset(row: ReadsetRow): Readset {
  return {
    ...toEnvelope(row),
    sampleId: row.sample_id,
    experimentId: row.experiment_id,
    runId: row.run_id,
    name: row.name,
    alias: parseJsonMap(row.alias),
    lane: LaneSchema.nullable().parse(row.lane),
    adapter1: row.adapter1,
    adapter2: row.adapter2,
    sequencingType: SequencingTypeSchema.nullable().parse(row.sequencing_type),
    state: ReadsetStateSchema.parse(row.state),
  };
}

export function toReference(row: ReferenceRow): Reference {
  return {
    ...toEnvelope(row),
    name: row.name,
    alias: row.alias,
    assembly: row.assembly,
    version: row.version,
    taxonId: row.taxon_id,
    source: row.source,
  };
}

export function toOperationConfig(row: OperationConfigRow): OperationConfig {
  return {
    ...toEnvelope(row),
    name: row.name,
    version: row.version,
    md5sum: row.md5sum,
    data: row.data,
  };
}

export function toOperation(row: OperationRow): Operation {
  return {
    ...toEnvelope(row),
    projectId: row.project_id,
    operationConfigId: row.operation_config_id,
    referenceId: row.reference_id,
    platform: row.platform,
    cmdLine: row.cmd_line,
    name: row.name,
    status: StatusSchema.parse(row.status),
  };
}

export function toJob(row: JobRow): Job {
  return {
    ...toEnvelope(row),
    operationId: row.operation_id,
    name: row.name,
    start: row.start,
    stop: row.stop,
    status: StatusSchema.nullable().parse(row.status),
    type: row.type,
  };
}

export function toMetric(row: MetricRow): Metric {
  return {
    ...toEnvelope(row),
    jobId: row.job_id,
    name: row.name,
    value: row.value,
    flag: MetricFlagSchema.nullable().parse(row.flag),
    deliverable: row.deliverable === 1,
    aggregate: AggregateSchema.nullable().parse(row.aggregate),
  };
}

export function toFile(row: FileRow): TrackedFile {
  return {
    ...toEnvelope(row),
    name: row.name,
    type: row.type,
    md5sum: row.md5sum,
    deliverable: row.deliverable === 1,
  };
}

export function toLocation(row: LocationRow): Location {
  return {
    ...toEnvelope(row),
    fileId: row.file_id,
    uri: row.uri,
    endpoint: row.endpoint,
    deliverable: row.deliverable === 1,
  };
}
