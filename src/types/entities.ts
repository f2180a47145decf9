/**
 * Entity Interfaces for the sequencing tracking database
 *
 * All entities include the common record envelope:
 * - id: integer identity assigned by the store
 * - deprecated / deleted: soft-state flags
 * - creation / modification: ISO timestamps
 * - extraMetadata: free-form extension map
 * - extId / extSrc: optional link to an external system of record
 */

import {
  Aggregate,
  Lane,
  MetricFlag,
  NucleicAcidType,
  ReadsetState,
  SequencingType,
  Status,
  TableName,
} from './enums';

/**
 * Free-form JSON map stored in metadata and alias columns
 */
export type MetadataMap = Record<string, unknown>;

/**
 * Base interface for all entities
 */
export interface BaseEntity {
  /** Integer identity, immutable once assigned */
  id: number;
  /** Superseded but retained (e.g. an older config version) */
  deprecated: boolean;
  /** Logically removed; excluded from default queries */
  deleted: boolean;
  /** ISO timestamp of insertion */
  creation: string;
  /** ISO timestamp of the last mutating write */
  modification: string;
  /** Extensible metadata */
  extraMetadata: MetadataMap | null;
  /** Identifier in an external system of record */
  extId: number | null;
  /** Tag naming the external system of record */
  extSrc: string | null;
}

export interface Project extends BaseEntity {
  name: string;
  alias: MetadataMap | null;
}

export interface Specimen extends BaseEntity {
  projectId: number;
  name: string;
  alias: MetadataMap | null;
  cohort: string | null;
  institution: string | null;
}

export interface Sample extends BaseEntity {
  specimenId: number;
  name: string;
  alias: MetadataMap | null;
  tumour: boolean;
}

/**
 * Experiment entity - identified by its attribute tuple, not by name
 */
export interface Experiment extends BaseEntity {
  sequencingTechnology: string | null;
  /** Protocol type */
  type: string | null;
  nucleicAcidType: NucleicAcidType;
  libraryKit: string | null;
  kitExpirationDate: string | null;
}

export interface Run extends BaseEntity {
  name: string | null;
  instrument: string | null;
  date: string | null;
}

/**
 * Readset entity - reads from one lane of one run for one sample
 */
export interface Readset extends BaseEntity {
  sampleId: number;
  experimentId: number;
  runId: number;
  name: string;
  alias: MetadataMap | null;
  lane: Lane | null;
  adapter1: string | null;
  adapter2: string | null;
  sequencingType: SequencingType | null;
  state: ReadsetState;
}

export interface Reference extends BaseEntity {
  /** Scientific name */
  name: string | null;
  alias: string | null;
  assembly: string | null;
  version: string | null;
  taxonId: string | null;
  source: string | null;
}

export interface OperationConfig extends BaseEntity {
  name: string | null;
  version: string | null;
  md5sum: string | null;
  data: Buffer | null;
}

/**
 * Operation entity - one execution of a pipeline for a project
 */
export interface Operation extends BaseEntity {
  projectId: number;
  operationConfigId: number | null;
  referenceId: number | null;
  platform: string | null;
  cmdLine: string | null;
  name: string | null;
  status: Status;
}

export interface Job extends BaseEntity {
  operationId: number;
  name: string | null;
  start: string | null;
  stop: string | null;
  status: Status | null;
  type: string | null;
}

export interface Metric extends BaseEntity {
  jobId: number;
  name: string;
  value: string | null;
  flag: MetricFlag | null;
  deliverable: boolean;
  aggregate: Aggregate | null;
}

export interface TrackedFile extends BaseEntity {
  name: string;
  type: string | null;
  md5sum: string | null;
  deliverable: boolean;
}

/**
 * Location entity - a physical storage pointer for a file
 */
export interface Location extends BaseEntity {
  fileId: number;
  uri: string;
  endpoint: string;
  deliverable: boolean;
}

// =============================================================================
// Input types
// =============================================================================

/**
 * A parent passed to a resolver or create call: the entity or its id
 */
export type EntityRef = number | { id: number };

/**
 * Envelope fields accepted on every create
 */
export interface EnvelopeInput {
  deprecated?: boolean;
  deleted?: boolean;
  extraMetadata?: MetadataMap | null;
  extId?: number | null;
  extSrc?: string | null;
}

export interface CreateProjectInput extends EnvelopeInput {
  name: string;
  alias?: MetadataMap | null;
}

export interface CreateSpecimenInput extends EnvelopeInput {
  project: EntityRef;
  name: string;
  alias?: MetadataMap | null;
  cohort?: string | null;
  institution?: string | null;
}

export interface CreateSampleInput extends EnvelopeInput {
  specimen: EntityRef;
  name: string;
  alias?: MetadataMap | null;
  tumour?: boolean;
}

export interface CreateExperimentInput extends EnvelopeInput {
  nucleicAcidType: NucleicAcidType;
  sequencingTechnology?: string | null;
  type?: string | null;
  libraryKit?: string | null;
  kitExpirationDate?: string | Date | null;
}

export interface CreateRunInput extends EnvelopeInput {
  name?: string | null;
  instrument?: string | null;
  date?: string | Date | null;
}

export interface CreateReadsetInput extends EnvelopeInput {
  sample: EntityRef;
  experiment: EntityRef;
  run: EntityRef;
  name: string;
  alias?: MetadataMap | null;
  lane?: Lane | null;
  adapter1?: string | null;
  adapter2?: string | null;
  sequencingType?: SequencingType | null;
  state?: ReadsetState;
}

export interface CreateReferenceInput extends EnvelopeInput {
  name?: string | null;
  alias?: string | null;
  assembly?: string | null;
  version?: string | null;
  taxonId?: string | null;
  source?: string | null;
}

export interface CreateOperationConfigInput extends EnvelopeInput {
  name?: string | null;
  version?: string | null;
  md5sum?: string | null;
  data?: Buffer | null;
}

export interface CreateOperationInput extends EnvelopeInput {
  project: EntityRef;
  operationConfig?: EntityRef | null;
  reference?: EntityRef | null;
  platform?: string | null;
  cmdLine?: string | null;
  name?: string | null;
  status?: Status;
}

export interface CreateJobInput extends EnvelopeInput {
  operation: EntityRef;
  name?: string | null;
  start?: string | Date | null;
  stop?: string | Date | null;
  status?: Status | null;
  type?: string | null;
}

export interface CreateMetricInput extends EnvelopeInput {
  job: EntityRef;
  name: string;
  value?: string | null;
  flag?: MetricFlag | null;
  deliverable?: boolean;
  aggregate?: Aggregate | null;
}

export interface CreateFileInput extends EnvelopeInput {
  name: string;
  type?: string | null;
  md5sum?: string | null;
  deliverable?: boolean;
}

export interface CreateLocationInput extends EnvelopeInput {
  file: EntityRef;
  uri: string;
  endpoint?: string | null;
  deliverable?: boolean;
}

// =============================================================================
// Update types
// =============================================================================

export interface UpdateOperationInput {
  status?: Status;
  cmdLine?: string | null;
  platform?: string | null;
}

export interface UpdateJobInput {
  status?: Status | null;
  start?: string | Date | null;
  stop?: string | Date | null;
}

export interface UpdateReadsetInput {
  state?: ReadsetState;
  lane?: Lane | null;
  adapter1?: string | null;
  adapter2?: string | null;
  sequencingType?: SequencingType | null;
  alias?: MetadataMap | null;
}

export interface UpdateMetricInput {
  value?: string | null;
  flag?: MetricFlag | null;
  deliverable?: boolean;
  aggregate?: Aggregate | null;
}

/**
 * Maps each table to its entity type
 */
export interface EntityByTable {
  [TableName.PROJECT]: Project;
  [TableName.SPECIMEN]: Specimen;
  [TableName.SAMPLE]: Sample;
  [TableName.EXPERIMENT]: Experiment;
  [TableName.RUN]: Run;
  [TableName.READSET]: Readset;
  [TableName.REFERENCE]: Reference;
  [TableName.OPERATION_CONFIG]: OperationConfig;
  [TableName.OPERATION]: Operation;
  [TableName.JOB]: Job;
  [TableName.METRIC]: Metric;
  [TableName.FILE]: TrackedFile;
  [TableName.LOCATION]: Location;
}
