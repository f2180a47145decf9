/**
 * Tracking database type system
 *
 * Exports all enums, entity interfaces and input types.
 */

// Re-export all enums
export {
  Lane,
  SequencingType,
  NucleicAcidType,
  ReadsetState,
  Status,
  MetricFlag,
  Aggregate,
  TableName,
  LinkTable,
} from './enums';

// Re-export all entity interfaces
export type {
  MetadataMap,
  BaseEntity,
  Project,
  Specimen,
  Sample,
  Experiment,
  Run,
  Readset,
  Reference,
  OperationConfig,
  Operation,
  Job,
  Metric,
  TrackedFile,
  Location,
  EntityByTable,
} from './entities';

// Re-export all input types
export type {
  EntityRef,
  EnvelopeInput,
  CreateProjectInput,
  CreateSpecimenInput,
  CreateSampleInput,
  CreateExperimentInput,
  CreateRunInput,
  CreateReadsetInput,
  CreateReferenceInput,
  CreateOperationConfigInput,
  CreateOperationInput,
  CreateJobInput,
  CreateMetricInput,
  CreateFileInput,
  CreateLocationInput,
  UpdateOperationInput,
  UpdateJobInput,
  UpdateReadsetInput,
  UpdateMetricInput,
} from './entities';
