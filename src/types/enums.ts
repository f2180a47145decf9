/**
 * Enums for the sequencing tracking database
 *
 * Closed vocabularies persisted as their string value. The schema
 * mirrors every enum as a CHECK constraint, so a value outside the
 * declared set never reaches a table.
 */

/**
 * Flowcell lane a readset was sequenced on
 */
export enum Lane {
  ONE = '1',
  TWO = '2',
  THREE = '3',
  FOUR = '4',
  FIVE = '5',
  SIX = '6',
  SEVEN = '7',
  EIGHT = '8',
}

/**
 * Read layout of a readset
 */
export enum SequencingType {
  SINGLE_END = 'SINGLE_END',
  PAIRED_END = 'PAIRED_END',
}

/**
 * Nucleic acid extracted for an experiment
 */
export enum NucleicAcidType {
  DNA = 'DNA',
  RNA = 'RNA',
}

/**
 * Processing state of a readset
 */
export enum ReadsetState {
  VALID = 'VALID',
  ON_HOLD = 'ON_HOLD',
  INVALID = 'INVALID',
}

/**
 * Execution status shared by operations and jobs
 */
export enum Status {
  PENDING = 'PENDING',
  RUNNING = 'RUNNING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  OUT_OF_MEMORY = 'OUT_OF_MEMORY',
  CANCELLED = 'CANCELLED',
}

/**
 * QC outcome attached to a metric
 */
export enum MetricFlag {
  PASS = 'PASS',
  WARNING = 'WARNING',
  FAILED = 'FAILED',
  MISSING = 'MISSING',
  NOT_APPLICABLE = 'NOT_APPLICABLE',
}

/**
 * How a metric is aggregated at sample level
 */
export enum Aggregate {
  SUM = 'SUM',
  AVERAGE = 'AVERAGE',
  N = 'N', // not aggregated
}

/**
 * Table names, also used as the discriminator of flat records
 */
export enum TableName {
  PROJECT = 'project',
  SPECIMEN = 'specimen',
  SAMPLE = 'sample',
  EXPERIMENT = 'experiment',
  RUN = 'run',
  READSET = 'readset',
  REFERENCE = 'reference',
  OPERATION_CONFIG = 'operation_config',
  OPERATION = 'operation',
  JOB = 'job',
  METRIC = 'metric',
  FILE = 'file',
  LOCATION = 'location',
}

/**
 * Many-to-many edges, named after their join table
 */
export enum LinkTable {
  READSET_FILE = 'readset_file',
  READSET_METRIC = 'readset_metric',
  READSET_JOB = 'readset_job',
  READSET_OPERATION = 'readset_operation',
  JOB_FILE = 'job_file',
}
