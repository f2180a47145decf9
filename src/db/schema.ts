/**
 * Database Schema Constants for the sequencing tracking database
 *
 * Uses better-sqlite3.
 * All timestamps are stored as ISO strings.
 * JSON fields are stored as TEXT, booleans as 0/1 integers.
 */

import {
  Aggregate,
  Lane,
  LinkTable,
  MetricFlag,
  NucleicAcidType,
  ReadsetState,
  SequencingType,
  Status,
  TableName,
} from '../types/enums';

/**
 * Current schema version for migration tracking
 */
export const SCHEMA_VERSION = 1;

/**
 * Table names as constants
 */
export const TABLES = {
  SCHEMA_VERSIONS: 'schema_versions',
  PROJECT: TableName.PROJECT,
  SPECIMEN: TableName.SPECIMEN,
  SAMPLE: TableName.SAMPLE,
  EXPERIMENT: TableName.EXPERIMENT,
  RUN: TableName.RUN,
  READSET: TableName.READSET,
  REFERENCE: TableName.REFERENCE,
  OPERATION_CONFIG: TableName.OPERATION_CONFIG,
  OPERATION: TableName.OPERATION,
  JOB: TableName.JOB,
  METRIC: TableName.METRIC,
  FILE: TableName.FILE,
  LOCATION: TableName.LOCATION,
  READSET_FILE: LinkTable.READSET_FILE,
  READSET_METRIC: LinkTable.READSET_METRIC,
  READSET_JOB: LinkTable.READSET_JOB,
  READSET_OPERATION: LinkTable.READSET_OPERATION,
  JOB_FILE: LinkTable.JOB_FILE,
} as const;

/**
 * CHECK clause restricting a column to the values of a string enum.
 * NULL passes, nullability is declared separately.
 */
function enumCheck(column: string, values: Record<string, string>): string {
  const list = Object.values(values)
    .map((value) => `'${value}'`)
    .join(', ');
  return `CHECK (${column} IN (${list}))`;
}

function boolColumn(column: string, defaultValue = 0): string {
  return `${column} INTEGER NOT NULL DEFAULT ${defaultValue} CHECK (${column} IN (0, 1))`;
}

/**
 * Envelope columns shared by every entity table
 */
const ENVELOPE_COLUMNS = `
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ${boolColumn('deprecated')},
    ${boolColumn('deleted')},
    creation TEXT NOT NULL,
    modification TEXT NOT NULL,
    extra_metadata TEXT,
    ext_id INTEGER,
    ext_src TEXT`;

/**
 * SQL for creating the schema_versions table (migration tracking)
 */
export const CREATE_SCHEMA_VERSIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.SCHEMA_VERSIONS} (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (datetime('now')),
    description TEXT
  );
`;

export const CREATE_PROJECT_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.PROJECT} (${ENVELOPE_COLUMNS},
    name TEXT NOT NULL UNIQUE,
    alias TEXT
  );
`;

export const CREATE_SPECIMEN_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.SPECIMEN} (${ENVELOPE_COLUMNS},
    project_id INTEGER NOT NULL,
    name TEXT NOT NULL UNIQUE,
    alias TEXT,
    cohort TEXT,
    institution TEXT,
    FOREIGN KEY (project_id) REFERENCES ${TABLES.PROJECT}(id) ON DELETE CASCADE
  );
`;

export const CREATE_SAMPLE_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.SAMPLE} (${ENVELOPE_COLUMNS},
    specimen_id INTEGER NOT NULL,
    name TEXT NOT NULL UNIQUE,
    alias TEXT,
    ${boolColumn('tumour')},
    FOREIGN KEY (specimen_id) REFERENCES ${TABLES.SPECIMEN}(id) ON DELETE CASCADE
  );
`;

export const CREATE_EXPERIMENT_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.EXPERIMENT} (${ENVELOPE_COLUMNS},
    sequencing_technology TEXT,
    type TEXT,
    nucleic_acid_type TEXT NOT NULL ${enumCheck('nucleic_acid_type', NucleicAcidType)},
    library_kit TEXT,
    kit_expiration_date TEXT
  );
`;

export const CREATE_RUN_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.RUN} (${ENVELOPE_COLUMNS},
    name TEXT,
    instrument TEXT,
    date TEXT
  );
`;

export const CREATE_READSET_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.READSET} (${ENVELOPE_COLUMNS},
    sample_id INTEGER NOT NULL,
    experiment_id INTEGER NOT NULL,
    run_id INTEGER NOT NULL,
    name TEXT NOT NULL UNIQUE,
    alias TEXT,
    lane TEXT ${enumCheck('lane', Lane)},
    adapter1 TEXT,
    adapter2 TEXT,
    sequencing_type TEXT ${enumCheck('sequencing_type', SequencingType)},
    state TEXT NOT NULL DEFAULT '${ReadsetState.VALID}' ${enumCheck('state', ReadsetState)},
    FOREIGN KEY (sample_id) REFERENCES ${TABLES.SAMPLE}(id) ON DELETE CASCADE,
    FOREIGN KEY (experiment_id) REFERENCES ${TABLES.EXPERIMENT}(id) ON DELETE CASCADE,
    FOREIGN KEY (run_id) REFERENCES ${TABLES.RUN}(id) ON DELETE CASCADE
  );
`;

export const CREATE_REFERENCE_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.REFERENCE} (${ENVELOPE_COLUMNS},
    name TEXT,
    alias TEXT,
    assembly TEXT,
    version TEXT,
    taxon_id TEXT,
    source TEXT
  );
`;

export const CREATE_OPERATION_CONFIG_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.OPERATION_CONFIG} (${ENVELOPE_COLUMNS},
    name TEXT,
    version TEXT,
    md5sum TEXT UNIQUE,
    data BLOB
  );
`;

export const CREATE_OPERATION_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.OPERATION} (${ENVELOPE_COLUMNS},
    project_id INTEGER NOT NULL,
    operation_config_id INTEGER,
    reference_id INTEGER,
    platform TEXT,
    cmd_line TEXT,
    name TEXT,
    status TEXT NOT NULL DEFAULT '${Status.PENDING}' ${enumCheck('status', Status)},
    FOREIGN KEY (project_id) REFERENCES ${TABLES.PROJECT}(id) ON DELETE CASCADE,
    FOREIGN KEY (operation_config_id) REFERENCES ${TABLES.OPERATION_CONFIG}(id) ON DELETE CASCADE,
    FOREIGN KEY (reference_id) REFERENCES ${TABLES.REFERENCE}(id) ON DELETE CASCADE
  );
`;

export const CREATE_JOB_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.JOB} (${ENVELOPE_COLUMNS},
    operation_id INTEGER NOT NULL,
    name TEXT,
    start TEXT,
    stop TEXT,
    status TEXT ${enumCheck('status', Status)},
    type TEXT,
    FOREIGN KEY (operation_id) REFERENCES ${TABLES.OPERATION}(id) ON DELETE CASCADE
  );
`;

export const CREATE_METRIC_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.METRIC} (${ENVELOPE_COLUMNS},
    job_id INTEGER NOT NULL,
    name TEXT NOT NULL,
    value TEXT,
    flag TEXT ${enumCheck('flag', MetricFlag)},
    ${boolColumn('deliverable')},
    aggregate TEXT ${enumCheck('aggregate', Aggregate)},
    FOREIGN KEY (job_id) REFERENCES ${TABLES.JOB}(id) ON DELETE CASCADE
  );
`;

export const CREATE_FILE_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.FILE} (${ENVELOPE_COLUMNS},
    name TEXT NOT NULL,
    type TEXT,
    md5sum TEXT,
    ${boolColumn('deliverable')}
  );
`;

export const CREATE_LOCATION_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TABLES.LOCATION} (${ENVELOPE_COLUMNS},
    file_id INTEGER NOT NULL,
    uri TEXT NOT NULL UNIQUE,
    endpoint TEXT NOT NULL,
    ${boolColumn('deliverable')},
    FOREIGN KEY (file_id) REFERENCES ${TABLES.FILE}(id) ON DELETE CASCADE
  );
`;

/**
 * Join table columns for each many-to-many edge.
 * Deleting either side removes the join row only.
 */
export const LINK_COLUMNS: Record<LinkTable, { left: { column: string; table: TableName }; right: { column: string; table: TableName } }> = {
  [LinkTable.READSET_FILE]: {
    left: { column: 'readset_id', table: TableName.READSET },
    right: { column: 'file_id', table: TableName.FILE },
  },
  [LinkTable.READSET_METRIC]: {
    left: { column: 'readset_id', table: TableName.READSET },
    right: { column: 'metric_id', table: TableName.METRIC },
  },
  [LinkTable.READSET_JOB]: {
    left: { column: 'readset_id', table: TableName.READSET },
    right: { column: 'job_id', table: TableName.JOB },
  },
  [LinkTable.READSET_OPERATION]: {
    left: { column: 'readset_id', table: TableName.READSET },
    right: { column: 'operation_id', table: TableName.OPERATION },
  },
  [LinkTable.JOB_FILE]: {
    left: { column: 'job_id', table: TableName.JOB },
    right: { column: 'file_id', table: TableName.FILE },
  },
};

function createLinkTable(link: LinkTable): string {
  const { left, right } = LINK_COLUMNS[link];
  return `
  CREATE TABLE IF NOT EXISTS ${link} (
    ${left.column} INTEGER NOT NULL,
    ${right.column} INTEGER NOT NULL,
    PRIMARY KEY (${left.column}, ${right.column}),
    FOREIGN KEY (${left.column}) REFERENCES ${left.table}(id) ON DELETE CASCADE,
    FOREIGN KEY (${right.column}) REFERENCES ${right.table}(id) ON DELETE CASCADE
  );
`;
}

export const CREATE_LINK_TABLES = Object.values(LinkTable).map(createLinkTable);

/**
 * SQL for creating indexes on foreign key columns
 */
export const CREATE_INDEXES = `
  CREATE INDEX IF NOT EXISTS idx_specimen_project_id ON ${TABLES.SPECIMEN}(project_id);
  CREATE INDEX IF NOT EXISTS idx_sample_specimen_id ON ${TABLES.SAMPLE}(specimen_id);
  CREATE INDEX IF NOT EXISTS idx_readset_sample_id ON ${TABLES.READSET}(sample_id);
  CREATE INDEX IF NOT EXISTS idx_readset_experiment_id ON ${TABLES.READSET}(experiment_id);
  CREATE INDEX IF NOT EXISTS idx_readset_run_id ON ${TABLES.READSET}(run_id);
  CREATE INDEX IF NOT EXISTS idx_operation_project_id ON ${TABLES.OPERATION}(project_id);
  CREATE INDEX IF NOT EXISTS idx_job_operation_id ON ${TABLES.JOB}(operation_id);
  CREATE INDEX IF NOT EXISTS idx_metric_job_id ON ${TABLES.METRIC}(job_id);
  CREATE INDEX IF NOT EXISTS idx_location_file_id ON ${TABLES.LOCATION}(file_id);
  CREATE INDEX IF NOT EXISTS idx_readset_file_file_id ON ${TABLES.READSET_FILE}(file_id);
  CREATE INDEX IF NOT EXISTS idx_readset_metric_metric_id ON ${TABLES.READSET_METRIC}(metric_id);
  CREATE INDEX IF NOT EXISTS idx_readset_job_job_id ON ${TABLES.READSET_JOB}(job_id);
  CREATE INDEX IF NOT EXISTS idx_readset_operation_operation_id ON ${TABLES.READSET_OPERATION}(operation_id);
  CREATE INDEX IF NOT EXISTS idx_job_file_file_id ON ${TABLES.JOB_FILE}(file_id);
`;

/**
 * Entity tables in creation order (parents first)
 */
export const CREATE_ENTITY_TABLES = [
  CREATE_PROJECT_TABLE,
  CREATE_SPECIMEN_TABLE,
  CREATE_SAMPLE_TABLE,
  CREATE_EXPERIMENT_TABLE,
  CREATE_RUN_TABLE,
  CREATE_READSET_TABLE,
  CREATE_REFERENCE_TABLE,
  CREATE_OPERATION_CONFIG_TABLE,
  CREATE_OPERATION_TABLE,
  CREATE_JOB_TABLE,
  CREATE_METRIC_TABLE,
  CREATE_FILE_TABLE,
  CREATE_LOCATION_TABLE,
];
