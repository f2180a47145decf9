/**
 * Flat Projection
 *
 * Converts an entity and its relationships into a flat, JSON-ready record:
 * parents as `<parent>Id` numbers, collections as ascending id arrays, and
 * a `tablename` discriminator. A file's `locations` are the one collection
 * rendered as nested flat records.
 *
 * Only SELECT statements are issued.
 */

import type { Database as Connection } from 'better-sqlite3';
import { LINK_COLUMNS } from '../db/schema';
import { LinkTable, TableName } from '../types';
import type { EntityByTable } from '../types';
import { toLocation } from '../repositories/rows';
import type { LocationRow } from '../repositories/rows';

export type FlatValue =
  | string
  | number
  | boolean
  | null
  | number[]
  | FlatRecord[]
  | Record<string, unknown>;

export interface FlatRecord {
  tablename: TableName;
  [field: string]: FlatValue;
}

/**
 * A one-to-many collection read through the child's parent column
 */
interface ChildCollection {
  kind: 'child';
  name: string;
  table: TableName;
  column: string;
}

/**
 * A many-to-many collection read through a join table
 */
interface LinkCollection {
  kind: 'link';
  name: string;
  link: LinkTable;
  /** Side of the join table holding this entity's id */
  side: 'left' | 'right';
}

type CollectionSpec = ChildCollection | LinkCollection;

interface FlatSpec<T> {
  fields: readonly (keyof T & string)[];
  collections: readonly CollectionSpec[];
}

type FlatSpecs = { [K in TableName]: FlatSpec<EntityByTable[K]> };

const ENVELOPE_FIELDS = [
  'id',
  'deprecated',
  'deleted',
  'creation',
  'modification',
  'extraMetadata',
  'extId',
  'extSrc',
] as const;

const child = (name: string, table: TableName, column: string): ChildCollection => ({
  kind: 'child',
  name,
  table,
  column,
});

const link = (name: string, linkTable: LinkTable, side: 'left' | 'right'): LinkCollection => ({
  kind: 'link',
  name,
  link: linkTable,
  side,
});

/**
 * Fields and relationships that take part in each table's projection
 */
export const FLAT_SPECS: FlatSpecs = {
  [TableName.PROJECT]: {
    fields: [...ENVELOPE_FIELDS, 'name', 'alias'],
    collections: [
      child('specimens', TableName.SPECIMEN, 'project_id'),
      child('operations', TableName.OPERATION, 'project_id'),
    ],
  },
  [TableName.SPECIMEN]: {
    fields: [...ENVELOPE_FIELDS, 'projectId', 'name', 'alias', 'cohort', 'institution'],
    collections: [child('samples', TableName.SAMPLE, 'specimen_id')],
  },
  [TableName.SAMPLE]: {
    fields: [...ENVELOPE_FIELDS, 'specimenId', 'name', 'alias', 'tumour'],
    collections: [child('readsets', TableName.READSET, 'sample_id')],
  },
  [TableName.EXPERIMENT]: {
    fields: [
      ...ENVELOPE_FIELDS,
      'sequencingTechnology',
      'type',
      'nucleicAcidType',
      'libraryKit',
      'kitExpirationDate',
    ],
    collections: [child('readsets', TableName.READSET, 'experiment_id')],
  },
  [TableName.RUN]: {
    fields: [...ENVELOPE_FIELDS, 'name', 'instrument', 'date'],
    collections: [child('readsets', TableName.READSET, 'run_id')],
  },
  [TableName.READSET]: {
    fields: [
      ...ENVELOPE_FIELDS,
      'sampleId',
      'experimentId',
      'runId',
      'name',
      'alias',
      'lane',
      'adapter1',
      'adapter2',
      'sequencingType',
      'state',
    ],
    collections: [
      link('files', LinkTable.READSET_FILE, 'left'),
      link('operations', LinkTable.READSET_OPERATION, 'left'),
      link('jobs', LinkTable.READSET_JOB, 'left'),
      link('metrics', LinkTable.READSET_METRIC, 'left'),
    ],
  },
  [TableName.REFERENCE]: {
    fields: [...ENVELOPE_FIELDS, 'name', 'alias', 'assembly', 'version', 'taxonId', 'source'],
    collections: [child('operations', TableName.OPERATION, 'reference_id')],
  },
  [TableName.OPERATION_CONFIG]: {
    fields: [...ENVELOPE_FIELDS, 'name', 'version', 'md5sum', 'data'],
    collections: [child('operations', TableName.OPERATION, 'operation_config_id')],
  },
  [TableName.OPERATION]: {
    fields: [
      ...ENVELOPE_FIELDS,
      'projectId',
      'operationConfigId',
      'referenceId',
      'platform',
      'cmdLine',
      'name',
      'status',
    ],
    collections: [
      child('jobs', TableName.JOB, 'operation_id'),
      link('readsets', LinkTable.READSET_OPERATION, 'right'),
    ],
  },
  [TableName.JOB]: {
    fields: [...ENVELOPE_FIELDS, 'operationId', 'name', 'start', 'stop', 'status', 'type'],
    collections: [
      child('metrics', TableName.METRIC, 'job_id'),
      link('files', LinkTable.JOB_FILE, 'left'),
      link('readsets', LinkTable.READSET_JOB, 'right'),
    ],
  },
  [TableName.METRIC]: {
    fields: [...ENVELOPE_FIELDS, 'jobId', 'name', 'value', 'flag', 'deliverable', 'aggregate'],
    collections: [link('readsets', LinkTable.READSET_METRIC, 'right')],
  },
  [TableName.FILE]: {
    fields: [...ENVELOPE_FIELDS, 'name', 'type', 'md5sum', 'deliverable'],
    collections: [
      child('locations', TableName.LOCATION, 'file_id'),
      link('readsets', LinkTable.READSET_FILE, 'right'),
      link('jobs', LinkTable.JOB_FILE, 'right'),
    ],
  },
  [TableName.LOCATION]: {
    fields: [...ENVELOPE_FIELDS, 'fileId', 'uri', 'endpoint', 'deliverable'],
    collections: [],
  },
};

/**
 * Render one scalar for serialization
 */
export function toFlatScalar(value: unknown): FlatValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return JSON.stringify(value);
}

function collectionIds(db: Connection, spec: CollectionSpec, id: number): number[] {
  if (spec.kind === 'child') {
    return db
      .prepare<[number], { id: number }>(`SELECT id FROM ${spec.table} WHERE ${spec.column} = ? ORDER BY id ASC`)
      .all(id)
      .map((row) => row.id);
  }

  const columns = LINK_COLUMNS[spec.link];
  const own = spec.side === 'left' ? columns.left.column : columns.right.column;
  const other = spec.side === 'left' ? columns.right.column : columns.left.column;
  return db
    .prepare<[number], { id: number }>(`SELECT ${other} AS id FROM ${spec.link} WHERE ${own} = ? ORDER BY ${other} ASC`)
    .all(id)
    .map((row) => row.id);
}

function nestedLocations(db: Connection, fileId: number): FlatRecord[] {
  return db
    .prepare<[number], LocationRow>(`SELECT * FROM ${TableName.LOCATION} WHERE file_id = ? ORDER BY id ASC`)
    .all(fileId)
    .map((row) => flatten(db, TableName.LOCATION, toLocation(row)));
}

/**
 * Flatten an entity read from `table`
 *
 * @example
 * ```typescript
 * flatten(db, TableName.SAMPLE, sample);
 * // { id: 3, ..., specimenId: 1, name: 'S1', tumour: false, readsets: [4, 7], tablename: 'sample' }
 * ```
 */
export function flatten<K extends TableName>(db: Connection, table: K, entity: EntityByTable[K]): FlatRecord {
  const spec: FlatSpec<EntityByTable[K]> = FLAT_SPECS[table];
  const record: FlatRecord = { tablename: table };

  for (const field of spec.fields) {
    record[field] = toFlatScalar(entity[field]);
  }

  for (const collection of spec.collections) {
    if (table === TableName.FILE && collection.name === 'locations') {
      record[collection.name] = nestedLocations(db, entity.id);
    } else {
      record[collection.name] = collectionIds(db, collection, entity.id);
    }
  }

  // Set last so a field can never shadow the discriminator
  record.tablename = table;
  return record;
}

/**
 * Serialize a flat record
 */
export function dumps(record: FlatRecord): string {
  return JSON.stringify(record);
}
