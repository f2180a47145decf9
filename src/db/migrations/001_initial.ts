/**
 * Migration 001: Initial tracking schema
 *
 * Creates every entity table, the many-to-many join tables
 * and the foreign key indexes.
 */

import type { Database } from 'better-sqlite3';
import {
  TABLES,
  CREATE_SCHEMA_VERSIONS_TABLE,
  CREATE_ENTITY_TABLES,
  CREATE_LINK_TABLES,
  CREATE_INDEXES,
} from '../schema';
import { LinkTable } from '../../types/enums';

export const VERSION = 1;
export const DESCRIPTION = 'Initial tracking schema';

/**
 * Apply the migration
 */
export function up(db: Database): void {
  db.exec(CREATE_SCHEMA_VERSIONS_TABLE);

  for (const statement of CREATE_ENTITY_TABLES) {
    db.exec(statement);
  }
  for (const statement of CREATE_LINK_TABLES) {
    db.exec(statement);
  }
  db.exec(CREATE_INDEXES);

  // Record migration
  db.prepare(
    `INSERT OR REPLACE INTO ${TABLES.SCHEMA_VERSIONS} (version, description) VALUES (?, ?)`
  ).run(VERSION, DESCRIPTION);
}

/**
 * Rollback the migration
 */
export function down(db: Database): void {
  // Children first so no foreign key points at a dropped table
  const dropOrder = [
    ...Object.values(LinkTable),
    TABLES.LOCATION,
    TABLES.FILE,
    TABLES.METRIC,
    TABLES.JOB,
    TABLES.OPERATION,
    TABLES.OPERATION_CONFIG,
    TABLES.REFERENCE,
    TABLES.READSET,
    TABLES.RUN,
    TABLES.EXPERIMENT,
    TABLES.SAMPLE,
    TABLES.SPECIMEN,
    TABLES.PROJECT,
  ];
  for (const table of dropOrder) {
    db.exec(`DROP TABLE IF EXISTS ${table}`);
  }
  db.prepare(`DELETE FROM ${TABLES.SCHEMA_VERSIONS} WHERE version = ?`).run(VERSION);
}

/**
 * Check if migration is already applied and run if not
 */
export function run(db: Database): { applied: boolean; version: number } {
  db.exec(CREATE_SCHEMA_VERSIONS_TABLE);
  const row = db
    .prepare<[number], { version: number }>(`SELECT version FROM ${TABLES.SCHEMA_VERSIONS} WHERE version = ?`)
    .get(VERSION);

  if (row) {
    return { applied: false, version: VERSION }; // Already applied
  }

  db.transaction(() => up(db))();
  return { applied: true, version: VERSION };
}
