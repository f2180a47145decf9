/**
 * Schema and migration tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initDb, closeDb, createTestDb, getDb, getSchemaVersion, SCHEMA_VERSION, TABLES } from '../index';
import * as migration001 from '../migrations/001_initial';
import { ConstraintViolation, translateDbError } from '../../errors';
import { setLogLevel } from '../../logging';
import { repositories } from '../../repositories';
import { seedHierarchy } from '../../repositories/__tests__/helpers';
import { LinkTable, TableName } from '../../types';

function tableNames(): string[] {
  return getDb()
    .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name`)
    .all()
    .map((row) => row.name);
}

describe('schema', () => {
  beforeEach(() => {
    setLogLevel('silent');
    initDb({ dbPath: ':memory:' });
  });

  afterEach(() => {
    closeDb();
  });

  it('should create every entity and join table', () => {
    const names = tableNames();

    for (const table of [...Object.values(TableName), ...Object.values(LinkTable)]) {
      expect(names).toContain(table);
    }
  });

  it('should record the schema version once', () => {
    expect(getSchemaVersion(getDb())).toBe(SCHEMA_VERSION);
    expect(migration001.run(getDb())).toEqual({ applied: false, version: 1 });

    const rows = getDb().prepare<[], { version: number }>(`SELECT version FROM ${TABLES.SCHEMA_VERSIONS}`).all();
    expect(rows).toEqual([{ version: 1 }]);
  });

  it('should enforce foreign keys', () => {
    const row = getDb().prepare<[], { foreign_keys: number }>('PRAGMA foreign_keys').get();
    expect(row?.foreign_keys).toBe(1);
  });

  it('should reject an enum value outside its vocabulary', () => {
    const now = new Date().toISOString();
    let caught: unknown;
    try {
      getDb()
        .prepare(`INSERT INTO ${TABLES.EXPERIMENT} (creation, modification, nucleic_acid_type) VALUES (?, ?, ?)`)
        .run(now, now, 'PROTEIN');
    } catch (err) {
      caught = translateDbError(err, TABLES.EXPERIMENT);
    }

    expect(caught).toBeInstanceOf(ConstraintViolation);
    if (caught instanceof ConstraintViolation) {
      expect(caught.kind).toBe('check');
      expect(caught.sqliteCode).toBe('SQLITE_CONSTRAINT_CHECK');
    }
  });

  it('should reject a duplicate natural key', () => {
    repositories.projects.create({ name: 'PRJ-A' });

    expect(() => repositories.projects.create({ name: 'PRJ-A' })).toThrow(ConstraintViolation);
  });

  it('should reject a second readset with the same name', () => {
    const { sample, experiment, run } = seedHierarchy(repositories);

    let caught: unknown;
    try {
      repositories.readsets.create({ name: 'RS-1', sample, experiment, run });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConstraintViolation);
    if (caught instanceof ConstraintViolation) {
      expect(caught.kind).toBe('unique');
      expect(caught.table).toBe('readset');
    }
    expect(repositories.readsets.count()).toBe(1);
  });

  it('should reject a missing parent', () => {
    let caught: unknown;
    try {
      repositories.specimens.create({ name: 'SP-1', project: 404 });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConstraintViolation);
    if (caught instanceof ConstraintViolation) {
      expect(caught.kind).toBe('foreign_key');
      expect(caught.table).toBe('specimen');
    }
  });

  it('should drop everything on down()', () => {
    const db = createTestDb();
    migration001.down(db);

    const remaining = db
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' AND name != 'sqlite_sequence'`)
      .all()
      .map((row) => row.name);
    expect(remaining).toEqual([TABLES.SCHEMA_VERSIONS]);
    expect(getSchemaVersion(db)).toBe(0);
    db.close();
  });
});
