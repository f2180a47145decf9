/**
 * Base Repository
 *
 * Envelope operations shared by every entity table: lookup by id,
 * soft-state flags, metadata maps, external linkage, hard delete and
 * flat projection. Subclasses add their create and get-or-create calls.
 *
 * A repository is bound to a session at construction; without one it
 * uses the process-default session at call time.
 */

import type { Database as Connection } from 'better-sqlite3';
import { getSession } from '../db';
import type { Session } from '../db';
import { eventBus, createEventTimestamp } from '../events';
import type { DataChangeType } from '../events';
import { NotFoundError, OwnershipConflict, translateDbError } from '../errors';
import { createLogger } from '../logging';
import type { Logger } from '../logging';
import { flatten } from '../projection';
import type { FlatRecord } from '../projection';
import type { BaseEntity, EntityByTable, EntityRef, EnvelopeInput, MetadataMap, TableName } from '../types';
import { toBoolColumn, toJsonColumn } from './rows';
import type { EnvelopeRow, SqlValue } from './rows';

export interface FindOptions {
  /** Include rows flagged deleted (excluded by default) */
  includeDeleted?: boolean;
}

/**
 * Get the id of a parent given as entity or id
 */
export function refId(ref: EntityRef): number {
  return typeof ref === 'number' ? ref : ref.id;
}

/**
 * Get current ISO timestamp
 */
export function getCurrentTimestamp(): string {
  return new Date().toISOString();
}

export abstract class BaseRepository<K extends TableName, Row extends EnvelopeRow> {
  protected abstract readonly table: K;
  protected readonly log: Logger;
  private readonly sessionOverride: Session | null;

  constructor(session?: Session) {
    this.sessionOverride = session ?? null;
    this.log = createLogger('repository');
  }

  /**
   * Session this repository writes through
   */
  get session(): Session {
    return this.sessionOverride ?? getSession();
  }

  protected get db(): Connection {
    return this.session.connection;
  }

  protected abstract toEntity(row: Row): EntityByTable[K];

  /**
   * Find an entity by id
   *
   * @returns The entity, or null if absent (or deleted, unless included)
   */
  findById(id: number, options: FindOptions = {}): EntityByTable[K] | null {
    const filter = options.includeDeleted ? '' : ' AND deleted = 0';
    const row = this.db
      .prepare<[number], Row>(`SELECT * FROM ${this.table} WHERE id = ?${filter}`)
      .get(id);
    return row ? this.toEntity(row) : null;
  }

  /**
   * Find an entity by id
   *
   * @throws NotFoundError if absent
   */
  getById(id: number, options: FindOptions = {}): EntityByTable[K] {
    const entity = this.findById(id, options);
    if (!entity) {
      throw new NotFoundError(this.table, id);
    }
    return entity;
  }

  /**
   * All entities ordered by id
   */
  findAll(options: FindOptions = {}): EntityByTable[K][] {
    const filter = options.includeDeleted ? '' : ' WHERE deleted = 0';
    const rows = this.db
      .prepare<[], Row>(`SELECT * FROM ${this.table}${filter} ORDER BY id ASC`)
      .all();

    const result: EntityByTable[K][] = [];
    for (const row of rows) {
      result.push(this.toEntity(row));
    }
    return result;
  }

  count(options: FindOptions = {}): number {
    const filter = options.includeDeleted ? '' : ' WHERE deleted = 0';
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${this.table}${filter}`)
      .get();
    return row?.total ?? 0;
  }

  /**
   * Flag an entity deleted (or restore it). Children are not touched.
   */
  markDeleted(id: number, deleted = true): EntityByTable[K] {
    return this.updateColumns(id, { deleted: toBoolColumn(deleted) });
  }

  /**
   * Flag an entity superseded (or current again). Children are not touched.
   */
  markDeprecated(id: number, deprecated = true): EntityByTable[K] {
    return this.updateColumns(id, { deprecated: toBoolColumn(deprecated) });
  }

  /**
   * Replace the whole metadata map
   */
  replaceMetadata(id: number, metadata: MetadataMap | null): EntityByTable[K] {
    return this.updateColumns(id, { extra_metadata: toJsonColumn(metadata) });
  }

  /**
   * Shallow-merge top-level keys into the metadata map
   */
  mergeMetadata(id: number, patch: MetadataMap): EntityByTable[K] {
    const existing = this.getById(id, { includeDeleted: true });
    const merged = { ...(existing.extraMetadata ?? {}), ...patch };
    return this.updateColumns(id, { extra_metadata: toJsonColumn(merged) });
  }

  /**
   * Link the entity to a record in an external system
   */
  linkExternal(id: number, extId: number | null, extSrc: string | null): EntityByTable[K] {
    return this.updateColumns(id, { ext_id: extId, ext_src: extSrc });
  }

  /**
   * Hard-delete an entity
   *
   * Owned children go with it through the store's cascades; join rows
   * pointing at it are removed, the entities on their other side are not.
   *
   * @returns true if a row was deleted
   */
  delete(id: number): boolean {
    let changes: number;
    try {
      changes = this.db.prepare<[number]>(`DELETE FROM ${this.table} WHERE id = ?`).run(id).changes;
    } catch (err) {
      throw translateDbError(err, this.table);
    }

    if (changes > 0) {
      this.emitChange('deleted', id);
    }
    return changes > 0;
  }

  /**
   * Flat projection of the entity and its relationships
   *
   * @throws NotFoundError if absent
   */
  flat(id: number): FlatRecord {
    return flatten(this.db, this.table, this.getById(id, { includeDeleted: true }));
  }

  // ===========================================================================
  // Helpers for subclasses
  // ===========================================================================

  /**
   * Insert a row built from entity columns plus the envelope
   *
   * @throws ConstraintViolation on uniqueness, foreign key or CHECK failure
   */
  protected insert(columns: Record<string, SqlValue>, envelope: EnvelopeInput): EntityByTable[K] {
    const now = getCurrentTimestamp();
    const values: Record<string, SqlValue> = {
      ...columns,
      deprecated: toBoolColumn(envelope.deprecated),
      deleted: toBoolColumn(envelope.deleted),
      creation: now,
      modification: now,
      extra_metadata: toJsonColumn(envelope.extraMetadata),
      ext_id: envelope.extId ?? null,
      ext_src: envelope.extSrc ?? null,
    };

    const names = Object.keys(values);
    const sql = `INSERT INTO ${this.table} (${names.join(', ')}) VALUES (${names.map((name) => `@${name}`).join(', ')})`;

    let id: number;
    try {
      id = Number(this.db.prepare<[Record<string, SqlValue>]>(sql).run(values).lastInsertRowid);
    } catch (err) {
      throw translateDbError(err, this.table);
    }

    const entity = this.getById(id, { includeDeleted: true });
    this.emitChange('created', id);
    return entity;
  }

  /**
   * Update columns and refresh the modification timestamp
   *
   * @throws NotFoundError if the row does not exist
   * @throws ConstraintViolation on constraint failure
   */
  protected updateColumns(id: number, columns: Record<string, SqlValue>): EntityByTable[K] {
    const values: Record<string, SqlValue> = { ...columns, modification: getCurrentTimestamp() };
    const assignments = Object.keys(values).map((name) => `${name} = @${name}`);
    const sql = `UPDATE ${this.table} SET ${assignments.join(', ')} WHERE id = @id`;

    let changes: number;
    try {
      changes = this.db.prepare<[Record<string, SqlValue>]>(sql).run({ ...values, id }).changes;
    } catch (err) {
      throw translateDbError(err, this.table);
    }
    if (changes === 0) {
      throw new NotFoundError(this.table, id);
    }

    this.emitChange('updated', id);
    return this.getById(id, { includeDeleted: true });
  }

  /**
   * First row matching a natural-key predicate, deleted rows included
   */
  protected findOneWhere(where: string, params: SqlValue[]): EntityByTable[K] | null {
    const row = this.db
      .prepare<SqlValue[], Row>(`SELECT * FROM ${this.table} WHERE ${where} ORDER BY id ASC LIMIT 1`)
      .get(...params);
    return row ? this.toEntity(row) : null;
  }

  /**
   * Compare the parent of a record found by natural key with the requested one
   *
   * A mismatch is logged, emitted and recorded on the session; the caller
   * keeps the existing record.
   *
   * @returns true if the parents matched
   */
  protected checkOwnership(existing: BaseEntity, key: string, relation: string, existingParentId: number, requested: EntityRef): boolean {
    const requestedParentId = refId(requested);
    if (existingParentId === requestedParentId) {
      return true;
    }

    const conflict = new OwnershipConflict({
      table: this.table,
      key,
      relation,
      existingId: existing.id,
      existingParentId,
      requestedParentId,
    });
    this.log.error(conflict.message, { table: this.table, key, relation });
    this.session.recordConflict(conflict);
    eventBus.emit('ownership:conflict', { conflict, timestamp: createEventTimestamp() });
    return false;
  }

  private emitChange(type: DataChangeType, id: number): void {
    eventBus.emit('data', {
      table: this.table,
      type,
      id,
      timestamp: createEventTimestamp(),
    });
  }
}
