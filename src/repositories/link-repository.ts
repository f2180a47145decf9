/**
 * Link Repository
 *
 * Join rows for the many-to-many edges (readset-file, readset-metric,
 * readset-job, readset-operation, job-file). Links carry no envelope;
 * removing one never touches the entities on either side.
 */

import type { Database as Connection } from 'better-sqlite3';
import { LINK_COLUMNS, getSession } from '../db';
import type { Session } from '../db';
import { eventBus, createEventTimestamp } from '../events';
import { translateDbError } from '../errors';
import type { EntityRef, LinkTable } from '../types';
import { refId } from './base-repository';

/**
 * Side of the edge the given id sits on
 */
export type LinkSide = 'left' | 'right';

export class LinkRepository {
  private readonly sessionOverride: Session | null;

  constructor(session?: Session) {
    this.sessionOverride = session ?? null;
  }

  get session(): Session {
    return this.sessionOverride ?? getSession();
  }

  private get db(): Connection {
    return this.session.connection;
  }

  /**
   * Add a join row. Linking an existing pair is a no-op.
   *
   * @returns true if a row was added
   * @throws ConstraintViolation if either side does not exist
   */
  link(edge: LinkTable, left: EntityRef, right: EntityRef): boolean {
    const columns = LINK_COLUMNS[edge];
    const leftId = refId(left);
    const rightId = refId(right);

    let changes: number;
    try {
      changes = this.db
        .prepare<[number, number]>(
          `INSERT OR IGNORE INTO ${edge} (${columns.left.column}, ${columns.right.column}) VALUES (?, ?)`
        )
        .run(leftId, rightId).changes;
    } catch (err) {
      throw translateDbError(err, edge);
    }

    if (changes > 0) {
      eventBus.emit('link', { link: edge, type: 'linked', leftId, rightId, timestamp: createEventTimestamp() });
    }
    return changes > 0;
  }

  /**
   * Remove a join row
   *
   * @returns true if a row was removed
   */
  unlink(edge: LinkTable, left: EntityRef, right: EntityRef): boolean {
    const columns = LINK_COLUMNS[edge];
    const leftId = refId(left);
    const rightId = refId(right);

    const changes = this.db
      .prepare<[number, number]>(`DELETE FROM ${edge} WHERE ${columns.left.column} = ? AND ${columns.right.column} = ?`)
      .run(leftId, rightId).changes;

    if (changes > 0) {
      eventBus.emit('link', { link: edge, type: 'unlinked', leftId, rightId, timestamp: createEventTimestamp() });
    }
    return changes > 0;
  }

  /**
   * Ids on the other side of the edge from `id`, ascending
   */
  linkedIds(edge: LinkTable, side: LinkSide, id: number): number[] {
    const columns = LINK_COLUMNS[edge];
    const own = side === 'left' ? columns.left.column : columns.right.column;
    const other = side === 'left' ? columns.right.column : columns.left.column;

    return this.db
      .prepare<[number], { linked: number }>(`SELECT ${other} AS linked FROM ${edge} WHERE ${own} = ? ORDER BY ${other} ASC`)
      .all(id)
      .map((row) => row.linked);
  }

  isLinked(edge: LinkTable, left: EntityRef, right: EntityRef): boolean {
    const columns = LINK_COLUMNS[edge];
    const row = this.db
      .prepare<[number, number], { found: number }>(
        `SELECT 1 AS found FROM ${edge} WHERE ${columns.left.column} = ? AND ${columns.right.column} = ?`
      )
      .get(refId(left), refId(right));
    return row !== undefined;
  }
}

export const linkRepository = new LinkRepository();
