/**
 * Session - a logical transaction scope over one connection
 *
 * The first statement issued through a session opens a deferred
 * transaction, so reads take no write lock;
 * everything written afterwards is visible to later lookups in the same
 * session and becomes durable only on commit(). This is what lets a batch
 * of get-or-create calls run as one unit of work.
 */

import type { Database as Connection } from 'better-sqlite3';
import { SessionError } from '../errors';
import type { OwnershipConflict } from '../errors';

/**
 * Session currently holding each connection's transaction
 */
const owners = new WeakMap<Connection, Session>();

export interface SessionOptions {
  /** Connection to run on; defaults to the process connection */
  db?: Connection;
}

export class Session {
  readonly db: Connection;
  private active = false;
  private closed = false;
  private depth = 0;
  private readonly recorded: OwnershipConflict[] = [];

  constructor(db: Connection) {
    this.db = db;
  }

  /**
   * Connection with this session's transaction open
   *
   * @throws SessionError if the session is closed or another session owns the connection
   */
  get connection(): Connection {
    if (this.closed) {
      throw new SessionError('Session is closed');
    }
    if (!this.active) {
      this.begin();
    }
    return this.db;
  }

  /**
   * Whether this session has uncommitted work pending
   */
  get inTransaction(): boolean {
    return this.active;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Ownership conflicts tolerated by get-or-create calls in this session
   */
  get conflicts(): readonly OwnershipConflict[] {
    return this.recorded;
  }

  recordConflict(conflict: OwnershipConflict): void {
    this.recorded.push(conflict);
  }

  private begin(): void {
    const owner = owners.get(this.db);
    if ((owner && owner !== this) || this.db.inTransaction) {
      throw new SessionError('Connection already has an active session');
    }
    this.db.exec('BEGIN');
    owners.set(this.db, this);
    this.active = true;
  }

  private release(): void {
    this.active = false;
    if (owners.get(this.db) === this) {
      owners.delete(this.db);
    }
  }

  /**
   * Run `fn` inside a savepoint of this session's transaction
   *
   * A throw rolls back to the savepoint and rethrows; the rest of the
   * session's work is kept. Nothing becomes durable before commit().
   */
  savepoint<T>(fn: (session: Session) => T): T {
    const name = `seqtrack_sp_${this.depth + 1}`;
    this.connection.exec(`SAVEPOINT ${name}`);
    this.depth++;
    try {
      const result = fn(this);
      // fn may have committed or rolled back the whole session
      if (this.active) {
        this.db.exec(`RELEASE ${name}`);
      }
      return result;
    } catch (err) {
      if (this.active) {
        this.db.exec(`ROLLBACK TO ${name}`);
        this.db.exec(`RELEASE ${name}`);
      }
      throw err;
    } finally {
      this.depth--;
    }
  }

  /**
   * Make pending writes durable. A no-op when nothing was issued.
   */
  commit(): void {
    if (!this.active) {
      return;
    }
    this.db.exec('COMMIT');
    this.release();
  }

  /**
   * Discard pending writes. A no-op when nothing was issued.
   */
  rollback(): void {
    if (!this.active) {
      return;
    }
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
    this.release();
  }

  /**
   * Roll back anything uncommitted and refuse further use
   */
  close(): void {
    if (this.db.open) {
      this.rollback();
    } else {
      this.release();
    }
    this.closed = true;
  }
}

/**
 * Session whose transaction is open on `db`, if any
 */
export function activeSession(db: Connection): Session | null {
  const owner = owners.get(db);
  return owner && owner.inTransaction ? owner : null;
}

/**
 * Run `fn` in a fresh session on `db`: commit on success,
 * roll back and rethrow on failure
 *
 * When another session already holds the connection, `fn` joins it
 * inside a savepoint and committing is left to that session.
 */
export function runInSession<T>(db: Connection, fn: (session: Session) => T): T {
  const owner = activeSession(db);
  if (owner) {
    return owner.savepoint(fn);
  }

  const session = new Session(db);
  try {
    const result = fn(session);
    session.commit();
    return result;
  } catch (err) {
    session.rollback();
    throw err;
  } finally {
    session.close();
  }
}
