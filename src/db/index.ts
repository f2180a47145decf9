/**
 * Database Connection Manager for the tracking database
 *
 * Provides a singleton connection using better-sqlite3.
 * Handles initialization, migrations, and connection management.
 */

import Database from 'better-sqlite3';
import type { Database as Connection } from 'better-sqlite3';
import { TABLES } from './schema';
import * as migration001 from './migrations/001_initial';
import { Session, runInSession } from './session';
import type { SessionOptions } from './session';
import { createLogger } from '../logging';

const log = createLogger('db');

/**
 * Default database path
 */
const DEFAULT_DB_PATH = '.seqtrack.db';

/**
 * Database singleton instance
 */
let dbInstance: Connection | null = null;

/**
 * Current database path
 */
let currentDbPath: string | null = null;

/**
 * Process-default session, created on first use
 */
let defaultSession: Session | null = null;

/**
 * Options for initializing the database
 */
export interface InitDbOptions {
  /**
   * Path to the SQLite database file
   * Defaults to '.seqtrack.db' in the current directory
   */
  dbPath?: string;

  /**
   * Whether to run migrations automatically
   * Defaults to true
   */
  runMigrations?: boolean;

  /**
   * Whether to enable WAL mode (ignored for in-memory databases)
   * Defaults to true
   */
  enableWAL?: boolean;
}

/**
 * All migrations in order
 */
const MIGRATIONS = [migration001];

/**
 * Run all pending migrations
 */
function runMigrations(db: Connection): { applied: number; versions: number[] } {
  const applied: number[] = [];

  for (const migration of MIGRATIONS) {
    const result = migration.run(db);
    if (result.applied) {
      applied.push(result.version);
    }
  }

  return { applied: applied.length, versions: applied };
}

/**
 * Open a connection with the settings every connection needs
 */
export function openConnection(dbPath: string, enableWAL = true): Connection {
  const db = new Database(dbPath);
  // Cascades and join-row cleanup depend on enforced foreign keys
  db.pragma('foreign_keys = ON');
  if (enableWAL && dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  return db;
}

/**
 * Get the current schema version from the database
 */
export function getSchemaVersion(db: Connection): number {
  const table = db
    .prepare<[string], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`)
    .get(TABLES.SCHEMA_VERSIONS);
  if (!table) {
    return 0;
  }
  const result = db
    .prepare<[], { version: number | null }>(`SELECT MAX(version) as version FROM ${TABLES.SCHEMA_VERSIONS}`)
    .get();
  return result?.version ?? 0;
}

/**
 * Initialize the database connection
 *
 * Creates the database file if it doesn't exist,
 * applies pending migrations, and configures SQLite settings.
 *
 * @returns The initialized database instance
 */
export function initDb(options: InitDbOptions = {}): Connection {
  const {
    dbPath = DEFAULT_DB_PATH,
    runMigrations: shouldRunMigrations = true,
    enableWAL = true,
  } = options;

  // ':memory:' always gets a fresh database
  if (dbInstance && currentDbPath === dbPath && dbPath !== ':memory:') {
    return dbInstance;
  }

  if (dbInstance) {
    closeDb();
  }

  dbInstance = openConnection(dbPath, enableWAL);
  currentDbPath = dbPath;

  if (shouldRunMigrations) {
    const result = runMigrations(dbInstance);
    if (result.applied > 0) {
      log.debug(`Applied ${result.applied} migration(s): ${result.versions.join(', ')}`);
    }
  }

  return dbInstance;
}

/**
 * Get the current database instance
 *
 * @throws Error if database has not been initialized
 */
export function getDb(): Connection {
  if (!dbInstance) {
    throw new Error('Database not initialized. Call initDb() first.');
  }
  return dbInstance;
}

/**
 * Close the database connection
 *
 * The process-default session is torn down first; its uncommitted
 * work is rolled back.
 */
export function closeDb(): void {
  closeSession();
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
    currentDbPath = null;
  }
}

/**
 * Get the current database path
 */
export function getDbPath(): string | null {
  return currentDbPath;
}

/**
 * Create a standalone in-memory database for testing
 * Does not touch the singleton
 */
export function createTestDb(): Connection {
  const db = openConnection(':memory:', false);
  runMigrations(db);
  return db;
}

/**
 * Get the process-default session on the singleton connection
 *
 * Used by every repository that was not given an explicit session.
 */
export function getSession(): Session {
  const db = getDb();
  if (!defaultSession || defaultSession.isClosed || defaultSession.db !== db) {
    defaultSession = new Session(db);
  }
  return defaultSession;
}

/**
 * Tear down the process-default session, rolling back uncommitted work
 */
export function closeSession(): void {
  if (defaultSession) {
    defaultSession.close();
    defaultSession = null;
  }
}

/**
 * Run `fn` in its own session: commit when it returns,
 * roll back and rethrow when it throws
 *
 * If a session (e.g. the process-default one) already has a transaction
 * open on the connection, `fn` runs in a savepoint of that session instead
 * and becomes durable when that session commits.
 *
 * @example
 * ```typescript
 * const readset = withSession((session) => {
 *   const repos = createRepositories(session);
 *   const project = repos.projects.fromName({ name: 'MoH' });
 *   ...
 * });
 * ```
 */
export function withSession<T>(fn: (session: Session) => T, options: SessionOptions = {}): T {
  return runInSession(options.db ?? getDb(), fn);
}

// Re-export schema constants
export { TABLES, SCHEMA_VERSION, LINK_COLUMNS } from './schema';
export { Session } from './session';
export type { SessionOptions } from './session';
