/**
 * Error taxonomy for the tracking database
 *
 * - ConstraintViolation: uniqueness, foreign key, NOT NULL or CHECK failure
 *   reported by the store. Fatal to the enclosing operation.
 * - ValidationError: missing required field or value outside a closed
 *   enumeration, caught before the store is touched. Fatal.
 * - OwnershipConflict: a natural key matched an existing record whose parent
 *   differs from the requested one. Recoverable: it is logged and reported,
 *   never thrown by the resolvers.
 */

import Database from 'better-sqlite3';
import type { ZodError } from 'zod';

export type TrackingErrorCode =
  | 'CONSTRAINT_VIOLATION'
  | 'VALIDATION_ERROR'
  | 'OWNERSHIP_CONFLICT'
  | 'NOT_FOUND'
  | 'SESSION_ERROR';

/**
 * Base class for all tracking errors
 */
export class TrackingError extends Error {
  public readonly code: TrackingErrorCode;

  constructor(message: string, code: TrackingErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrackingError';
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export type ConstraintKind = 'unique' | 'foreign_key' | 'not_null' | 'check' | 'primary_key' | 'other';

const CONSTRAINT_KINDS: Record<string, ConstraintKind> = {
  SQLITE_CONSTRAINT_UNIQUE: 'unique',
  SQLITE_CONSTRAINT_FOREIGNKEY: 'foreign_key',
  SQLITE_CONSTRAINT_NOTNULL: 'not_null',
  SQLITE_CONSTRAINT_CHECK: 'check',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'primary_key',
};

/**
 * A write rejected by a store-level constraint
 */
export class ConstraintViolation extends TrackingError {
  public readonly table: string;
  public readonly kind: ConstraintKind;
  /** Raw SQLite result code, e.g. SQLITE_CONSTRAINT_UNIQUE */
  public readonly sqliteCode: string;

  constructor(table: string, sqliteCode: string, message: string, options?: { cause?: unknown }) {
    super(`Constraint violation on ${table}: ${message}`, 'CONSTRAINT_VIOLATION', options);
    this.name = 'ConstraintViolation';
    this.table = table;
    this.sqliteCode = sqliteCode;
    this.kind = CONSTRAINT_KINDS[sqliteCode] ?? 'other';
  }
}

/**
 * Input rejected before it reached the store
 */
export class ValidationError extends TrackingError {
  /** Entity or input being validated */
  public readonly entity: string;
  public readonly issues: string[];

  constructor(entity: string, issues: string[]) {
    super(`Invalid ${entity}: ${issues.join('; ')}`, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.entity = entity;
    this.issues = issues;
  }

  static fromZod(entity: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return new ValidationError(entity, issues);
  }
}

/**
 * Raised when a lookup by id finds nothing
 */
export class NotFoundError extends TrackingError {
  constructor(table: string, id: number) {
    super(`${table} not found: ${id}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * A session used after close, or opened on a connection another
 * explicit session already holds
 */
export class SessionError extends TrackingError {
  constructor(message: string) {
    super(message, 'SESSION_ERROR');
    this.name = 'SessionError';
  }
}

/**
 * A natural key matched a record owned by a different parent
 *
 * The existing record wins; this value describes the mismatch.
 */
export class OwnershipConflict extends TrackingError {
  public readonly table: string;
  /** Natural key of the matched record (name or uri) */
  public readonly key: string;
  /** Parent relation that differs, e.g. 'project' */
  public readonly relation: string;
  public readonly existingParentId: number;
  public readonly requestedParentId: number;
  public readonly existingId: number;

  constructor(details: {
    table: string;
    key: string;
    relation: string;
    existingId: number;
    existingParentId: number;
    requestedParentId: number;
  }) {
    super(
      `${details.table} ${details.key} already attached to ${details.relation} ${details.existingParentId}, requested ${details.requestedParentId}`,
      'OWNERSHIP_CONFLICT'
    );
    this.name = 'OwnershipConflict';
    this.table = details.table;
    this.key = details.key;
    this.relation = details.relation;
    this.existingId = details.existingId;
    this.existingParentId = details.existingParentId;
    this.requestedParentId = details.requestedParentId;
  }
}

/**
 * Convert a store error raised while writing `table`
 *
 * Constraint failures become ConstraintViolation; anything else is
 * returned unchanged for the caller to rethrow.
 */
export function translateDbError(err: unknown, table: string): unknown {
  if (err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT')) {
    return new ConstraintViolation(table, err.code, err.message, { cause: err });
  }
  return err;
}
