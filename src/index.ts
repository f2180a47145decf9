/**
 * seqtrack - sequencing pipeline tracking database
 *
 * @example
 * ```typescript
 * import { initDb, withSession, createRepositories, TableName } from 'seqtrack';
 *
 * initDb({ dbPath: 'tracking.db' });
 * withSession((session) => {
 *   const repos = createRepositories(session);
 *   const project = repos.projects.fromName({ name: 'PRJ-1' });
 *   const specimen = repos.specimens.fromName({ name: 'SP-1', project });
 * });
 * ```
 */

export * from './types';
export * from './errors';
export * from './events';
export * from './repositories';
export * from './ingest';

export {
  initDb,
  getDb,
  closeDb,
  createTestDb,
  getSchemaVersion,
  getSession,
  closeSession,
  withSession,
  Session,
  SCHEMA_VERSION,
} from './db';
export type { InitDbOptions, SessionOptions } from './db';

export { flatten, dumps, FLAT_SPECS } from './projection';
export type { FlatRecord, FlatValue } from './projection';

export { loadConfig, CONFIG_FILE_NAME, DEFAULT_DB_PATH } from './config';
export type { TrackerConfig, LogLevel } from './config';

export { createLogger, setLogLevel, getLogLevel } from './logging';
export type { Logger } from './logging';

export {
  validateMetric,
  parseInput,
  toIsoTimestamp,
  CreateMetricSchema,
  CreateReadsetSchema,
} from './validation';
