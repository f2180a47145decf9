/**
 * Configuration for the tracking database
 *
 * Resolution priority, highest first:
 * 1. Explicit overrides (CLI flags, test setup)
 * 2. Environment variables (SEQTRACK_DB_PATH, SEQTRACK_LOG_LEVEL, SEQTRACK_WAL)
 * 3. seqtrack.config.json in the working directory
 * 4. Defaults
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ValidationError } from '../errors';

export const CONFIG_FILE_NAME = 'seqtrack.config.json';

/**
 * Default database path, relative to the working directory
 */
export const DEFAULT_DB_PATH = '.seqtrack.db';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface TrackerConfig {
  /** SQLite database file, or ':memory:' */
  dbPath: string;
  /** Minimum level written by loggers */
  logLevel: LogLevel;
  /** Enable write-ahead logging on file databases */
  enableWAL: boolean;
}

const ConfigFileSchema = z
  .object({
    dbPath: z.string().min(1),
    logLevel: z.enum(LOG_LEVELS),
    enableWAL: z.boolean(),
  })
  .partial()
  .strict();

/**
 * Read and validate the optional config file
 *
 * @throws ValidationError when the file exists but is malformed
 */
export function readConfigFile(dir: string = process.cwd()): Partial<TrackerConfig> {
  const path = join(dir, CONFIG_FILE_NAME);
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(CONFIG_FILE_NAME, [`invalid JSON: ${message}`]);
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZod(CONFIG_FILE_NAME, result.error);
  }
  return result.data;
}

/**
 * Read configuration values from the environment
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<TrackerConfig> {
  const config: Partial<TrackerConfig> = {};

  if (env.SEQTRACK_DB_PATH) {
    config.dbPath = env.SEQTRACK_DB_PATH;
  }

  const level = env.SEQTRACK_LOG_LEVEL;
  if (level) {
    const parsed = z.enum(LOG_LEVELS).safeParse(level.toLowerCase());
    if (!parsed.success) {
      throw new ValidationError('SEQTRACK_LOG_LEVEL', [`unknown log level: ${level}`]);
    }
    config.logLevel = parsed.data;
  }

  if (env.SEQTRACK_WAL !== undefined && env.SEQTRACK_WAL !== '') {
    config.enableWAL = !['0', 'false', 'off'].includes(env.SEQTRACK_WAL.toLowerCase());
  }

  return config;
}

export interface LoadConfigOptions {
  overrides?: Partial<TrackerConfig>;
  env?: NodeJS.ProcessEnv;
  /** Directory searched for the config file */
  cwd?: string;
}

/**
 * Resolve the effective configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<TrackerConfig> {
  const defaults: TrackerConfig = {
    dbPath: DEFAULT_DB_PATH,
    logLevel: 'info',
    enableWAL: true,
  };

  const merged: TrackerConfig = {
    ...defaults,
    ...readConfigFile(options.cwd),
    ...readEnvConfig(options.env),
    ...stripUndefined(options.overrides ?? {}),
  };

  return Object.freeze(merged);
}

function stripUndefined(values: Partial<TrackerConfig>): Partial<TrackerConfig> {
  const result: Partial<TrackerConfig> = {};
  if (values.dbPath !== undefined) result.dbPath = values.dbPath;
  if (values.logLevel !== undefined) result.logLevel = values.logLevel;
  if (values.enableWAL !== undefined) result.enableWAL = values.enableWAL;
  return result;
}
