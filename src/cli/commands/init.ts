/**
 * seqtrack init
 *
 * Creates the tracking database at the configured path and applies the
 * schema. The global hook has already opened (and migrated) it, so this
 * only reports where it lives. Safe to run repeatedly.
 *
 * Usage:
 *   seqtrack init
 *   seqtrack --db-path /data/tracking.db init
 */

import { Command } from 'commander';
import { getDb, getDbPath, getSchemaVersion } from '../../db';
import { info, isJsonOutput, formatJson, success } from '../utils/output';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Initialize the tracking database')
    .action(() => {
      const dbPath = getDbPath();
      const version = getSchemaVersion(getDb());

      if (isJsonOutput()) {
        console.log(formatJson({ dbPath, schemaVersion: version }));
        return;
      }
      success(`Tracking database ready at ${dbPath}`);
      info(`Schema version: ${version}`);
    });
}
