/**
 * seqtrack CLI - command-line interface for the sequencing tracking database
 *
 * Main entry point that sets up Commander.js with global options
 * and initializes the database before any command execution.
 */

import { Command, CommanderError } from 'commander';
import { loadConfig } from '../config';
import { initDb, closeDb } from '../db';
import { setLogLevel } from '../logging';
import { setOutputOptions, error, verbose } from './utils/output';
import { createInitCommand } from './commands/init';
import { createIngestCommand } from './commands/ingest';
import { createShowCommand } from './commands/show';
import { createListCommand } from './commands/list';
import { createDeleteCommand } from './commands/delete';

export const VERSION = '0.1.0';

interface GlobalOptions {
  dbPath?: string;
  json: boolean;
  verbose: boolean;
}

/**
 * Create and configure the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('seqtrack')
    .description('Track sequencing projects, readsets and pipeline operations')
    .version(VERSION)
    .option('--db-path <path>', 'Path to SQLite database (env: SEQTRACK_DB_PATH)')
    .option('--json', 'Output as JSON', false)
    .option('-v, --verbose', 'Verbose output', false);

  // Resolve configuration and open the database before any command
  program.hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<GlobalOptions>();

    setOutputOptions({ json: options.json, verbose: options.verbose });

    const config = loadConfig({ overrides: { dbPath: options.dbPath } });
    setLogLevel(options.verbose ? 'debug' : config.logLevel);

    verbose(`Database path: ${config.dbPath}`);
    verbose(`JSON output: ${options.json}`);

    initDb({ dbPath: config.dbPath, enableWAL: config.enableWAL });
    verbose('Database initialized successfully');
  });

  // Cleanup hook to close database after command execution
  program.hook('postAction', () => {
    closeDb();
    verbose('Database connection closed');
  });

  program.addCommand(createInitCommand());
  program.addCommand(createIngestCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createListCommand());
  program.addCommand(createDeleteCommand());

  return program;
}

/**
 * Commander only copies exitOverride to subcommands made with .command()
 */
function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const sub of command.commands) {
    applyExitOverride(sub);
  }
}

/**
 * Main entry point
 *
 * @returns The process exit code
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const program = createProgram();

  // Enable exit override for better error handling
  applyExitOverride(program);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version output already printed
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return 0;
      }
      // Commander already printed its own usage message
      return err.exitCode || 1;
    }

    error(err instanceof Error ? err.message : String(err));
    return 1;
  } finally {
    closeDb();
  }
}

