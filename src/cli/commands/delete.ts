/**
 * seqtrack delete <table> <id>
 *
 * Hard delete by default: owned children go too, join rows are unlinked.
 * With --soft the entity is only flagged deleted.
 */

import { Command } from 'commander';
import { withSession } from '../../db';
import { NotFoundError } from '../../errors';
import { createRepositories, repositoryFor } from '../../repositories';
import { parseId, parseTable } from '../utils/args';
import { success } from '../utils/output';

export function createDeleteCommand(): Command {
  return new Command('delete')
    .description('Delete an entity and everything it owns')
    .argument('<table>', 'Table name, e.g. project')
    .argument('<id>', 'Entity id')
    .option('--soft', 'Only flag the entity deleted', false)
    .action((tableArg: string, idArg: string, options: { soft: boolean }) => {
      const table = parseTable(tableArg);
      const id = parseId(idArg);

      withSession((session) => {
        const repository = repositoryFor(createRepositories(session), table);
        if (options.soft) {
          repository.markDeleted(id);
        } else if (!repository.delete(id)) {
          throw new NotFoundError(table, id);
        }
      });

      success(options.soft ? `Flagged ${table} ${id} deleted` : `Deleted ${table} ${id}`);
    });
}
