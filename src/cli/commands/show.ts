/**
 * seqtrack show <table> <id> - print the flat record of one entity
 */

import { Command } from 'commander';
import { withSession } from '../../db';
import { createRepositories, repositoryFor } from '../../repositories';
import { parseId, parseTable } from '../utils/args';
import { outputRecord } from '../utils/output';

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show an entity with its relationships')
    .argument('<table>', 'Table name, e.g. readset')
    .argument('<id>', 'Entity id')
    .action((tableArg: string, idArg: string) => {
      const table = parseTable(tableArg);
      const id = parseId(idArg);
      const record = withSession((session) => repositoryFor(createRepositories(session), table).flat(id));
      outputRecord(record);
    });
}
