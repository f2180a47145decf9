/**
 * seqtrack list <table> - list the entities of a table
 */

import { Command } from 'commander';
import { withSession } from '../../db';
import type { FlatRecord } from '../../projection';
import { createRepositories, repositoryFor } from '../../repositories';
import { TableName } from '../../types';
import { parseTable } from '../utils/args';
import { formatStatus, isJsonOutput, outputList } from '../utils/output';

/**
 * Table-specific columns shown between the id and the envelope flags
 */
const LIST_COLUMNS: Record<TableName, string[]> = {
  [TableName.PROJECT]: ['name'],
  [TableName.SPECIMEN]: ['name', 'projectId', 'cohort'],
  [TableName.SAMPLE]: ['name', 'specimenId', 'tumour'],
  [TableName.EXPERIMENT]: ['nucleicAcidType', 'sequencingTechnology', 'libraryKit'],
  [TableName.RUN]: ['name', 'instrument', 'date'],
  [TableName.READSET]: ['name', 'sampleId', 'lane', 'state'],
  [TableName.REFERENCE]: ['name', 'assembly', 'version'],
  [TableName.OPERATION_CONFIG]: ['name', 'version', 'md5sum'],
  [TableName.OPERATION]: ['name', 'projectId', 'status'],
  [TableName.JOB]: ['name', 'operationId', 'status'],
  [TableName.METRIC]: ['name', 'value', 'flag'],
  [TableName.FILE]: ['name', 'type', 'md5sum'],
  [TableName.LOCATION]: ['uri', 'endpoint', 'fileId'],
};

function colorize(record: FlatRecord): FlatRecord {
  const result: FlatRecord = { ...record };
  for (const key of ['status', 'state', 'flag']) {
    const value = record[key];
    if (typeof value === 'string') {
      result[key] = formatStatus(value);
    }
  }
  return result;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List the entities of a table')
    .argument('<table>', 'Table name, e.g. readset')
    .option('--include-deleted', 'Include entities flagged deleted', false)
    .action((tableArg: string, options: { includeDeleted: boolean }) => {
      const table = parseTable(tableArg);
      const records = withSession((session) => {
        const repository = repositoryFor(createRepositories(session), table);
        return repository
          .findAll({ includeDeleted: options.includeDeleted })
          .map((entity) => repository.flat(entity.id));
      });

      const columns = ['id', ...LIST_COLUMNS[table], 'deleted', 'modification'];
      outputList(isJsonOutput() ? records : records.map(colorize), columns);
    });
}
