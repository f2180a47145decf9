/**
 * seqtrack ingest - load pipeline reports
 *
 * Usage:
 *   seqtrack ingest run <file>        Sequencing run report
 *   seqtrack ingest operation <file>  Pipeline operation report
 */

import { Command } from 'commander';
import { ingestOperation, ingestRunProcessing } from '../../ingest';
import type { IngestReport } from '../../ingest';
import { readJsonFile } from '../utils/args';
import { formatJson, info, isJsonOutput, success, warn } from '../utils/output';

function report(kind: string, result: IngestReport): void {
  if (isJsonOutput()) {
    console.log(
      formatJson({
        operationId: result.operationId,
        readsetIds: result.readsetIds,
        jobIds: result.jobIds,
        fileIds: result.fileIds,
        conflicts: result.conflicts.map((conflict) => conflict.message),
      })
    );
    return;
  }

  success(`Ingested ${kind} as operation ${result.operationId}`);
  info(`Readsets: ${result.readsetIds.length}  Jobs: ${result.jobIds.length}  Files: ${result.fileIds.length}`);
  for (const conflict of result.conflicts) {
    warn(conflict.message);
  }
}

export function createIngestCommand(): Command {
  const cmd = new Command('ingest').description('Load pipeline reports');

  cmd
    .command('run')
    .description('Load a sequencing run report')
    .argument('<file>', 'JSON report')
    .action((file: string) => {
      report('run processing', ingestRunProcessing(readJsonFile(file)));
    });

  cmd
    .command('operation')
    .description('Load a pipeline operation report')
    .argument('<file>', 'JSON report')
    .action((file: string) => {
      report('operation', ingestOperation(readJsonFile(file)));
    });

  return cmd;
}
