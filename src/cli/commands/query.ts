// Read-only commands: list, status, get

import type { Command } from 'commander';
import { ARTIFACT_TYPES } from '../../models/types.js';
import type { StatusCount } from '../../services/query/query-service.js';
import { createService, parseChoice } from '../utils/context.js';
import { withErrorHandling, info } from '../utils/error-handler.js';

interface ListCommandOptions {
  status?: string;
  limit?: string;
  json?: boolean;
}

function printCounts<T extends string>(title: string, counts: StatusCount<T>[]): void {
  const total = counts.reduce((sum, { count }) => sum + count, 0);
  console.log(`\n${title}`);
  for (const { status, count } of counts) {
    if (count > 0) console.log(`  ${status.padEnd(12)} ${count}`);
  }
  console.log(`  ${'Total'.padEnd(12)} ${total}`);
}

export function registerQueryCommands(program: Command): void {
  program
    .command('list')
    .description('List records of one kind')
    .argument('[kind]', ARTIFACT_TYPES.join(' | '), 'rfc')
    .option('-s, --status <status>', 'Only records in this status')
    .option('-n, --limit <count>', 'At most this many rows')
    .option('--json', 'Print the rows as JSON')
    .action(withErrorHandling((kind: string, options: ListCommandOptions, command: Command) => {
      const entries = createService(command).list(parseChoice(ARTIFACT_TYPES, kind, 'kind'), {
        status: options.status,
        limit: options.limit === undefined ? undefined : Number(options.limit)
      });

      if (options.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }
      if (entries.length === 0) {
        info(`No ${kind} records`);
        return;
      }
      for (const entry of entries) {
        const extra = entry.phase ? `\t${entry.phase}\tv${entry.version ?? ''}` : '';
        console.log(`${entry.id}\t${entry.status}${extra}\t${entry.title}`);
      }
    }));

  program
    .command('status')
    .description('Count records by status')
    .action(withErrorHandling((_options: object, command: Command) => {
      const summary = createService(command).status();
      printCounts('RFCs', summary.rfc);
      console.log(`  phases ${summary.phases.map(({ status, count }) => `${status}:${count}`).join(' ')}`);
      printCounts('Clauses', summary.clause);
      printCounts('ADRs', summary.adr);
      printCounts('Work items', summary.work);
    }));

  program
    .command('get')
    .description('Print a record as YAML, or one of its fields')
    .argument('<id>', 'Artifact id')
    .argument('[field]', 'Field name')
    .action(withErrorHandling((id: string, field: string | undefined, _options: object, command: Command) => {
      const output = createService(command).get(id, field);
      process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
    }));
}
