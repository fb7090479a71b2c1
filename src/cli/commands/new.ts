// Allocation commands

import type { Command } from 'commander';
import { CLAUSE_KINDS } from '../../models/types.js';
import { createService, parseChoice } from '../utils/context.js';
import { withErrorHandling, reportResult, success } from '../utils/error-handler.js';

interface NewClauseOptions {
  title?: string;
  text?: string;
  kind?: string;
  section?: string;
  since?: string;
}

interface NewAdrOptions {
  ref?: string[];
  context?: string;
  decision?: string;
  consequences?: string;
}

interface NewWorkOptions {
  description?: string;
  ref?: string[];
  criterion?: string[];
  active?: boolean;
}

export function registerNewCommands(program: Command): void {
  const create = program
    .command('new')
    .description('Create governance records');

  create
    .command('rfc')
    .description('Create a draft RFC')
    .argument('<title>', 'RFC title')
    .option('-o, --owner <owner...>', 'Owners')
    .option('-s, --section <title...>', 'Initial section titles')
    .option('--initial-version <version>', 'Initial version', '0.1.0')
    .action(withErrorHandling((title: string, options: { owner?: string[]; section?: string[]; initialVersion: string }, command: Command) => {
      const rfc = createService(command).newRfc({
        title,
        owners: options.owner,
        sections: options.section,
        version: options.initialVersion
      });
      success(`Created ${rfc.id}: ${rfc.title}`);
    }));

  create
    .command('clause')
    .description('Add a clause to an RFC')
    .argument('<rfc>', 'RFC id')
    .argument('<name>', 'Clause name, e.g. "Error handling" for C-ERROR-HANDLING')
    .option('-t, --title <title>', 'Clause title (default: the name)')
    .option('--text <text>', 'Clause text')
    .option('-k, --kind <kind>', CLAUSE_KINDS.join(' | '))
    .option('-s, --section <title>', 'Section to list the clause in')
    .option('--since <version>', 'Version that introduces the clause')
    .action(withErrorHandling((rfcId: string, name: string, options: NewClauseOptions, command: Command) => {
      const result = createService(command).newClause(rfcId, {
        name,
        title: options.title,
        text: options.text,
        kind: options.kind ? parseChoice(CLAUSE_KINDS, options.kind, 'kind') : undefined,
        section: options.section,
        since: options.since
      });
      reportResult(result, `Created ${rfcId.toUpperCase()}:${result.record?.id ?? name}`);
    }));

  create
    .command('adr')
    .description('Create a proposed ADR')
    .argument('<title>', 'ADR title')
    .option('-r, --ref <id...>', 'Referenced artifacts')
    .option('--context <text>', 'Context')
    .option('--decision <text>', 'Decision')
    .option('--consequences <text>', 'Consequences')
    .action(withErrorHandling((title: string, options: NewAdrOptions, command: Command) => {
      const adr = createService(command).newAdr({
        title,
        refs: options.ref,
        context: options.context,
        decision: options.decision,
        consequences: options.consequences
      });
      success(`Created ${adr.id}: ${adr.title}`);
    }));

  create
    .command('work')
    .description('Create a work item')
    .argument('<title>', 'Work item title')
    .option('--description <text>', 'Description')
    .option('-r, --ref <id...>', 'Referenced artifacts')
    .option('-a, --criterion <text...>', 'Acceptance criteria, optionally prefixed with a category ("fix: ...")')
    .option('--active', 'Start the item immediately')
    .action(withErrorHandling((title: string, options: NewWorkOptions, command: Command) => {
      const item = createService(command).newWorkItem({
        title,
        description: options.description,
        refs: options.ref,
        criteria: options.criterion,
        active: options.active
      });
      success(`Created ${item.id}: ${item.title} (${item.status})`);
    }));
}
