// Field edit commands: set, add, remove, tick

import type { Command } from 'commander';
import { CHANGELOG_CATEGORIES, CRITERION_STATUSES } from '../../models/types.js';
import type { MatchMode, MatchOptions } from '../../services/edit/edit-service.js';
import { createService, parseChoice } from '../utils/context.js';
import { withErrorHandling, reportResult } from '../utils/error-handler.js';

const MATCH_MODES: readonly MatchMode[] = ['exact', 'substring', 'index', 'regex'];

interface MatchCommandOptions {
  match: string;
  all?: boolean;
}

function matchOptions(options: MatchCommandOptions): MatchOptions {
  return { mode: parseChoice(MATCH_MODES, options.match, 'match'), all: options.all };
}

function addMatchOptions(command: Command): Command {
  return command
    .option('-m, --match <mode>', MATCH_MODES.join(' | '), 'substring')
    .option('--all', 'Act on every matching entry');
}

export function registerEditCommands(program: Command): void {
  program
    .command('set')
    .description('Replace a single-valued field')
    .argument('<id>', 'Artifact id')
    .argument('<field>', 'Field name')
    .argument('<value>', 'New value ("" clears supersededBy)')
    .action(withErrorHandling((id: string, field: string, value: string, _options: object, command: Command) => {
      reportResult(createService(command).set(id, field, value), `${id.toUpperCase()}: ${field} updated`);
    }));

  program
    .command('add')
    .description('Append to a list field')
    .argument('<id>', 'Artifact id')
    .argument('<field>', 'Field name')
    .argument('<value>', 'Value to append')
    .option('-c, --category <category>', `Criterion category (${CHANGELOG_CATEGORIES.join(', ')})`)
    .action(withErrorHandling((id: string, field: string, value: string, options: { category?: string }, command: Command) => {
      const category = options.category ? parseChoice(CHANGELOG_CATEGORIES, options.category, 'category') : undefined;
      reportResult(createService(command).add(id, field, value, { category }), `${id.toUpperCase()}: added to ${field}`);
    }));

  addMatchOptions(
    program
      .command('remove')
      .description('Remove matching entries from a list field')
      .argument('<id>', 'Artifact id')
      .argument('<field>', 'Field name')
      .argument('<pattern>', 'Text, index or regex to match')
  ).action(withErrorHandling((id: string, field: string, pattern: string, options: MatchCommandOptions, command: Command) => {
    reportResult(createService(command).remove(id, field, pattern, matchOptions(options)), `${id.toUpperCase()}: removed from ${field}`);
  }));

  addMatchOptions(
    program
      .command('tick')
      .description('Set the status of matching acceptance criteria')
      .argument('<id>', 'Work item id')
      .argument('<pattern>', 'Text, index or regex to match')
      .option('-s, --status <status>', CRITERION_STATUSES.join(' | '), 'done')
      .option('--field <field>', 'Checklist field', 'acceptanceCriteria')
  ).action(withErrorHandling((id: string, pattern: string, options: MatchCommandOptions & { status: string; field: string }, command: Command) => {
    const status = parseChoice(CRITERION_STATUSES, options.status, 'status');
    reportResult(
      createService(command).tick(id, options.field, pattern, status, matchOptions(options)),
      `${id.toUpperCase()}: marked ${status}`
    );
  }));
}
