// Lifecycle commands: move, amend, bump, release, delete

import type { Command } from 'commander';
import type { BumpLevel } from '../../models/types.js';
import { createService, parseChoice } from '../utils/context.js';
import { withErrorHandling, reportResult } from '../utils/error-handler.js';

const BUMP_LEVELS: readonly BumpLevel[] = ['major', 'minor', 'patch'];

export function registerLifecycleCommands(program: Command): void {
  program
    .command('move')
    .alias('transition')
    .description('Change the status (or RFC phase) of an artifact')
    .argument('<id>', 'Artifact id')
    .argument('<target>', 'Target status or phase')
    .option('--by <id>', 'Replacement when superseding a clause or ADR')
    .action(withErrorHandling((id: string, target: string, options: { by?: string }, command: Command) => {
      const result = createService(command).transition(id, target, { by: options.by });
      reportResult(result, `${result.id}: ${result.from} -> ${result.to}`);
    }));

  program
    .command('amend')
    .description('Open a normative RFC for content changes')
    .argument('<rfc>', 'RFC id')
    .action(withErrorHandling((rfcId: string, _options: object, command: Command) => {
      reportResult(createService(command).amend(rfcId), `${rfcId.toUpperCase()} is open for amendment`);
    }));

  program
    .command('bump')
    .description('Raise an RFC version and record a changelog entry')
    .argument('<rfc>', 'RFC id')
    .argument('<level>', BUMP_LEVELS.join(' | '))
    .requiredOption('-m, --summary <text>', 'Changelog summary')
    .option('-c, --change <text...>', 'Individual changes')
    .action(withErrorHandling((rfcId: string, level: string, options: { summary: string; change?: string[] }, command: Command) => {
      const result = createService(command).bump(rfcId, parseChoice(BUMP_LEVELS, level, 'level'), options.summary, options.change);
      reportResult(result, `${rfcId.toUpperCase()} is now v${result.version ?? '?'}`);
    }));

  program
    .command('release')
    .description('Record every unreleased done work item under a version')
    .argument('<version>', 'Semantic version')
    .option('-d, --date <date>', 'Release date (YYYY-MM-DD, default: today)')
    .action(withErrorHandling((version: string, options: { date?: string }, command: Command) => {
      reportResult(createService(command).release(version, options.date), `Released ${version}`);
    }));

  program
    .command('delete')
    .description('Delete a clause of a draft RFC or a queued work item')
    .argument('<id>', 'Clause or work item id')
    .action(withErrorHandling((id: string, _options: object, command: Command) => {
      reportResult(createService(command).delete(id), `Deleted ${id.toUpperCase()}`);
    }));
}
