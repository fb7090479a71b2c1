#!/usr/bin/env node
// docgov CLI

import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerCheckCommands } from './commands/check.js';
import { registerRenderCommands } from './commands/render.js';
import { registerLifecycleCommands } from './commands/lifecycle.js';
import { registerNewCommands } from './commands/new.js';
import { registerEditCommands } from './commands/edit.js';
import { registerQueryCommands } from './commands/query.js';
import { configureLogging, type GlobalOptions } from './utils/context.js';

const program = new Command();

program
  .name('docgov')
  .description('Governance records for RFCs, ADRs and work items, with signed Markdown projections')
  .version('0.1.0')
  .option('-C, --dir <path>', 'Project root', process.cwd())
  .option('--store <dir>', 'Store directory, relative to the project root', '.gov')
  .option('-v, --verbose', 'Log debug output to stderr')
  .option('-q, --quiet', 'Only log errors')
  .hook('preAction', (_thisCommand, actionCommand) => {
    configureLogging(actionCommand.optsWithGlobals<GlobalOptions>());
  });

registerInitCommand(program);
registerCheckCommands(program);
registerRenderCommands(program);
registerLifecycleCommands(program);
registerNewCommands(program);
registerEditCommands(program);
registerQueryCommands(program);

program.parse();
