// Init command

import type { Command } from 'commander';
import { createService } from '../utils/context.js';
import { withErrorHandling, success, info } from '../utils/error-handler.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create the governance store and a default config.yaml')
    .action(withErrorHandling((_options: object, command: Command) => {
      const service = createService(command);
      if (service.init()) {
        success(`Initialized governance store at ${service.getStore().getBaseDir()}`);
      } else {
        info(`Governance store already exists at ${service.getStore().getBaseDir()}`);
      }
    }));
}
