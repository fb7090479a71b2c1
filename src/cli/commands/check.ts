// Check and validate commands

import type { Command } from 'commander';
import { ARTIFACT_TYPES } from '../../models/types.js';
import { hasErrors } from '../../models/diagnostic.js';
import { createService, parseChoice } from '../utils/context.js';
import { withErrorHandling, printDiagnostics, success, EXIT_FAILURE } from '../utils/error-handler.js';

interface CheckCommandOptions {
  strict?: boolean;
  scanSource?: boolean;
  json?: boolean;
}

export function registerCheckCommands(program: Command): void {
  program
    .command('check')
    .description('Validate lifecycles, resolve references and verify rendered signatures')
    .option('--strict', 'Fail on warnings too')
    .option('--scan-source', 'Scan the configured source roots for mentions')
    .option('--no-scan-source', 'Skip the source scan even when enabled in config')
    .option('--json', 'Print diagnostics as JSON')
    .action(withErrorHandling((options: CheckCommandOptions, command: Command) => {
      const result = createService(command).check({ strict: options.strict, scanSource: options.scanSource });

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        printDiagnostics(result.diagnostics);
        console.log(`\nSummary: ${result.errors} error(s), ${result.warnings} warning(s)`);
        if (result.ok) success('Check passed');
      }

      if (!result.ok) process.exitCode = EXIT_FAILURE;
    }));

  program
    .command('validate')
    .description('Run the lifecycle and structural checks only')
    .argument('[kind]', `Restrict to one kind (${ARTIFACT_TYPES.join(', ')})`)
    .action(withErrorHandling((kind: string | undefined, _options: object, command: Command) => {
      const diagnostics = createService(command).validate(kind ? parseChoice(ARTIFACT_TYPES, kind, 'kind') : undefined);
      printDiagnostics(diagnostics);
      if (hasErrors(diagnostics)) {
        process.exitCode = EXIT_FAILURE;
      } else {
        success(`Validation passed${diagnostics.length > 0 ? ` with ${diagnostics.length} warning(s)` : ''}`);
      }
    }));
}
