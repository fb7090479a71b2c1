// Render, sign and refs commands

import type { Command } from 'commander';
import { createService } from '../utils/context.js';
import { withErrorHandling, printDiagnostics, success, info, EXIT_FAILURE } from '../utils/error-handler.js';

export function registerRenderCommands(program: Command): void {
  program
    .command('render')
    .description('Render projections and the changelog, or print one projection')
    .argument('[id]', 'Print the projection of one RFC, ADR or work item')
    .option('-f, --force', 'Regenerate released changelog sections too')
    .action(withErrorHandling((id: string | undefined, options: { force?: boolean }, command: Command) => {
      const service = createService(command);
      if (id) {
        process.stdout.write(service.render(id));
        return;
      }

      const result = service.renderAll({ force: options.force });
      for (const file of result.written) {
        console.log(`  wrote ${file}`);
      }
      for (const file of result.removed) {
        console.log(`  removed ${file}`);
      }
      if (result.written.length === 0 && result.removed.length === 0) {
        info('Everything is up to date');
      } else {
        success(`Rendered ${result.written.length} file(s), ${result.unchanged.length} unchanged`);
      }
    }));

  program
    .command('sign')
    .description('Print the canonical signature of an RFC, ADR or work item')
    .argument('<id>', 'Artifact id')
    .action(withErrorHandling((id: string, _options: object, command: Command) => {
      console.log(`sha256:${createService(command).sign(id)}`);
    }));

  program
    .command('refs')
    .description('Resolve everything an artifact references')
    .argument('<id>', 'Artifact id')
    .action(withErrorHandling((id: string, _options: object, command: Command) => {
      const result = createService(command).resolveRefs(id);
      if (Array.isArray(result)) {
        printDiagnostics(result);
        process.exitCode = EXIT_FAILURE;
        return;
      }

      if (result.resolved.length === 0) {
        info('No references');
        return;
      }
      for (const ref of result.resolved) {
        const where = ref.field ? ` (${ref.field})` : '';
        console.log(`  ${ref.targetId} - ${ref.target.title}${where}`);
      }
    }));
}
