// Shared CLI plumbing: global options, logging and the service facade

import * as path from 'path';
import type { Command } from 'commander';
import { Logger, LogLevel, parseLogLevel } from '../../core/logger.js';
import { ValidationError } from '../../core/errors.js';
import { isOneOf } from '../../models/types.js';
import { GovernanceService } from '../../services/governance/governance-service.js';

export type GlobalOptions = {
  dir: string;
  store: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Level from --verbose/--quiet, then DOCGOV_LOG_LEVEL, then the default
 */
export function configureLogging(options: GlobalOptions): void {
  if (options.verbose) {
    Logger.configure({ level: LogLevel.DEBUG });
  } else if (options.quiet) {
    Logger.configure({ level: LogLevel.ERROR });
  } else {
    const fromEnv = process.env.DOCGOV_LOG_LEVEL ? parseLogLevel(process.env.DOCGOV_LOG_LEVEL) : null;
    if (fromEnv !== null) Logger.configure({ level: fromEnv });
  }
}

export function createService(command: Command): GovernanceService {
  const options = command.optsWithGlobals<GlobalOptions>();
  return new GovernanceService({ root: path.resolve(options.dir), storeDir: options.store });
}

/**
 * Narrow a CLI string to one of a closed set of values
 */
export function parseChoice<T extends string>(values: readonly T[], value: string, name: string): T {
  if (!isOneOf(values, value)) {
    throw new ValidationError(`Invalid ${name} "${value}". Expected one of: ${values.join(', ')}`, name);
  }
  return value;
}
