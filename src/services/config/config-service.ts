/**
 * Configuration Service
 *
 * Loads and provides access to settings from <store>/config.yaml:
 * output paths, the reference mention pattern, the work item id strategy
 * and the external source scan.
 */

import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigSchema, parseWithSchema, type GovernanceConfig } from '../../core/schemas.js';
import { SchemaError } from '../../core/errors.js';
import { writeFileAtomic, readFileIfExists } from '../storage/atomic-write.js';

export type { GovernanceConfig };

export type WorkIdStrategy = GovernanceConfig['ids']['work'];
export type SourceScanConfig = GovernanceConfig['sourceScan'];

export const CONFIG_FILE = 'config.yaml';

/**
 * Configuration Service
 *
 * Every getter falls back to the documented default when the file or the
 * section is absent. A file that is present but malformed is a SchemaError.
 */
export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: GovernanceConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir || '.gov';
    this.configPath = path.join(this.baseDir, CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, with caching
   */
  load(): GovernanceConfig {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    const content = readFileIfExists(this.configPath);
    let data: unknown = {};
    if (content !== null) {
      try {
        data = yaml.parse(content) ?? {};
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SchemaError(`Malformed YAML in ${this.configPath}: ${reason}`, this.configPath);
      }
    }

    const config = parseWithSchema(ConfigSchema, data, this.configPath);
    compileMentionPattern(config.references.pattern, this.configPath);
    this.cachedConfig = config;
    return config;
  }

  getDocsOutput(): string {
    return this.load().paths.docsOutput;
  }

  getChangelogPath(): string {
    return this.load().paths.changelog;
  }

  getMentionPattern(): RegExp {
    return compileMentionPattern(this.load().references.pattern, this.configPath);
  }

  getWorkIdStrategy(): WorkIdStrategy {
    return this.load().ids.work;
  }

  getSourceScan(): SourceScanConfig {
    return this.load().sourceScan;
  }

  /**
   * Write the configuration back, filling every default explicitly
   */
  save(config: Partial<GovernanceConfig> = {}): GovernanceConfig {
    const merged = parseWithSchema(ConfigSchema, config, this.configPath);
    compileMentionPattern(merged.references.pattern, this.configPath);
    writeFileAtomic(this.configPath, `# docgov configuration\n${yaml.stringify(merged)}`);
    this.cachedConfig = merged;
    return merged;
  }
}

/**
 * Compile the configured mention pattern. It must capture the id in group 1.
 */
export function compileMentionPattern(pattern: string, file?: string): RegExp {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 'g');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaError(`Invalid reference pattern: ${reason}`, file, [`references.pattern: ${reason}`]);
  }
  if (new RegExp(`${pattern}|`).exec('')?.length === 1) {
    throw new SchemaError('Reference pattern must contain a capture group for the id', file, [
      'references.pattern: missing capture group'
    ]);
  }
  return regex;
}
