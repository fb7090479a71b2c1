// Scans an external source tree for inline mentions. Files are only read.

import * as fs from 'fs';
import * as path from 'path';
import type { MentionMatcher } from './mention-matcher.js';
import { IOError, isErrnoException } from '../../core/errors.js';
import { logger } from '../../core/logger.js';

/**
 * A mention found in a source file
 */
export interface SourceMention {
  /** Path relative to the project root, with forward slashes */
  file: string;
  line: number;
  id: string;
  raw: string;
}

export interface SourceScanOptions {
  /** Project root; roots and reported paths are relative to it */
  baseDir: string;
  roots: string[];
  extensions: string[];
  /** Directory names skipped anywhere in the tree */
  exclude: string[];
}

export class SourceScanner {
  constructor(private readonly matcher: MentionMatcher, private readonly options: SourceScanOptions) {}

  /**
   * Every mention under the configured roots, in path order
   */
  scan(): SourceMention[] {
    const mentions: SourceMention[] = [];
    for (const root of this.options.roots) {
      const rootPath = path.resolve(this.options.baseDir, root);
      if (!fs.existsSync(rootPath)) {
        logger.debug('Source root does not exist, skipping', { root });
        continue;
      }
      for (const filePath of this.getScannableFiles(rootPath)) {
        mentions.push(...this.scanFile(filePath));
      }
    }
    return mentions;
  }

  private getScannableFiles(entryPath: string): string[] {
    const stat = fs.statSync(entryPath);
    if (stat.isFile()) {
      return this.isScannable(entryPath) ? [entryPath] : [];
    }

    const files: string[] = [];
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(entryPath, { withFileTypes: true });
    } catch (error) {
      throw new IOError(`Failed to list ${entryPath}`, entryPath, error);
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = path.join(entryPath, entry.name);
      if (entry.isDirectory()) {
        if (!this.options.exclude.includes(entry.name)) {
          files.push(...this.getScannableFiles(fullPath));
        }
      } else if (entry.isFile() && this.isScannable(fullPath)) {
        files.push(fullPath);
      }
    }
    return files;
  }

  private isScannable(filePath: string): boolean {
    return this.options.extensions.includes(path.extname(filePath).toLowerCase());
  }

  private scanFile(filePath: string): SourceMention[] {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      // Removed between listing and reading
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw new IOError(`Failed to read ${filePath}`, filePath, error);
    }

    const file = path.relative(this.options.baseDir, filePath).split(path.sep).join('/');
    return this.matcher.findAll(content).map(mention => ({
      file,
      line: mention.line,
      id: mention.id,
      raw: mention.raw
    }));
  }
}
