// Atomic file replacement: write a temporary sibling, then rename over the target

import * as fs from 'fs';
import * as path from 'path';
import { IOError, isErrnoException } from '../../core/errors.js';

let counter = 0;

/**
 * Temporary files start with a dot so directory listings skip them
 */
export function temporaryPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.${++counter}.tmp`);
}

export function writeFileAtomic(filePath: string, content: string): void {
  const tmp = temporaryPathFor(filePath);
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmp, content, 'utf-8');
    fs.renameSync(tmp, filePath);
  } catch (error) {
    fs.rmSync(tmp, { force: true });
    throw new IOError(`Failed to write ${filePath}`, filePath, error);
  }
}

/**
 * Read a text file, or null when it does not exist
 */
export function readFileIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw new IOError(`Failed to read ${filePath}`, filePath, error);
  }
}
