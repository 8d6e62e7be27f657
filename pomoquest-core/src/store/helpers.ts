/**
 * Shared JSON file helpers for the progress store.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Writes JSON atomically: the content goes to `<file>.tmp` first and is
 * then renamed over the target, so readers never see a truncated file.
 * Creates the parent directory if it doesn't exist.
 */
export function writeJsonAtomic(filePath: string, value: unknown): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const tmpPath = filePath + '.tmp';
  fs.writeFileSync(tmpPath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
  fs.renameSync(tmpPath, filePath);
}

/** Reads a text file, returning null when it doesn't exist. */
export function readTextIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
