import { type Stats, accessSync, constants, mkdirSync, statSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

/**
 * True if `path` is an existing regular file that this process can read
 */
export function fileCanBeRead(path: string): boolean {
  try {
    if (!statSync(path).isFile()) {
      return false;
    }
    accessSync(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * True if `path` can be written without creating or touching anything:
 * either it is an existing writable file, or its nearest existing ancestor
 * is a writable directory (missing directories are created later).
 */
export function fileCanBeWritten(path: string): boolean {
  const absolute = resolve(path);
  const existing = statOrNull(absolute);

  if (existing) {
    return existing.isFile() && isAccessible(absolute, constants.W_OK);
  }

  let ancestor = dirname(absolute);
  for (;;) {
    const stats = statOrNull(ancestor);
    if (stats) {
      return stats.isDirectory() && isAccessible(ancestor, constants.W_OK | constants.X_OK);
    }
    const next = dirname(ancestor);
    if (next === ancestor) {
      return false;
    }
    ancestor = next;
  }
}

/**
 * Create the parent directories of `path` if they do not exist
 */
export function ensureParentDirectory(path: string): void {
  mkdirSync(dirname(resolve(path)), { recursive: true });
}

/**
 * Replace backslashes with forward slashes
 */
export function fixSlash(path: string): string {
  return path.replace(/\\/g, '/');
}

function statOrNull(path: string): Stats | null {
  try {
    return statSync(path);
  } catch {
    return null;
  }
}

function isAccessible(path: string, mode: number): boolean {
  try {
    accessSync(path, mode);
    return true;
  } catch {
    return false;
  }
}
