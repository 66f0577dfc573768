import * as path from 'node:path';

import { BINARY_EXTENSIONS, IGNORED_DIRECTORY_NAMES } from '../constants.js';

export function isIgnoredDirectory(name: string): boolean {
  return IGNORED_DIRECTORY_NAMES.has(name);
}

/** Extension-only check; the file is never opened. */
export function isBinaryFile(fileName: string): boolean {
  const extension = path.extname(fileName).toLowerCase();
  return extension.length > 0 && BINARY_EXTENSIONS.has(extension);
}

export function pruneIgnoredDirectories(
  names: readonly string[],
  onPruned: (name: string) => void
): string[] {
  const kept: string[] = [];
  for (const name of names) {
    if (isIgnoredDirectory(name)) {
      onPruned(name);
      continue;
    }
    kept.push(name);
  }
  return kept;
}
