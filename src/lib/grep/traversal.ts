import * as fsp from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';

import { isBinaryFile, pruneIgnoredDirectories } from './exclusion.js';
import type { ScanContext, TraversalSignal } from './scan-context.js';

export interface TraversalOptions {
  recursive: boolean;
  context: ScanContext;
  visitFile: (filePath: string) => Promise<TraversalSignal>;
}

interface PartitionedEntries {
  files: string[];
  directories: string[];
}

/** Orders strings by Unicode code point rather than UTF-16 code unit. */
export function compareCodePoints(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index++) {
    const left = a.codePointAt(index) ?? 0;
    const right = b.codePointAt(index) ?? 0;
    if (left !== right) return Math.sign(left - right);
    if (left > 0xffff) index++;
  }
  return Math.sign(a.length - b.length);
}

function compareNames(a: Dirent, b: Dirent): number {
  return compareCodePoints(a.name, b.name);
}

async function readDirectoryEntries(
  directory: string,
  isRoot: boolean,
  context: ScanContext
): Promise<Dirent[] | undefined> {
  try {
    const entries = await fsp.readdir(directory, { withFileTypes: true });
    return entries.sort(compareNames);
  } catch (error: unknown) {
    // The search root failing to list is the request's failure, not a skip.
    if (isRoot) throw error;
    context.summary.skippedInaccessible++;
    return undefined;
  }
}

function partitionEntries(
  entries: readonly Dirent[],
  context: ScanContext
): PartitionedEntries {
  const files: string[] = [];
  const directories: string[] = [];

  for (const entry of entries) {
    if (entry.isSymbolicLink()) {
      context.summary.symlinksNotFollowed++;
    } else if (entry.isFile()) {
      files.push(entry.name);
    } else if (entry.isDirectory()) {
      directories.push(entry.name);
    }
  }

  return { files, directories };
}

async function visitCandidate(
  filePath: string,
  options: TraversalOptions
): Promise<TraversalSignal> {
  const { context } = options;
  if (isBinaryFile(filePath)) {
    context.summary.skippedBinary++;
    return 'continue';
  }
  if (context.isFull) return context.halt();
  return options.visitFile(filePath);
}

async function visitFiles(
  directory: string,
  files: readonly string[],
  options: TraversalOptions
): Promise<TraversalSignal> {
  for (const name of files) {
    const signal = await visitCandidate(path.join(directory, name), options);
    if (signal === 'halt') return 'halt';
  }
  return 'continue';
}

async function walk(
  directory: string,
  isRoot: boolean,
  options: TraversalOptions
): Promise<TraversalSignal> {
  const { context } = options;
  const entries = await readDirectoryEntries(directory, isRoot, context);
  if (!entries) return 'continue';

  const { files, directories } = partitionEntries(entries, context);
  if ((await visitFiles(directory, files, options)) === 'halt') return 'halt';
  if (!options.recursive) return 'continue';

  const descendable = pruneIgnoredDirectories(directories, () => {
    context.summary.directoriesPruned++;
  });
  for (const name of descendable) {
    if (context.isFull) return context.halt();
    const signal = await walk(path.join(directory, name), false, options);
    if (signal === 'halt') return 'halt';
  }
  return 'continue';
}

export function walkSingleFile(
  filePath: string,
  options: TraversalOptions
): Promise<TraversalSignal> {
  return visitCandidate(filePath, options);
}

/**
 * Visits files of `root` in name order, files before subdirectories.
 * Ignored directories are dropped from the frontier before any of them is
 * listed; symbolic links are never followed.
 */
export function walkDirectory(
  root: string,
  options: TraversalOptions
): Promise<TraversalSignal> {
  return walk(root, true, options);
}
