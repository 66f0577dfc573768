import * as fsp from 'node:fs/promises';

import type { SkipReason } from '../../config/types.js';
import { isNodeError } from '../errors.js';
import { isDecodeError, iterateLines } from './line-iterator.js';
import type { MatchRecord, ScanContext } from './scan-context.js';

export type FileScanOutcome =
  | { kind: 'scanned'; matched: number; halted: boolean }
  | { kind: 'skipped'; reason: SkipReason };

const ACCESS_DENIED_CODES: ReadonlySet<string> = new Set(['EACCES', 'EPERM']);

/**
 * Per-file failures that skip the file. Anything else is not an I/O
 * problem and propagates to the request.
 */
export function classifyFileError(error: unknown): SkipReason | undefined {
  if (isDecodeError(error)) return 'not-text';
  if (!isNodeError(error)) return undefined;
  if (error.code && ACCESS_DENIED_CODES.has(error.code)) return 'access-denied';
  return 'io-error';
}

async function collectMatches(
  filePath: string,
  regex: RegExp,
  context: ScanContext
): Promise<{ records: MatchRecord[]; halted: boolean }> {
  const file = context.displayPathFor(filePath);
  const budget = context.remaining;
  const records: MatchRecord[] = [];

  const handle = await fsp.open(filePath, 'r');
  try {
    const stream = handle.createReadStream({ autoClose: false });
    let lineNumber = 0;
    for await (const line of iterateLines(stream)) {
      lineNumber++;
      if (!regex.test(line)) continue;
      if (records.length >= budget) {
        return { records, halted: true };
      }
      records.push({ file, lineNumber, lineContent: line.trim() });
    }
    return { records, halted: false };
  } finally {
    await handle.close();
  }
}

/**
 * Scans one file line by line. Matches are committed only once the file
 * has been read without error; a skipped file contributes nothing.
 */
export async function scanFile(
  filePath: string,
  regex: RegExp,
  context: ScanContext
): Promise<FileScanOutcome> {
  context.summary.filesScanned++;

  let scanned: { records: MatchRecord[]; halted: boolean };
  try {
    scanned = await collectMatches(filePath, regex, context);
  } catch (error: unknown) {
    const reason = classifyFileError(error);
    if (reason === undefined) throw error;
    context.summary.skippedInaccessible++;
    return { kind: 'skipped', reason };
  }

  context.commit(scanned.records);
  if (scanned.halted) context.halt();
  return {
    kind: 'scanned',
    matched: scanned.records.length,
    halted: scanned.halted,
  };
}
