import * as path from 'node:path';

import type { ScanSummary } from '../../config/types.js';
import { isPathWithinRoot } from '../sandbox/session-root.js';

export interface MatchRecord {
  readonly file: string;
  readonly lineNumber: number;
  readonly lineContent: string;
}

export type TraversalSignal = 'continue' | 'halt';

/**
 * Mutable state of one search request: the ordered match list, the cap
 * and the counters reported in the scan summary. Never shared between
 * requests.
 */
export class ScanContext {
  readonly matches: MatchRecord[] = [];
  readonly summary: ScanSummary = {
    filesScanned: 0,
    filesMatched: 0,
    skippedBinary: 0,
    skippedInaccessible: 0,
    directoriesPruned: 0,
    symlinksNotFollowed: 0,
    capped: false,
  };

  private divergenceReported = false;

  constructor(
    readonly maxMatches: number,
    readonly sessionRoot: string
  ) {}

  get remaining(): number {
    return Math.max(0, this.maxMatches - this.matches.length);
  }

  get isFull(): boolean {
    return this.remaining === 0;
  }

  /** Called when work is abandoned because the cap is full. */
  halt(): TraversalSignal {
    this.summary.capped = true;
    return 'halt';
  }

  commit(records: readonly MatchRecord[]): void {
    if (records.length === 0) return;
    this.matches.push(...records);
    this.summary.filesMatched++;
  }

  displayPathFor(filePath: string): string {
    if (isPathWithinRoot(filePath, this.sessionRoot)) {
      return path.relative(this.sessionRoot, filePath);
    }

    if (!this.divergenceReported) {
      this.divergenceReported = true;
      console.error(
        `[WARNING] Scanned file lies outside the session root; reporting absolute paths. root=${this.sessionRoot} file=${filePath}`
      );
    }
    return filePath;
  }
}
