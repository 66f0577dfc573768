import {
  formatOperationSummary,
  joinLines,
  pluralize,
} from '../../config/formatting.js';
import type { GrepMatch, GrepSearchSuccess } from '../../config/types.js';

const LINE_NUMBER_PAD_WIDTH = 4;

// Map preserves first-seen order, so files stay in discovery order.
function groupMatchesByFile(
  matches: readonly GrepMatch[]
): Map<string, GrepMatch[]> {
  const byFile = new Map<string, GrepMatch[]>();
  for (const match of matches) {
    const list = byFile.get(match.file) ?? [];
    list.push(match);
    byFile.set(match.file, list);
  }
  return byFile;
}

function formatFileMatches(file: string, matches: GrepMatch[]): string[] {
  const lines: string[] = [
    `${file} (${matches.length} ${pluralize(matches.length, 'match', 'matches')}):`,
  ];
  for (const match of matches) {
    lines.push(
      `  > ${String(match.line_number).padStart(LINE_NUMBER_PAD_WIDTH)}: ${match.line_content}`
    );
  }
  lines.push('');
  return lines;
}

export function buildTextResult(result: GrepSearchSuccess): string {
  if (result.matches.length === 0) {
    return `No matches for /${result.pattern}/ in ${result.path}`;
  }

  const byFile = groupMatchesByFile(result.matches);
  const lines: string[] = [
    `Found ${result.total_matches} ${pluralize(result.total_matches, 'match', 'matches')} in ${byFile.size} ${pluralize(byFile.size, 'file')}:`,
  ];
  for (const [file, fileMatches] of byFile) {
    lines.push(...formatFileMatches(file, fileMatches));
  }

  const summary = formatOperationSummary({
    ...(result.warning !== undefined ? { warning: result.warning } : {}),
    tip: 'Narrow the pattern or search a subdirectory to see the remaining matches.',
  });
  if (summary.length > 0) lines.push(summary);

  return joinLines(lines).trimEnd();
}
