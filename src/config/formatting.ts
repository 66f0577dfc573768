export function joinLines(lines: string[]): string {
  return lines.join('\n');
}

export function pluralize(
  count: number,
  singular: string,
  plural = `${singular}s`
): string {
  return count === 1 ? singular : plural;
}

export function formatOperationSummary(summary: {
  warning?: string;
  tip?: string;
}): string {
  const lines: string[] = [];
  if (summary.warning) {
    lines.push(`!! PARTIAL RESULTS: ${summary.warning}`);
    if (summary.tip) lines.push(`Tip: ${summary.tip}`);
  }
  return joinLines(lines);
}
