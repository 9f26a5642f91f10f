const RULE = '='.repeat(60);

export type ReportRow = [label: string, value: string | number];

/**
 * Run header: title between rules, then the settings in effect.
 */
export function formatBanner(title: string, options: { dryRun?: boolean; verbose?: boolean }, rows: ReportRow[] = []): string {
  const lines = [RULE, title, RULE];
  for (const [label, value] of rows) {
    lines.push(`${label}: ${value}`);
  }
  if (options.dryRun) lines.push('DRY RUN MODE - No changes will be made');
  if (options.verbose) lines.push('VERBOSE MODE - Showing detailed analysis');
  return lines.join('\n');
}

export function formatSummary(rows: ReportRow[], notes: string[] = []): string {
  const lines = [RULE, 'Summary:'];
  for (const [label, value] of rows) {
    lines.push(`  ${label}: ${value}`);
  }
  for (const note of notes) {
    lines.push('', `  ${note}`);
  }
  lines.push(RULE);
  return lines.join('\n');
}

/** First `max` characters, with an ellipsis when cut. */
export function truncate(text: string, max = 100): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
