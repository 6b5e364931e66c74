/** Text after the last `SUMMARY:` line a script printed, or undefined */
export function extractSummaryLine(stdout: string): string | undefined {
  let summary: string | undefined;
  for (const line of stdout.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.toLowerCase().startsWith('summary:')) {
      summary = trimmed.slice('summary:'.length).trim();
    }
  }
  return summary;
}
