/**
 * Text helpers shared by prompts, logs and result records.
 */

/** Cut `text` to `maxLength` characters, appending a marker when cut */
export function truncate(text: string, maxLength: number, marker = '\n...[truncated]'): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}${marker}`;
}

/** Single-line preview used in console output */
export function preview(text: string, maxLength = 100): string {
  const flattened = text.replace(/\r?\n/g, '\\n');
  if (flattened.length <= maxLength) {
    return flattened;
  }
  return `${flattened.slice(0, maxLength - 3)}...`;
}

/** Last line of `text` with non-whitespace content, or undefined */
export function lastNonEmptyLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i]?.trim();
    if (line) {
      return line;
    }
  }
  return undefined;
}
