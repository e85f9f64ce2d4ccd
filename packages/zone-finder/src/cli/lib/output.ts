/**
 * Output Formatting for CLI Commands
 *
 * Provides consistent output formatting across all CLI commands.
 * Results go to stdout; logs and errors go to stderr.
 *
 * @module cli/lib/output
 */

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => String(row[col.key] ?? '').length))
  );

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => padCell(String(row[col.key] ?? ''), widths[i], col.align ?? 'left'))
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

/**
 * Format a UTC offset in seconds as +HH:MM (seconds are dropped)
 */
export function formatUtcOffset(offsetSeconds: number): string {
  const sign = offsetSeconds < 0 ? '-' : '+';
  const totalMinutes = Math.floor(Math.abs(offsetSeconds) / 60);
  const hours = String(Math.floor(totalMinutes / 60)).padStart(2, '0');
  const minutes = String(totalMinutes % 60).padStart(2, '0');
  return `${sign}${hours}:${minutes}`;
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}
