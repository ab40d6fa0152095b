/**
 * Output Formatting for CLI Commands
 *
 * Plain-text tables and JSON for the geoportal commands. Commands write
 * through a CommandOutput so tests can capture what would reach the terminal.
 *
 * @module cli/lib/output
 */

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  /** Maximum cell width; longer values are truncated with "~" */
  readonly maxWidth?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

/**
 * Where a command writes its results and diagnostics
 */
export interface CommandOutput {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: CommandOutput = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

function formatCell<T>(column: TableColumn<T>, value: unknown): string {
  if (column.formatter) return column.formatter(value);
  if (value === null || value === undefined) return '-';
  return String(value);
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format rows as a table
 */
export function formatTable<T extends object>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((column) => {
    const natural = Math.max(
      column.header.length,
      ...rows.map((row) => formatCell(column, row[column.key]).length)
    );
    return column.maxWidth === undefined ? natural : Math.min(natural, column.maxWidth);
  });

  const render = (cells: readonly string[]): string =>
    cells
      .map((cell, i) => padCell(cell, widths[i] ?? cell.length, columns[i]?.align ?? 'left'))
      .join(' | ')
      .trimEnd();

  const headerRow = render(columns.map((column) => column.header));
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = rows.map((row) => render(columns.map((column) => formatCell(column, row[column.key]))));

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}
