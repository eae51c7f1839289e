import { ResultRow, ResultValue } from '../response/response-flattener';

/** Prepended to every written file so spreadsheet tools detect UTF-8 */
export const UTF8_BOM = '\uFEFF';

/**
 * Escape a value for CSV output
 */
export function escapeCSV(value: string): string {
  if (
    value.includes(',') ||
    value.includes('"') ||
    value.includes('\n') ||
    value.includes('\r')
  ) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: ResultValue | undefined): string {
  if (value === null || value === undefined) return '';
  return typeof value === 'number' ? String(value) : value;
}

/**
 * Union of the rows' keys, in first-seen order
 */
export function collectColumns(rows: readonly ResultRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return [...columns];
}

/**
 * Drop rows whose values equal an earlier row's over `columns`
 */
export function dedupeRows(
  rows: readonly ResultRow[],
  columns: readonly string[],
): ResultRow[] {
  const seen = new Set<string>();
  return rows.filter((row) => {
    const key = JSON.stringify(columns.map((c) => row[c] ?? null));
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Render rows as CSV text: header line, one line per row, trailing newline.
 * Missing values are written as empty cells.
 */
export function formatCsv(
  rows: readonly ResultRow[],
  columns: readonly string[] = collectColumns(rows),
): string {
  const lines = [
    columns.map(escapeCSV).join(','),
    ...rows.map((row) =>
      columns.map((c) => escapeCSV(formatCell(row[c]))).join(','),
    ),
  ];
  return `${lines.join('\n')}\n`;
}
