import os from 'node:os';

export type CsvCell = string | number | null;

export function formatCsvCell(value: CsvCell): string {
  if (value === null) return '';
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Header plus one line per row, columns in the given order, trailing EOL included. */
export function toCsv<T extends { [K in keyof T]: CsvCell }>(columns: ReadonlyArray<keyof T & string>, rows: readonly T[]): string {
  const lines: string[] = [];
  lines.push(columns.map((column) => formatCsvCell(column)).join(','));
  for (const row of rows) {
    lines.push(columns.map((column) => formatCsvCell(row[column])).join(','));
  }
  return lines.join(os.EOL) + os.EOL;
}
