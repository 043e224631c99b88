import { promises as fsp } from 'node:fs';
import type { CsvValue } from '../schema.js';

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Nulls become an empty unquoted field, which `COPY ... (format csv)` reads as NULL.
 * Empty strings are quoted so they stay empty strings.
 */
export function formatCsvField(value: CsvValue): string {
  if (value === null) return '';
  if (typeof value === 'number') return String(value);
  if (value === '' || NEEDS_QUOTING.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv<T extends { [K in keyof T]: CsvValue }>(
  columns: readonly (keyof T)[],
  rows: readonly T[]
): string {
  const lines: string[] = [];
  lines.push(columns.map((column) => formatCsvField(String(column))).join(','));
  for (const row of rows) {
    lines.push(columns.map((column) => formatCsvField(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export async function writeCsv<T extends { [K in keyof T]: CsvValue }>(
  filePath: string,
  columns: readonly (keyof T)[],
  rows: readonly T[]
): Promise<void> {
  await fsp.writeFile(filePath, formatCsv(columns, rows), 'utf8');
}
