/**
 * Output Formatter - JSON, table, CSV formats
 */

import type { OutputFormat } from '../types/index.js';

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, nested values as compact JSON
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function detectColumns(rows: Row[]): string[] {
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  return columns;
}

/**
 * Format rows as a simple aligned table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  const rows = data.filter(isRow);
  if (rows.length === 0) {
    return data.length === 0 ? 'No data to display' : formatJSON(data);
  }

  const cols = columns ?? detectColumns(rows);
  const widths = cols.map((col) =>
    Math.max(col.length, ...rows.map((row) => valueToString(row[col]).length))
  );

  const lines: string[] = [];
  lines.push(cols.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-|-'));
  for (const row of rows) {
    lines.push(cols.map((col, i) => valueToString(row[col]).padEnd(widths[i] ?? 0)).join(' | '));
  }
  return lines.map((line) => line.trimEnd()).join('\n');
}

/**
 * Format rows as CSV
 */
export function formatCSV(data: unknown[], columns?: string[]): string {
  const rows = data.filter(isRow);
  if (rows.length === 0) {
    return '';
  }

  const cols = columns ?? detectColumns(rows);
  const escape = (value: unknown): string => {
    const str = valueToString(value);
    return /[",\n]/.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
  };

  return [cols.join(','), ...rows.map((row) => cols.map((col) => escape(row[col])).join(','))].join(
    '\n'
  );
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  if (format === 'json') {
    return formatJSON(data);
  }
  const rows = Array.isArray(data) ? data : isRow(data) ? [data] : null;
  if (rows === null) {
    return String(data);
  }
  return format === 'csv' ? formatCSV(rows) : formatTable(rows);
}
