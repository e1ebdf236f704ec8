/**
 * CSV generation for exported tables
 */

import type { CSVValue } from './types';

const NEEDS_QUOTING = /[",\r\n]/;

function escapeField(value: CSVValue): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  return NEEDS_QUOTING.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
}

function toLine(values: readonly CSVValue[]): string {
  return values.map(escapeField).join(',');
}

/**
 * Comma-separated text with a header line; every line, the last included,
 * ends in a newline.
 */
export function generateCSV(headers: readonly string[], rows: readonly (readonly CSVValue[])[]): string {
  return [toLine(headers), ...rows.map(toLine)].map((line) => `${line}\n`).join('');
}
