/**
 * Helper functions for WorkbookStore
 *
 * Sheet name validation, identifier quoting and cell conversion.
 */

import { WorkbookError, WorkbookErrorCode } from './types.js';

/** Sheet names follow spreadsheet limits: 1-31 chars, none of []:*?/\ */
const INVALID_SHEET_CHARS = /[[\]:*?/\\]/;

/**
 * Validate a sheet name before it is used as a table name
 */
export function validateSheetName(name: string): void {
  if (name.length === 0 || name.length > 31) {
    throw new WorkbookError(
      `Invalid sheet name "${name}": must be 1-31 characters`,
      WorkbookErrorCode.INVALID_SHEET_NAME
    );
  }
  if (INVALID_SHEET_CHARS.test(name) || name.startsWith('sqlite_')) {
    throw new WorkbookError(
      `Invalid sheet name "${name}": contains a reserved character or prefix`,
      WorkbookErrorCode.INVALID_SHEET_NAME
    );
  }
}

/**
 * Quote a sheet or column name as an SQLite identifier
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Convert a stored cell to the trimmed string the engine compares.
 * Empty cells become "".
 */
export function cellToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('utf-8').trim();
  }
  return String(value).trim();
}

/**
 * Compare a header against the canonical column list (order matters)
 */
export function isCanonicalHeader(header: readonly string[], canonical: readonly string[]): boolean {
  return header.length === canonical.length && header.every((col, i) => col === canonical[i]);
}
