/**
 * Sheet operations for WorkbookStore
 *
 * Each sheet is an SQLite table named after the sheet. Its columns are the
 * header row and the implicit rowid keeps row order.
 */

import type Database from 'better-sqlite3';
import {
  DOCUMENT_ID_COLUMN,
  NOTICE_FIELDS,
  SHEET_COLUMNS,
  emptyNoticeFields,
  type NoticeFields,
  type RecordTable,
} from '../../../models/notice.js';
import { cellToString, isCanonicalHeader, quoteIdentifier, validateSheetName } from './helpers.js';
import type { UpsertOutcome } from './types.js';

/**
 * List sheet names in creation order
 */
export function listSheets(db: Database.Database): string[] {
  return db
    .prepare(
      `SELECT name FROM sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\'
       ORDER BY rowid`
    )
    .pluck()
    .all()
    .map(cellToString);
}

/**
 * Check whether a sheet exists
 */
export function hasSheet(db: Database.Database, name: string): boolean {
  const row = db
    .prepare(`SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?`)
    .get(name);
  return row !== undefined;
}

/**
 * Read the header row (column names in order) of an existing sheet
 */
export function getSheetHeader(db: Database.Database, name: string): string[] {
  return db
    .prepare('SELECT name FROM pragma_table_info(?) ORDER BY cid')
    .pluck()
    .all(name)
    .map(cellToString);
}

/**
 * Count data rows of a sheet (0 when absent)
 */
export function countRows(db: Database.Database, name: string): number {
  if (!hasSheet(db, name)) {
    return 0;
  }
  const count = db.prepare(`SELECT COUNT(*) FROM ${quoteIdentifier(name)}`).pluck().get();
  return Number(count ?? 0);
}

function createSheet(db: Database.Database, name: string): void {
  const columns = SHEET_COLUMNS.map((col) => `${quoteIdentifier(col)} TEXT`).join(', ');
  db.exec(`CREATE TABLE ${quoteIdentifier(name)} (${columns})`);
}

/**
 * Create a sheet with the canonical header unless it already exists.
 * An existing sheet is left untouched, whatever its header.
 *
 * @returns true when the sheet was created
 */
export function createSheetIfMissing(db: Database.Database, name: string): boolean {
  validateSheetName(name);
  if (hasSheet(db, name)) {
    return false;
  }
  createSheet(db, name);
  return true;
}

/**
 * Make sure a sheet exists with the canonical header.
 *
 * A sheet whose header drifted is cleared and recreated; its rows are lost,
 * the same as clearing the sheet and writing a fresh header row.
 *
 * @returns 'created', 'repaired' or 'valid'
 */
export function ensureSheet(
  db: Database.Database,
  name: string
): 'created' | 'repaired' | 'valid' {
  validateSheetName(name);

  if (!hasSheet(db, name)) {
    createSheet(db, name);
    return 'created';
  }

  const header = getSheetHeader(db, name);
  if (isCanonicalHeader(header, SHEET_COLUMNS)) {
    return 'valid';
  }

  const lostRows = countRows(db, name);
  console.error(
    `[Workbook] Sheet "${name}" header drifted ([${header.join(', ')}]); ` +
      `rewriting canonical header and clearing ${lostRows} row(s)`
  );
  db.exec(`DROP TABLE ${quoteIdentifier(name)}`);
  createSheet(db, name);
  return 'repaired';
}

/**
 * Load a sheet into records keyed by document identifier.
 *
 * Missing sheet or missing key column gives an empty table. Columns absent
 * from a drifted header read as "". Rows with an empty key are skipped and
 * a later duplicate key replaces an earlier one.
 */
export function readSheet(db: Database.Database, name: string): RecordTable {
  const table: RecordTable = new Map();
  if (!hasSheet(db, name)) {
    return table;
  }

  const header = getSheetHeader(db, name);
  const keyIndex = header.indexOf(DOCUMENT_ID_COLUMN);
  if (keyIndex < 0) {
    return table;
  }
  const fieldIndexes = NOTICE_FIELDS.map((field) => ({ field, index: header.indexOf(field) }));

  const rows = db.prepare(`SELECT * FROM ${quoteIdentifier(name)} ORDER BY rowid`).raw().all();
  for (const row of rows) {
    if (!Array.isArray(row)) continue;

    const pdfName = cellToString(row[keyIndex]);
    if (!pdfName) continue;

    const fields = emptyNoticeFields();
    for (const { field, index } of fieldIndexes) {
      fields[field] = index >= 0 ? cellToString(row[index]) : '';
    }
    table.set(pdfName, { pdf_name: pdfName, fields });
  }

  return table;
}

/**
 * Find the rowid of the first row whose key cell matches
 */
export function findRowId(db: Database.Database, name: string, pdfName: string): number | null {
  if (!hasSheet(db, name)) {
    return null;
  }
  const header = getSheetHeader(db, name);
  if (!header.includes(DOCUMENT_ID_COLUMN)) {
    return null;
  }

  const rows = db
    .prepare(`SELECT rowid, ${quoteIdentifier(DOCUMENT_ID_COLUMN)} FROM ${quoteIdentifier(name)} ORDER BY rowid`)
    .raw()
    .all();
  for (const row of rows) {
    if (!Array.isArray(row)) continue;
    if (cellToString(row[1]) === pdfName) {
      return Number(row[0]);
    }
  }
  return null;
}

/**
 * Upsert one document's row: overwrite the first matching row, else append.
 * The header is validated (and repaired) first.
 */
export function upsertRow(
  db: Database.Database,
  name: string,
  pdfName: string,
  fields: NoticeFields
): UpsertOutcome {
  ensureSheet(db, name);

  const values = [pdfName, ...NOTICE_FIELDS.map((field) => fields[field])];
  const rowId = findRowId(db, name, pdfName);

  if (rowId !== null) {
    const assignments = SHEET_COLUMNS.map((col) => `${quoteIdentifier(col)} = ?`).join(', ');
    db.prepare(`UPDATE ${quoteIdentifier(name)} SET ${assignments} WHERE rowid = ?`).run(
      ...values,
      rowId
    );
    return 'updated';
  }

  const columns = SHEET_COLUMNS.map(quoteIdentifier).join(', ');
  const placeholders = SHEET_COLUMNS.map(() => '?').join(', ');
  db.prepare(`INSERT INTO ${quoteIdentifier(name)} (${columns}) VALUES (${placeholders})`).run(
    ...values
  );
  return 'inserted';
}
