/**
 * WorkbookStore class for all workbook operations
 *
 * One SQLite file stands in for the testing workbook: the ground-truth
 * sheet plus one sheet per extraction model. Stores are opened per request
 * and closed when the request is done.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, statSync } from 'fs';
import { dirname } from 'path';
import type { NoticeFields, RecordTable } from '../../../models/notice.js';
import { SHEET_COLUMNS } from '../../../models/notice.js';
import { listKnownSheets } from '../../../models/extraction-model.js';
import * as sheetOps from './sheet-operations.js';
import { isCanonicalHeader } from './helpers.js';
import {
  WorkbookError,
  WorkbookErrorCode,
  type SheetInfo,
  type UpsertOutcome,
  type WorkbookInfo,
} from './types.js';

/** Bounded wait when another writer holds the file lock */
const BUSY_TIMEOUT_MS = 5000;

function openConnection(path: string, readonly: boolean): Database.Database {
  try {
    const db = new Database(path, { readonly, fileMustExist: readonly });
    db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
    return db;
  } catch (error) {
    throw new WorkbookError(
      `Failed to open workbook at ${path}: ${error instanceof Error ? error.message : String(error)}`,
      WorkbookErrorCode.WORKBOOK_OPEN_FAILED,
      error
    );
  }
}

/**
 * WorkbookStore class for all sheet reads and the upsert write path
 */
export class WorkbookStore {
  private readonly db: Database.Database;
  private readonly path: string;
  private readonly readonly: boolean;

  private constructor(db: Database.Database, path: string, readonly: boolean) {
    this.db = db;
    this.path = path;
    this.readonly = readonly;
  }

  /**
   * Open an existing workbook read-only.
   * @returns null when the file does not exist (no data yet)
   */
  static openForRead(path: string): WorkbookStore | null {
    if (!existsSync(path)) {
      return null;
    }
    return new WorkbookStore(openConnection(path, true), path, true);
  }

  /**
   * Open (creating if needed) a workbook for writing and create any missing
   * sheet. Existing sheets are not touched here; a drifted header is only
   * repaired when its own sheet is written.
   */
  static openForWrite(path: string, sheets: string[] = listKnownSheets()): WorkbookStore {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      try {
        mkdirSync(dir, { recursive: true });
      } catch (error) {
        throw new WorkbookError(
          `Cannot create workbook directory ${dir}: ${error instanceof Error ? error.message : String(error)}`,
          WorkbookErrorCode.PERMISSION_DENIED,
          error
        );
      }
    }

    const store = new WorkbookStore(openConnection(path, false), path, false);
    try {
      store.createMissingSheets(sheets);
    } catch (error) {
      store.close();
      throw error;
    }
    return store;
  }

  /**
   * Describe the workbook at a path without creating it
   */
  static inspect(path: string): WorkbookInfo {
    const store = WorkbookStore.openForRead(path);
    if (!store) {
      return { path, exists: false, size_bytes: 0, sheets: [] };
    }
    try {
      return {
        path,
        exists: true,
        size_bytes: statSync(path).size,
        sheets: store.listSheetInfo(),
      };
    } finally {
      store.close();
    }
  }

  close(): void {
    this.db.close();
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ==================== SHEET READS ====================

  listSheets(): string[] {
    return sheetOps.listSheets(this.db);
  }

  listSheetInfo(): SheetInfo[] {
    return this.listSheets().map((name) => ({
      name,
      row_count: sheetOps.countRows(this.db, name),
      header_valid: isCanonicalHeader(sheetOps.getSheetHeader(this.db, name), SHEET_COLUMNS),
    }));
  }

  readSheet(name: string): RecordTable {
    return sheetOps.readSheet(this.db, name);
  }

  hasDocument(name: string, pdfName: string): boolean {
    return sheetOps.findRowId(this.db, name, pdfName) !== null;
  }

  // ==================== SHEET WRITES ====================

  /**
   * Create the sheets that do not exist yet
   * @returns sheets that were created
   */
  createMissingSheets(names: string[]): string[] {
    this.assertWritable();
    return this.transaction(() =>
      names.filter((name) => sheetOps.createSheetIfMissing(this.db, name))
    );
  }

  /**
   * Create a sheet or repair its drifted header (clearing its rows)
   */
  ensureSheet(name: string): 'created' | 'repaired' | 'valid' {
    this.assertWritable();
    return this.transaction(() => sheetOps.ensureSheet(this.db, name));
  }

  /**
   * Upsert one document's row in a sheet. Idempotent per (sheet, document).
   */
  upsertRow(name: string, pdfName: string, fields: NoticeFields): UpsertOutcome {
    this.assertWritable();
    return this.transaction(() => sheetOps.upsertRow(this.db, name, pdfName, fields));
  }

  private assertWritable(): void {
    if (this.readonly) {
      throw new WorkbookError(
        `Workbook at ${this.path} was opened read-only`,
        WorkbookErrorCode.WORKBOOK_READ_ONLY
      );
    }
  }
}
