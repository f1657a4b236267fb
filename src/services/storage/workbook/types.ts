/**
 * Type definitions for WorkbookStore
 *
 * Contains the error class, error codes and info types used by the
 * workbook storage service.
 */

/**
 * Summary of one sheet in the workbook
 */
export interface SheetInfo {
  name: string;
  row_count: number;
  /** True when the header row equals the canonical column list */
  header_valid: boolean;
}

/**
 * Workbook information returned by eval_workbook_info
 */
export interface WorkbookInfo {
  path: string;
  exists: boolean;
  size_bytes: number;
  sheets: SheetInfo[];
}

/**
 * Outcome of a single-row upsert
 */
export type UpsertOutcome = 'inserted' | 'updated';

/**
 * Error codes for workbook operations
 */
export enum WorkbookErrorCode {
  WORKBOOK_OPEN_FAILED = 'WORKBOOK_OPEN_FAILED',
  WORKBOOK_READ_ONLY = 'WORKBOOK_READ_ONLY',
  INVALID_SHEET_NAME = 'INVALID_SHEET_NAME',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
}

/**
 * Custom error class for workbook operations
 */
export class WorkbookError extends Error {
  constructor(
    message: string,
    public readonly code: WorkbookErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'WorkbookError';
  }
}
