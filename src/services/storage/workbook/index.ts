/**
 * Workbook storage module
 *
 * Re-exports the store and adds the request-scoped loader used by every
 * read-only query.
 *
 * @module services/storage/workbook
 */

import type { RecordTable } from '../../../models/notice.js';
import { MASTER_SHEET, type ExtractionModel, type ModelId } from '../../../models/extraction-model.js';
import { WorkbookStore } from './service.js';

export { WorkbookStore } from './service.js';
export { WorkbookError, WorkbookErrorCode } from './types.js';
export type { SheetInfo, WorkbookInfo, UpsertOutcome } from './types.js';

/**
 * Ground truth plus the requested model tables from one load
 */
export interface EvaluationTables {
  groundTruth: RecordTable;
  models: Map<ModelId, RecordTable>;
}

/**
 * Open the workbook, read the ground truth and every requested model sheet,
 * and close it again. A missing file or sheet yields empty tables.
 */
export function loadEvaluationTables(path: string, models: ExtractionModel[]): EvaluationTables {
  const tables: EvaluationTables = { groundTruth: new Map(), models: new Map() };
  for (const model of models) {
    tables.models.set(model.id, new Map());
  }

  const store = WorkbookStore.openForRead(path);
  if (!store) {
    return tables;
  }

  try {
    tables.groundTruth = store.readSheet(MASTER_SHEET);
    for (const model of models) {
      tables.models.set(model.id, store.readSheet(model.sheet));
    }
    return tables;
  } finally {
    store.close();
  }
}
