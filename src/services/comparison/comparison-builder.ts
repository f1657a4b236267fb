/**
 * Multi-Model Comparison Builder
 *
 * Joins the ground-truth table with model tables by document identifier and
 * runs the comparator for every (document, model) pair. Views are rebuilt on
 * every call.
 *
 * @module services/comparison/comparison-builder
 */

import type { NoticeRecord, RecordTable } from '../../models/notice.js';
import type { ExtractionModel, ModelId } from '../../models/extraction-model.js';
import type { ComparisonEntry, ModelComparison } from '../../models/comparison.js';
import { compareRecords } from './record-comparator.js';

/** Code-unit order, independent of locale */
function byDocumentId(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareWithModel(
  groundTruth: NoticeRecord,
  model: ExtractionModel,
  record: NoticeRecord | null
): ModelComparison {
  return { model, record, ...compareRecords(groundTruth, record) };
}

/**
 * One entry per ground-truth document, each carrying every requested model.
 * A model without a row for the document gets a null record and verdict
 * 'missing'; a model without a table at all is treated the same way.
 */
export function buildAllModelsView(
  groundTruth: RecordTable,
  modelTables: ReadonlyMap<ModelId, RecordTable>,
  models: ExtractionModel[]
): ComparisonEntry[] {
  const ids = [...groundTruth.keys()].sort(byDocumentId);

  return ids.flatMap((pdfName) => {
    const gt = groundTruth.get(pdfName);
    if (!gt) return [];
    return [
      {
        pdf_name: pdfName,
        ground_truth: gt,
        models: models.map((model) =>
          compareWithModel(gt, model, modelTables.get(model.id)?.get(pdfName) ?? null)
        ),
      },
    ];
  });
}

/**
 * Only documents present in both the ground truth and the model table
 */
export function buildSingleModelView(
  groundTruth: RecordTable,
  modelTable: RecordTable,
  model: ExtractionModel
): ComparisonEntry[] {
  const ids = [...groundTruth.keys()].filter((id) => modelTable.has(id)).sort(byDocumentId);

  return ids.flatMap((pdfName) => {
    const gt = groundTruth.get(pdfName);
    const record = modelTable.get(pdfName);
    if (!gt || !record) return [];
    return [{ pdf_name: pdfName, ground_truth: gt, models: [compareWithModel(gt, model, record)] }];
  });
}
