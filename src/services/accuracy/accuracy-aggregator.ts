/**
 * Accuracy Aggregator
 *
 * Reduces ground truth and model tables into per-model accuracy figures:
 * overall vendor identification, category classification, impact amount,
 * impact date, notice date and perfect-row counts.
 *
 * Impact amount and both dates compare raw cell text; the verdict and the
 * perfect-row counts go through the field normalizer.
 *
 * @module services/accuracy/accuracy-aggregator
 */

import {
  NOTICE_CATEGORIES,
  NoticeField,
  isImpactBearingCategory,
  type NoticeRecord,
  type RecordTable,
} from '../../models/notice.js';
import { perModel, type ExtractionModel, type ModelId } from '../../models/extraction-model.js';
import type {
  AccuracyReport,
  CategoryAccuracy,
  CorrectRowCounts,
  ModelScores,
} from '../../models/accuracy.js';
import { compareRecords, isFullMatch } from '../comparison/record-comparator.js';
import { buildAllModelsView } from '../comparison/comparison-builder.js';

/**
 * Round to one decimal by the exact binary value; exact halves go to the even
 * digit, so 6.25 gives 6.2 and 18.75 gives 18.8.
 */
function roundOneDecimal(value: number): number {
  // toFixed(20) prints the exact expansion far enough to tell a true half from a near one
  if (!/\.\d50*$/.test(value.toFixed(20))) {
    return Number(value.toFixed(1));
  }
  const down = Math.floor(value * 10);
  return (down % 2 === 0 ? down : down + 1) / 10;
}

/**
 * Percentage rounded to one decimal; 0 when the denominator is 0
 */
export function toPercentage(numerator: number, denominator: number): number {
  if (denominator === 0) {
    return 0;
  }
  return roundOneDecimal((numerator / denominator) * 100);
}

type RecordPredicate = (groundTruth: NoticeRecord, modelRecord: NoticeRecord) => boolean;

/**
 * Share of the given ground-truth documents whose model record satisfies the
 * predicate. Documents the model has no row for count as wrong.
 */
function scoreModels(
  documents: NoticeRecord[],
  modelTables: ReadonlyMap<ModelId, RecordTable>,
  isCorrect: RecordPredicate
): ModelScores {
  return perModel((model) => {
    const table = modelTables.get(model.id);
    let correct = 0;
    for (const gt of documents) {
      const record = table?.get(gt.pdf_name);
      if (record && isCorrect(gt, record)) {
        correct++;
      }
    }
    return toPercentage(correct, documents.length);
  });
}

function rawFieldEquals(field: NoticeField): RecordPredicate {
  return (gt, record) => gt.fields[field] === record.fields[field];
}

function impactBearingDocuments(groundTruth: RecordTable): NoticeRecord[] {
  return [...groundTruth.values()].filter((gt) =>
    isImpactBearingCategory(gt.fields[NoticeField.NOTICE_CATEGORY])
  );
}

/**
 * Vendor identification accuracy: documents with verdict 'correct' over all
 * ground-truth documents
 */
export function calculateOverallAccuracy(
  groundTruth: RecordTable,
  modelTables: ReadonlyMap<ModelId, RecordTable>
): ModelScores {
  return scoreModels(
    [...groundTruth.values()],
    modelTables,
    (gt, record) => compareRecords(gt, record).verdict === 'correct'
  );
}

/**
 * Classification accuracy per category, in vocabulary order. A ground-truth
 * category outside the vocabulary is counted in no bucket.
 */
export function calculateCategoryAccuracy(
  groundTruth: RecordTable,
  modelTables: ReadonlyMap<ModelId, RecordTable>
): CategoryAccuracy {
  const categories = [...NOTICE_CATEGORIES];
  const documents = [...groundTruth.values()];

  const accuracy = perModel((model) => {
    const table = modelTables.get(model.id);
    return categories.map((category) => {
      const inCategory = documents.filter(
        (gt) => gt.fields[NoticeField.NOTICE_CATEGORY] === category
      );
      const correct = inCategory.filter(
        (gt) => table?.get(gt.pdf_name)?.fields[NoticeField.NOTICE_CATEGORY] === category
      ).length;
      return toPercentage(correct, inCategory.length);
    });
  });

  return { categories, accuracy };
}

/**
 * Impact amount accuracy over impact-bearing documents (raw text equality)
 */
export function calculateImpactAmountAccuracy(
  groundTruth: RecordTable,
  modelTables: ReadonlyMap<ModelId, RecordTable>
): ModelScores {
  return scoreModels(
    impactBearingDocuments(groundTruth),
    modelTables,
    rawFieldEquals(NoticeField.IMPACT_AMOUNT)
  );
}

/**
 * Impact date accuracy over impact-bearing documents (raw text equality)
 */
export function calculateImpactDateAccuracy(
  groundTruth: RecordTable,
  modelTables: ReadonlyMap<ModelId, RecordTable>
): ModelScores {
  return scoreModels(
    impactBearingDocuments(groundTruth),
    modelTables,
    rawFieldEquals(NoticeField.IMPACT_DATE)
  );
}

/**
 * Notice date accuracy over all ground-truth documents (raw text equality)
 */
export function calculateNoticeDateAccuracy(
  groundTruth: RecordTable,
  modelTables: ReadonlyMap<ModelId, RecordTable>
): ModelScores {
  return scoreModels(
    [...groundTruth.values()],
    modelTables,
    rawFieldEquals(NoticeField.NOTICE_DATE)
  );
}

/**
 * Rows with no mismatch in any field, out of every row of the all-models
 * view. A missing row adds to the total and is never correct.
 */
export function calculateCorrectRowCounts(
  groundTruth: RecordTable,
  modelTables: ReadonlyMap<ModelId, RecordTable>,
  models: ExtractionModel[]
): CorrectRowCounts {
  const counts = perModel(() => ({ correct: 0, total: 0 }));

  for (const entry of buildAllModelsView(groundTruth, modelTables, models)) {
    for (const comparison of entry.models) {
      const count = counts[comparison.model.id];
      count.total++;
      if (comparison.verdict !== 'missing' && isFullMatch(comparison.mismatches)) {
        count.correct++;
      }
    }
  }

  return counts;
}

/**
 * Every metric from the same tables
 */
export function calculateAccuracyReport(
  groundTruth: RecordTable,
  modelTables: ReadonlyMap<ModelId, RecordTable>,
  models: ExtractionModel[]
): AccuracyReport {
  return {
    ground_truth_documents: groundTruth.size,
    overall: calculateOverallAccuracy(groundTruth, modelTables),
    category: calculateCategoryAccuracy(groundTruth, modelTables),
    impact_amount: calculateImpactAmountAccuracy(groundTruth, modelTables),
    impact_date: calculateImpactDateAccuracy(groundTruth, modelTables),
    notice_date: calculateNoticeDateAccuracy(groundTruth, modelTables),
    correct_rows: calculateCorrectRowCounts(groundTruth, modelTables, models),
  };
}
