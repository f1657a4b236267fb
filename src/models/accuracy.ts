/**
 * Accuracy metric result shapes
 *
 * Percentages are 0-100 rounded to one decimal; an empty denominator
 * reports 0.
 */

import type { ModelId } from './extraction-model.js';
import type { NoticeCategory } from './notice.js';

/** One percentage per model */
export type ModelScores = Record<ModelId, number>;

/**
 * Category-wise classification accuracy.
 * accuracy[model][i] belongs to categories[i].
 */
export interface CategoryAccuracy {
  categories: NoticeCategory[];
  accuracy: Record<ModelId, number[]>;
}

/**
 * Rows where every field matched, out of all rows in the unified view
 */
export interface RowCount {
  correct: number;
  total: number;
}

export type CorrectRowCounts = Record<ModelId, RowCount>;

/**
 * Every metric computed from a single load of the workbook
 */
export interface AccuracyReport {
  ground_truth_documents: number;
  overall: ModelScores;
  category: CategoryAccuracy;
  impact_amount: ModelScores;
  impact_date: ModelScores;
  notice_date: ModelScores;
  correct_rows: CorrectRowCounts;
}
