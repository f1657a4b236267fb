/**
 * Comparison interfaces for the Notice Accuracy MCP System
 *
 * Types for ground truth vs model record comparison.
 * Pure types - no logic.
 */

import type { NoticeField, NoticeRecord } from './notice.js';
import type { ExtractionModel } from './extraction-model.js';

/**
 * Per-document verification verdict for one model
 * - missing: the model has no row for the document
 * - correct: all identity fields match after normalization
 * - incorrect: at least one identity field differs
 */
export type Verdict = 'correct' | 'incorrect' | 'missing';

/**
 * Field -> true when the normalized values differ
 */
export type FieldMismatchMap = Record<NoticeField, boolean>;

/**
 * Result of comparing one ground-truth record with one model record
 */
export interface RecordComparison {
  mismatches: FieldMismatchMap;
  verdict: Verdict;
}

/**
 * One model's side of a comparison entry
 */
export interface ModelComparison extends RecordComparison {
  model: ExtractionModel;
  /** null when the model sheet has no row for the document */
  record: NoticeRecord | null;
}

/**
 * Ground truth plus every requested model's comparison for one document.
 * Derived on each query, never stored.
 */
export interface ComparisonEntry {
  pdf_name: string;
  ground_truth: NoticeRecord;
  /** One entry per requested model, in request order */
  models: ModelComparison[];
}

/**
 * One rendered row of the review table: the Master row or one model's row
 */
export interface ReviewRow {
  /** 'Master' or the model label */
  model: string;
  vendor_account: string;
  vendor_name: string;
  service_address: string;
  category: string;
  notice_date: string;
  impact_date: string;
  impact_amount: string;
  /** null on the Master row */
  details_verified: Verdict | null;
  /** Keyed by column name; empty on the Master row */
  field_mismatches: Partial<FieldMismatchMap>;
}

/**
 * Review table block for one document: Master row first, then one row per model
 */
export interface ReviewEntry {
  /** 1-based position in the view */
  s_no: number;
  pdf_name: string;
  rows: ReviewRow[];
}
