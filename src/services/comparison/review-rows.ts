/**
 * Review table rendering
 *
 * Turns comparison entries into the row sets shown to reviewers: a Master
 * row followed by one row per model, with raw values and mismatch flags.
 *
 * @module services/comparison/review-rows
 */

import { MASTER_LABEL } from '../../models/extraction-model.js';
import { NoticeField, type NoticeRecord } from '../../models/notice.js';
import type {
  ComparisonEntry,
  FieldMismatchMap,
  ReviewEntry,
  ReviewRow,
  Verdict,
} from '../../models/comparison.js';

function toReviewRow(
  label: string,
  record: NoticeRecord | null,
  verdict: Verdict | null,
  mismatches: Partial<FieldMismatchMap>
): ReviewRow {
  const value = (field: NoticeField): string => record?.fields[field] ?? '';
  return {
    model: label,
    vendor_account: value(NoticeField.VENDOR_ACCOUNT_NUMBER),
    vendor_name: value(NoticeField.VENDOR_NAME),
    service_address: value(NoticeField.SERVICE_ADDRESS),
    category: value(NoticeField.NOTICE_CATEGORY),
    notice_date: value(NoticeField.NOTICE_DATE),
    impact_date: value(NoticeField.IMPACT_DATE),
    impact_amount: value(NoticeField.IMPACT_AMOUNT),
    details_verified: verdict,
    field_mismatches: mismatches,
  };
}

/**
 * Render one entry at a 1-based position
 */
export function toReviewEntry(entry: ComparisonEntry, sNo: number): ReviewEntry {
  return {
    s_no: sNo,
    pdf_name: entry.pdf_name,
    rows: [
      toReviewRow(MASTER_LABEL, entry.ground_truth, null, {}),
      ...entry.models.map((m) => toReviewRow(m.model.label, m.record, m.verdict, m.mismatches)),
    ],
  };
}

/**
 * Render a run of entries, numbering them from `firstSNo`
 */
export function toReviewEntries(entries: ComparisonEntry[], firstSNo = 1): ReviewEntry[] {
  return entries.map((entry, i) => toReviewEntry(entry, firstSNo + i));
}
