/**
 * Record Comparator
 *
 * Compares one ground-truth record with one model record field by field
 * after normalization and derives the vendor-identification verdict.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 */

import {
  IDENTITY_FIELDS,
  NOTICE_FIELDS,
  NoticeField,
  type NoticeRecord,
} from '../../models/notice.js';
import type { FieldMismatchMap, RecordComparison, Verdict } from '../../models/comparison.js';
import { normalizeForComparison } from '../normalization/field-normalizer.js';

function buildMismatchMap(mismatched: (field: NoticeField) => boolean): FieldMismatchMap {
  return {
    [NoticeField.VENDOR_ACCOUNT_NUMBER]: mismatched(NoticeField.VENDOR_ACCOUNT_NUMBER),
    [NoticeField.VENDOR_NAME]: mismatched(NoticeField.VENDOR_NAME),
    [NoticeField.SERVICE_ADDRESS]: mismatched(NoticeField.SERVICE_ADDRESS),
    [NoticeField.NOTICE_CATEGORY]: mismatched(NoticeField.NOTICE_CATEGORY),
    [NoticeField.NOTICE_DATE]: mismatched(NoticeField.NOTICE_DATE),
    [NoticeField.IMPACT_DATE]: mismatched(NoticeField.IMPACT_DATE),
    [NoticeField.IMPACT_AMOUNT]: mismatched(NoticeField.IMPACT_AMOUNT),
  };
}

/**
 * Compare a ground-truth record with a model's record for the same document
 *
 * @param groundTruth - Verified record from the Master sheet
 * @param modelRecord - The model's record, or null when the model has no row
 * @returns Per-field mismatch map and verdict. A null record mismatches every
 *   field and is 'missing'; otherwise only the identity fields decide between
 *   'correct' and 'incorrect'.
 */
export function compareRecords(
  groundTruth: NoticeRecord,
  modelRecord: NoticeRecord | null
): RecordComparison {
  if (modelRecord === null) {
    return { mismatches: buildMismatchMap(() => true), verdict: 'missing' };
  }

  const mismatches = buildMismatchMap(
    (field) =>
      normalizeForComparison(groundTruth.fields[field], field) !==
      normalizeForComparison(modelRecord.fields[field], field)
  );

  const verdict: Verdict = IDENTITY_FIELDS.some((field) => mismatches[field])
    ? 'incorrect'
    : 'correct';

  return { mismatches, verdict };
}

/**
 * True when no field mismatches
 */
export function isFullMatch(mismatches: FieldMismatchMap): boolean {
  return NOTICE_FIELDS.every((field) => !mismatches[field]);
}
