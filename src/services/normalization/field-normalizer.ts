/**
 * Field Normalizer for Accuracy Comparison
 *
 * Canonicalizes a single field value before ground truth and model output
 * are compared. Case, spacing, commas and hyphens never count as a
 * mismatch; amounts compare on their leading number only.
 *
 * @module services/normalization/field-normalizer
 */

import { NoticeField } from '../../models/notice.js';

/** Everything that is not a digit or a decimal point */
const NON_NUMERIC_REGEX = /[^0-9.]/g;

/** First number: digits, optionally a decimal point and more digits */
const LEADING_NUMBER_REGEX = /\d+(?:\.\d+)?/;

const WHITESPACE_RUN_REGEX = /\s+/g;

/** Commas and hyphens are folded away entirely */
const IGNORED_PUNCTUATION_REGEX = /[,-]/g;

/**
 * Extract the leading number of an amount string.
 *
 * "$1,234.56 due" -> "1234.56", "no amount" -> ""
 */
export function normalizeAmount(value: string): string {
  const numeric = value.replace(NON_NUMERIC_REGEX, '');
  const match = LEADING_NUMBER_REGEX.exec(numeric);
  return match ? match[0] : '';
}

/**
 * Fold case, whitespace, commas and hyphens.
 *
 * Whitespace is collapsed after punctuation removal so that the result is a
 * fixed point ("a - b" -> "a b").
 */
export function normalizeText(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(IGNORED_PUNCTUATION_REGEX, '')
    .replace(WHITESPACE_RUN_REGEX, ' ')
    .trim();
}

/**
 * Normalize a field value for comparison.
 *
 * Total over all inputs: absent or empty values normalize to "".
 *
 * @param value - Raw cell value
 * @param field - Field the value belongs to; selects amount handling
 */
export function normalizeForComparison(
  value: string | null | undefined,
  field: NoticeField
): string {
  if (!value) {
    return '';
  }
  if (field === NoticeField.IMPACT_AMOUNT) {
    return normalizeAmount(value.trim());
  }
  return normalizeText(value);
}
