/**
 * Field Normalizer Tests
 *
 * Pure function tests - no workbook required.
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeAmount,
  normalizeForComparison,
  normalizeText,
} from '../../../../src/services/normalization/field-normalizer.js';
import { NOTICE_FIELDS, NoticeField } from '../../../../src/models/notice.js';

// ═══════════════════════════════════════════════════════════════════════════════
// normalizeAmount TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('normalizeAmount', () => {
  it('drops currency symbol, thousands separator and trailing words', () => {
    expect(normalizeAmount('$1,234.56 due')).toBe('1234.56');
  });

  it('returns empty string when there is no number', () => {
    expect(normalizeAmount('no amount')).toBe('');
    expect(normalizeAmount('NA')).toBe('');
  });

  it('keeps whole numbers without a decimal part', () => {
    expect(normalizeAmount('USD 45')).toBe('45');
  });

  it('takes only the leading number when several decimal points appear', () => {
    expect(normalizeAmount('1.2.3')).toBe('1.2');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// normalizeText TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('normalizeText', () => {
  it('folds case, whitespace, commas and hyphens', () => {
    expect(normalizeText('  Test   POWER, Co-op ')).toBe('test power coop');
  });

  it('removes hyphens without inserting a space', () => {
    expect(normalizeText('123-Main St, Apt 4')).toBe('123main st apt 4');
  });

  it('collapses the gap left by a spaced hyphen', () => {
    expect(normalizeText('a - b')).toBe('a b');
  });

  it('treats tabs and newlines as whitespace', () => {
    expect(normalizeText('Test\tPower\nCo')).toBe('test power co');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// normalizeForComparison TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('normalizeForComparison', () => {
  it('maps absent and empty values to empty string', () => {
    expect(normalizeForComparison(null, NoticeField.VENDOR_NAME)).toBe('');
    expect(normalizeForComparison(undefined, NoticeField.IMPACT_AMOUNT)).toBe('');
    expect(normalizeForComparison('', NoticeField.SERVICE_ADDRESS)).toBe('');
    expect(normalizeForComparison('   ', NoticeField.VENDOR_NAME)).toBe('');
  });

  it('uses amount handling only for Impact Amount', () => {
    expect(normalizeForComparison(' $1,000 ', NoticeField.IMPACT_AMOUNT)).toBe('1000');
    expect(normalizeForComparison('$1,000', NoticeField.VENDOR_ACCOUNT_NUMBER)).toBe('$1000');
  });

  it('leaves dates as text apart from hyphen removal', () => {
    expect(normalizeForComparison('2025-01-15', NoticeField.NOTICE_DATE)).toBe('20250115');
  });

  it('is idempotent for every field', () => {
    const samples = [
      '$1,234.56 due',
      '  Test   POWER, Co-op ',
      '123-Main St, Apt 4',
      'a - b',
      '2025-01-15',
      'NA',
      '1.2.3',
      ' - , - ',
    ];
    for (const field of NOTICE_FIELDS) {
      for (const sample of samples) {
        const once = normalizeForComparison(sample, field);
        expect(normalizeForComparison(once, field)).toBe(once);
      }
    }
  });
});
