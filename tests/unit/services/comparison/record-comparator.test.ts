/**
 * Record Comparator Tests
 *
 * Pure function tests - no workbook required.
 */

import { describe, it, expect } from 'vitest';
import { compareRecords, isFullMatch } from '../../../../src/services/comparison/record-comparator.js';
import { NOTICE_FIELDS, NoticeField } from '../../../../src/models/notice.js';
import { createTestRecord } from '../../../helpers/index.js';

describe('compareRecords', () => {
  it('identical records -> correct with no mismatches', () => {
    const gt = createTestRecord('a.pdf');
    const result = compareRecords(gt, createTestRecord('a.pdf'));

    expect(result.verdict).toBe('correct');
    expect(isFullMatch(result.mismatches)).toBe(true);
  });

  it('null model record -> missing with every field mismatched', () => {
    const result = compareRecords(createTestRecord('a.pdf'), null);

    expect(result.verdict).toBe('missing');
    for (const field of NOTICE_FIELDS) {
      expect(result.mismatches[field]).toBe(true);
    }
  });

  it('date, category and amount differences do not affect the verdict', () => {
    const gt = createTestRecord('a.pdf');
    const model = createTestRecord('a.pdf', {
      [NoticeField.NOTICE_CATEGORY]: 'Disconnect Notice',
      [NoticeField.NOTICE_DATE]: '2025-01-16',
      [NoticeField.IMPACT_DATE]: '2025-03-01',
      [NoticeField.IMPACT_AMOUNT]: '99.00',
    });
    const result = compareRecords(gt, model);

    expect(result.verdict).toBe('correct');
    expect(result.mismatches).toEqual({
      [NoticeField.VENDOR_ACCOUNT_NUMBER]: false,
      [NoticeField.VENDOR_NAME]: false,
      [NoticeField.SERVICE_ADDRESS]: false,
      [NoticeField.NOTICE_CATEGORY]: true,
      [NoticeField.NOTICE_DATE]: true,
      [NoticeField.IMPACT_DATE]: true,
      [NoticeField.IMPACT_AMOUNT]: true,
    });
  });

  it('case, spacing, commas and hyphens in identity fields still match', () => {
    const gt = createTestRecord('a.pdf');
    const model = createTestRecord('a.pdf', {
      [NoticeField.VENDOR_ACCOUNT_NUMBER]: '100200300',
      [NoticeField.VENDOR_NAME]: '  TEST   power co ',
      [NoticeField.SERVICE_ADDRESS]: '12 test street springfield',
    });

    expect(compareRecords(gt, model).verdict).toBe('correct');
  });

  it('a differing identity field -> incorrect', () => {
    const gt = createTestRecord('a.pdf');
    const model = createTestRecord('a.pdf', { [NoticeField.SERVICE_ADDRESS]: '14 Test Street' });
    const result = compareRecords(gt, model);

    expect(result.verdict).toBe('incorrect');
    expect(result.mismatches[NoticeField.SERVICE_ADDRESS]).toBe(true);
    expect(result.mismatches[NoticeField.VENDOR_NAME]).toBe(false);
  });

  it('compares amounts on their leading number', () => {
    const gt = createTestRecord('a.pdf', { [NoticeField.IMPACT_AMOUNT]: '1234.56' });
    const model = createTestRecord('a.pdf', { [NoticeField.IMPACT_AMOUNT]: '$1,234.56 due' });

    expect(compareRecords(gt, model).mismatches[NoticeField.IMPACT_AMOUNT]).toBe(false);
  });

  it('does not mutate its inputs', () => {
    const gt = createTestRecord('a.pdf');
    const model = createTestRecord('a.pdf', { [NoticeField.VENDOR_NAME]: 'Other, Vendor' });
    const gtCopy = structuredClone(gt);
    const modelCopy = structuredClone(model);

    compareRecords(gt, model);

    expect(gt).toEqual(gtCopy);
    expect(model).toEqual(modelCopy);
  });
});
