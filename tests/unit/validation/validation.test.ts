/**
 * Validation schema tests
 *
 * @module tests/unit/validation
 */

import { describe, it, expect } from 'vitest';
import {
  ExtractionOutputSchema,
  ResultUpsertInput,
  ValidationError,
  toNoticeFields,
  validateInput,
} from '../../../src/utils/validation.js';
import { NoticeField } from '../../../src/models/notice.js';

describe('validateInput', () => {
  it('throws ValidationError listing each failing path', () => {
    expect(() => validateInput(ResultUpsertInput, { model: 'nope' })).toThrow(ValidationError);
    try {
      validateInput(ResultUpsertInput, { model: 'nope' });
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toContain('model: ');
        expect(error.message).toContain('pdf_name: ');
      }
    }
  });
});

describe('ExtractionOutputSchema', () => {
  it('fills NA and Others for missing or null keys', () => {
    const output = validateInput(ExtractionOutputSchema, { vendor_name: null });

    expect(output.vendor_name).toBe('NA');
    expect(output.notice_category).toBe('Others');
    expect(output.impact_amount).toBe('NA');
  });

  it('accepts numbers, trims text and keeps unknown categories', () => {
    const output = validateInput(ExtractionOutputSchema, {
      vendor_account_number: 4455,
      vendor_name: '  Test Power Co ',
      notice_category: 'Service Upgrade',
    });

    expect(output.vendor_account_number).toBe('4455');
    expect(output.vendor_name).toBe('Test Power Co');
    expect(output.notice_category).toBe('Service Upgrade');
  });

  it('drops keys it does not know', () => {
    const output = validateInput(ExtractionOutputSchema, { extra_key: 'x' });
    expect(Object.keys(output)).toHaveLength(7);
  });

  it('rejects non-scalar values', () => {
    expect(() => validateInput(ExtractionOutputSchema, { vendor_name: ['a'] })).toThrow(
      /vendor_name/
    );
  });
});

describe('toNoticeFields', () => {
  it('maps snake_case keys onto sheet columns', () => {
    const fields = toNoticeFields(validateInput(ExtractionOutputSchema, { impact_date: '2025-02-01' }));

    expect(fields[NoticeField.IMPACT_DATE]).toBe('2025-02-01');
    expect(fields[NoticeField.NOTICE_CATEGORY]).toBe('Others');
    expect(fields[NoticeField.VENDOR_ACCOUNT_NUMBER]).toBe('NA');
  });
});
