/**
 * Tests for Ground Truth Comparison Tools
 *
 * Tests eval_comparison_all and eval_comparison_model against real temp
 * workbooks - NO MOCKS.
 *
 * @module tests/unit/tools/comparison
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { createComparisonTools } from '../../../src/tools/comparison.js';
import { NoticeField } from '../../../src/models/notice.js';
import {
  cleanupTempDir,
  createTempDir,
  createTestConfig,
  createTestRecord,
  parseResponse,
  seedWorkbook,
} from '../../helpers/index.js';

describe('Comparison Tools', () => {
  let tempDir: string;
  let workbookPath: string;
  let tools: ReturnType<typeof createComparisonTools>;

  beforeEach(() => {
    tempDir = createTempDir('test-eval-comparison-');
    workbookPath = join(tempDir, 'notices-testing.db');
    tools = createComparisonTools(createTestConfig(workbookPath));
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  describe('missing workbook', () => {
    it('eval_comparison_all returns no documents', async () => {
      const data = parseResponse(await tools.eval_comparison_all.handler({}));

      expect(data.success).toBe(true);
      expect(data.data.total_documents).toBe(0);
      expect(data.data.documents).toEqual([]);
      expect(data.data.models).toEqual(['Gemini 2.5-Flash', 'GPT 5.1', 'GPT 5-mini']);
    });

    it('eval_comparison_model returns no documents', async () => {
      const data = parseResponse(await tools.eval_comparison_model.handler({ model: 'gemini' }));

      expect(data.success).toBe(true);
      expect(data.data.documents).toEqual([]);
    });
  });

  describe('populated workbook', () => {
    beforeEach(() => {
      seedWorkbook(workbookPath, {
        Master: [createTestRecord('b.pdf'), createTestRecord('a.pdf')],
        '2.5 Flash': [
          createTestRecord('a.pdf'),
          createTestRecord('b.pdf', { [NoticeField.VENDOR_ACCOUNT_NUMBER]: '999' }),
        ],
        'GPT 5-Mini': [createTestRecord('b.pdf')],
      });
    });

    it('eval_comparison_all lists every Master document with every model', async () => {
      const data = parseResponse(await tools.eval_comparison_all.handler({}));

      expect(data.data.total_documents).toBe(2);
      expect(data.data.documents.map((d: { pdf_name: string }) => d.pdf_name)).toEqual([
        'a.pdf',
        'b.pdf',
      ]);

      const b = data.data.documents[1];
      expect(b.s_no).toBe(2);
      expect(b.rows.map((r: { model: string; details_verified: string | null }) => [r.model, r.details_verified])).toEqual([
        ['Master', null],
        ['Gemini 2.5-Flash', 'incorrect'],
        ['GPT 5.1', 'missing'],
        ['GPT 5-mini', 'correct'],
      ]);
      expect(b.rows[1].vendor_account).toBe('999');
      expect(b.rows[1].field_mismatches[NoticeField.VENDOR_ACCOUNT_NUMBER]).toBe(true);
    });

    it('eval_comparison_model keeps only documents the model has', async () => {
      const data = parseResponse(await tools.eval_comparison_model.handler({ model: 'gpt_5_mini' }));

      expect(data.data.label).toBe('GPT 5-mini');
      expect(data.data.sheet).toBe('GPT 5-Mini');
      expect(data.data.total_documents).toBe(1);
      expect(data.data.documents[0].pdf_name).toBe('b.pdf');
      expect(data.data.documents[0].rows).toHaveLength(2);
      expect(data.data.documents[0].rows[1].details_verified).toBe('correct');
    });

    it('eval_comparison_model rejects an unknown model', async () => {
      const result = await tools.eval_comparison_model.handler({ model: 'unknown' });

      expect(result.isError).toBe(true);
      expect(parseResponse(result).error.category).toBe('VALIDATION_ERROR');
    });
  });

  describe('paging a large workbook', () => {
    const pdfNames = Array.from({ length: 120 }, (_, i) => `doc-${String(i).padStart(3, '0')}.pdf`);

    beforeEach(() => {
      const records = pdfNames.map((name) =>
        createTestRecord(name, { [NoticeField.SERVICE_ADDRESS]: `${name} ${'x'.repeat(100)}` })
      );
      seedWorkbook(workbookPath, { Master: records, '2.5 Flash': records });
    });

    it('eval_comparison_all returns the first page and the next offset', async () => {
      const data = parseResponse(await tools.eval_comparison_all.handler({}));

      expect(data._response_truncated).toBeUndefined();
      expect(data.data.total_documents).toBe(120);
      expect(data.data.limit).toBe(50);
      expect(data.data.offset).toBe(0);
      expect(data.data.returned).toBe(50);
      expect(data.data.next_offset).toBe(50);
      expect(data.data.documents).toHaveLength(50);
      expect(data.data.documents[0].s_no).toBe(1);
      expect(data.data.documents[0].pdf_name).toBe('doc-000.pdf');
      expect(data.data.next_steps[0]).toEqual({
        tool: 'eval_comparison_all',
        description: 'Fetch the next page with offset=50',
      });
    });

    it('eval_comparison_all reaches the last documents by offset', async () => {
      const data = parseResponse(
        await tools.eval_comparison_all.handler({ limit: 50, offset: 100 })
      );

      expect(data.data.returned).toBe(20);
      expect(data.data.next_offset).toBeNull();
      expect(data.data.documents[0].s_no).toBe(101);
      expect(data.data.documents[0].pdf_name).toBe('doc-100.pdf');
      expect(data.data.documents[19].pdf_name).toBe('doc-119.pdf');
      expect(data.data.next_steps[0].tool).toBe('eval_accuracy_report');
    });

    it('eval_comparison_all returns an empty page past the end', async () => {
      const data = parseResponse(await tools.eval_comparison_all.handler({ offset: 500 }));

      expect(data.data.total_documents).toBe(120);
      expect(data.data.documents).toEqual([]);
      expect(data.data.next_offset).toBeNull();
    });

    it('eval_comparison_model pages the same way', async () => {
      const data = parseResponse(
        await tools.eval_comparison_model.handler({ model: 'gemini', limit: 30, offset: 60 })
      );

      expect(data.data.total_documents).toBe(120);
      expect(data.data.returned).toBe(30);
      expect(data.data.next_offset).toBe(90);
      expect(data.data.documents[0].s_no).toBe(61);
      expect(data.data.documents[0].pdf_name).toBe('doc-060.pdf');
      expect(data.data.documents[0].rows[1].details_verified).toBe('correct');
    });

    it('rejects a page larger than the maximum', async () => {
      const result = await tools.eval_comparison_all.handler({ limit: 201 });

      expect(result.isError).toBe(true);
      expect(parseResponse(result).error.category).toBe('VALIDATION_ERROR');
    });
  });
});
