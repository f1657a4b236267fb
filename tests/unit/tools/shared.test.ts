/**
 * Tests for shared tool response formatting
 *
 * @module tests/unit/tools/shared
 */

import { describe, it, expect } from 'vitest';
import { formatResponse } from '../../../src/tools/shared.js';
import { successResult } from '../../../src/server/types.js';
import { parseResponse } from '../../helpers/index.js';

describe('formatResponse', () => {
  it('returns small results untouched', () => {
    const data = parseResponse(formatResponse(successResult({ documents: ['a.pdf'] })));

    expect(data).toEqual({ success: true, data: { documents: ['a.pdf'] } });
  });

  it('caps oversized arrays and points at limit/offset paging', () => {
    const documents = Array.from({ length: 1000 }, () => 'x'.repeat(1000));
    const data = parseResponse(formatResponse(successResult({ documents })));

    expect(data.data.documents).toHaveLength(50);
    expect(data.data._documents_total).toBe(1000);
    expect(data._response_truncated.truncated_fields).toEqual(['data.documents (1000 → 50)']);
    expect(data._response_truncated.suggestion).toBe(
      'Request a smaller page with limit/offset to reduce response size'
    );
  });
});
