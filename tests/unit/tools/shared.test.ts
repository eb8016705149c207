/**
 * Unit Tests for shared tool helpers
 *
 * @module tests/unit/tools/shared
 */

import { describe, it, expect } from 'vitest';
import { formatResponse, handleError } from '../../../src/tools/shared.js';
import { runNotFoundError } from '../../../src/server/errors.js';
import { successResult } from '../../../src/server/types.js';
import { parseResponse } from '../../helpers.js';

describe('formatResponse', () => {
  it('should pass small results through unchanged', () => {
    const response = formatResponse(successResult({ run_id: 'r1' }));

    expect(response.isError).toBeUndefined();
    expect(JSON.parse(response.content[0]?.text ?? '')).toEqual({ success: true, data: { run_id: 'r1' } });
  });

  it('should cap the largest array and record the original length', () => {
    const labels = Array.from({ length: 200 }, (_, i) => `report:p${i + 1}`);
    const response = formatResponse(successResult({ run_id: 'r1', page_labels: labels }), 1024);
    const parsed: unknown = JSON.parse(response.content[0]?.text ?? '');

    // cap = min(50, max(5, floor(200 * 0.1))) = 20
    expect(parsed).toMatchObject({
      success: true,
      data: { run_id: 'r1', page_labels: labels.slice(0, 20), _page_labels_total: 200 },
      _response_truncated: {
        reason: 'Response exceeded 1KB limit',
        truncated_fields: ['data.page_labels (200 → 20)'],
      },
    });
  });

  it('should replace the payload when truncation cannot fit it', () => {
    const response = formatResponse({ note: 'x'.repeat(4096) }, 1024);
    const parsed: unknown = JSON.parse(response.content[0]?.text ?? '');

    expect(parsed).toMatchObject({
      _response_truncated: { suggestion: 'Use include_page_labels=false or limit/offset to reduce response size' },
    });
  });
});

describe('handleError', () => {
  it('should flag the response as an error with a recovery hint', () => {
    const response = handleError(runNotFoundError('r9'));
    const parsed = parseResponse(response);

    expect(response.isError).toBe(true);
    expect(parsed.success).toBe(false);
    expect(parsed.error?.category).toBe('RUN_NOT_FOUND');
    expect(parsed.error?.recovery).toEqual({ tool: 'duplex_run_list', hint: 'Use duplex_run_list to find run ids' });
  });

  it('should treat a thrown string as an internal error', () => {
    expect(parseResponse(handleError('boom')).error?.category).toBe('INTERNAL_ERROR');
  });
});
