/**
 * Ground Truth Comparison Tools
 *
 * MCP tools that render the ground-truth vs model review table, for all
 * models at once or for a single model.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module tools/comparison
 */

import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { ComparisonAllInput, ComparisonModelInput, validateInput } from '../utils/validation.js';
import { EXTRACTION_MODELS, listExtractionModels } from '../models/extraction-model.js';
import { loadEvaluationTables } from '../services/storage/workbook/index.js';
import {
  buildAllModelsView,
  buildSingleModelView,
} from '../services/comparison/comparison-builder.js';
import { toReviewEntries } from '../services/comparison/review-rows.js';
import type { ComparisonEntry } from '../models/comparison.js';

// ═══════════════════════════════════════════════════════════════════════════════
// PAGINATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Slice one page out of a sorted view. Serial numbers stay absolute, so
 * entry 51 is `s_no: 51` on the second default page.
 */
function pageOf(entries: ComparisonEntry[], limit: number, offset: number) {
  const page = entries.slice(offset, offset + limit);
  const nextOffset = offset + page.length;
  return {
    total_documents: entries.length,
    limit,
    offset,
    returned: page.length,
    next_offset: nextOffset < entries.length ? nextOffset : null,
    documents: toReviewEntries(page, offset + 1),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

export function createComparisonTools(config: ServerConfig): Record<string, ToolDefinition> {
  /**
   * Handle eval_comparison_all - every ground-truth document against every model
   */
  async function handleComparisonAll(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ComparisonAllInput, params);
      const models = listExtractionModels();
      const tables = loadEvaluationTables(config.workbookPath, models);
      const entries = buildAllModelsView(tables.groundTruth, tables.models, models);
      const page = pageOf(entries, input.limit, input.offset);

      const nextSteps = [
        { tool: 'eval_accuracy_report', description: 'Summarize accuracy across all metrics' },
        { tool: 'eval_comparison_model', description: 'Review a single model' },
      ];
      if (page.next_offset !== null) {
        nextSteps.unshift({
          tool: 'eval_comparison_all',
          description: `Fetch the next page with offset=${page.next_offset}`,
        });
      }

      return formatResponse(
        successResult({
          models: models.map((m) => m.label),
          ...page,
          next_steps: nextSteps,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  /**
   * Handle eval_comparison_model - documents present in both Master and the model sheet
   */
  async function handleComparisonModel(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ComparisonModelInput, params);
      const model = EXTRACTION_MODELS[input.model];
      const tables = loadEvaluationTables(config.workbookPath, [model]);
      const entries = buildSingleModelView(
        tables.groundTruth,
        tables.models.get(model.id) ?? new Map(),
        model
      );

      return formatResponse(
        successResult({
          model: model.id,
          label: model.label,
          sheet: model.sheet,
          ...pageOf(entries, input.limit, input.offset),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    eval_comparison_all: {
      description:
        '[COMPARISON] Review table of every Master document against every model: raw values, per-field mismatch flags and vendor verdict (correct/incorrect/missing). Sorted by PDF name; paged with limit/offset (next_offset is null on the last page).',
      inputSchema: ComparisonAllInput.shape,
      handler: handleComparisonAll,
    },
    eval_comparison_model: {
      description:
        '[COMPARISON] Review table for one model, limited to documents present in both the Master sheet and that model\'s sheet. Paged with limit/offset.',
      inputSchema: ComparisonModelInput.shape,
      handler: handleComparisonModel,
    },
  };
}
