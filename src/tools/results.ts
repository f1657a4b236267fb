/**
 * Model Result Tools
 *
 * Tools: eval_result_upsert, eval_document_status
 *
 * eval_result_upsert is the only write path for model output: one row per
 * (model sheet, document), overwritten on repeat.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/results
 */

import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { documentNotFoundError } from '../server/errors.js';
import {
  DocumentStatusInput,
  ResultUpsertInput,
  toNoticeFields,
  validateInput,
} from '../utils/validation.js';
import {
  EXTRACTION_MODELS,
  MASTER_SHEET,
  listExtractionModels,
} from '../models/extraction-model.js';
import type { RecordTable } from '../models/notice.js';
import { WorkbookStore, loadEvaluationTables } from '../services/storage/workbook/index.js';
import { buildAllModelsView } from '../services/comparison/comparison-builder.js';
import { toReviewEntry } from '../services/comparison/review-rows.js';

export function createResultTools(config: ServerConfig): Record<string, ToolDefinition> {
  /**
   * Handle eval_result_upsert - write one model's extraction for one document
   */
  async function handleResultUpsert(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ResultUpsertInput, params);
      const model = EXTRACTION_MODELS[input.model];
      const fields = toNoticeFields(input.fields);

      const store = WorkbookStore.openForWrite(config.workbookPath);
      try {
        if (!store.hasDocument(MASTER_SHEET, input.pdf_name)) {
          throw documentNotFoundError(input.pdf_name, MASTER_SHEET);
        }
        const outcome = store.upsertRow(model.sheet, input.pdf_name, fields);
        console.error(`[INFO] ${outcome} "${input.pdf_name}" in sheet "${model.sheet}"`);

        return formatResponse(
          successResult({
            model: model.id,
            sheet: model.sheet,
            pdf_name: input.pdf_name,
            outcome,
            fields,
            next_steps: [
              { tool: 'eval_document_status', description: 'Check the document against ground truth' },
            ],
          })
        );
      } finally {
        store.close();
      }
    } catch (error) {
      return handleError(error);
    }
  }

  /**
   * Handle eval_document_status - which sheets hold a document, plus its review rows
   */
  async function handleDocumentStatus(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(DocumentStatusInput, params);
      const models = listExtractionModels();
      const tables = loadEvaluationTables(config.workbookPath, models);

      const groundTruth = tables.groundTruth.get(input.pdf_name);
      const single: RecordTable = new Map();
      if (groundTruth) {
        single.set(input.pdf_name, groundTruth);
      }
      const [entry] = buildAllModelsView(single, tables.models, models);

      return formatResponse(
        successResult({
          pdf_name: input.pdf_name,
          in_master: groundTruth !== undefined,
          models: models.map((m) => ({
            model: m.id,
            label: m.label,
            sheet: m.sheet,
            present: tables.models.get(m.id)?.has(input.pdf_name) ?? false,
          })),
          comparison: entry ? toReviewEntry(entry, 1) : null,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    eval_result_upsert: {
      description:
        '[RESULTS] Insert or overwrite one model\'s extracted fields for a document. The document must already be in the Master sheet. Missing fields default to NA (category: Others).',
      inputSchema: ResultUpsertInput.shape,
      handler: handleResultUpsert,
    },
    eval_document_status: {
      description:
        '[RESULTS] Show whether a document is in the Master sheet and each model sheet, with its review rows when it has ground truth.',
      inputSchema: DocumentStatusInput.shape,
      handler: handleDocumentStatus,
    },
  };
}
