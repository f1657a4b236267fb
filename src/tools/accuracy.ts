/**
 * Accuracy Metric Tools
 *
 * Tools: eval_accuracy_overall, eval_accuracy_category,
 * eval_accuracy_impact_amount, eval_accuracy_impact_date,
 * eval_accuracy_notice_date, eval_accuracy_correct_rows, eval_accuracy_report
 *
 * Every call reloads the workbook. Percentages are 0-100 with one decimal;
 * a missing workbook or an empty Master sheet yields zeros.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/accuracy
 */

import { z } from 'zod';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { validateInput } from '../utils/validation.js';
import { listExtractionModels, type ExtractionModel } from '../models/extraction-model.js';
import { loadEvaluationTables, type EvaluationTables } from '../services/storage/workbook/index.js';
import {
  calculateAccuracyReport,
  calculateCategoryAccuracy,
  calculateCorrectRowCounts,
  calculateImpactAmountAccuracy,
  calculateImpactDateAccuracy,
  calculateNoticeDateAccuracy,
  calculateOverallAccuracy,
} from '../services/accuracy/accuracy-aggregator.js';

const NoInput = z.object({});

type Metric = (tables: EvaluationTables, models: ExtractionModel[]) => unknown;

export function createAccuracyTools(config: ServerConfig): Record<string, ToolDefinition> {
  /**
   * Wrap a metric as a tool handler: validate, load, compute, respond
   */
  function metricHandler(metric: Metric): (params: Record<string, unknown>) => Promise<ToolResponse> {
    return async (params) => {
      try {
        validateInput(NoInput, params);
        const models = listExtractionModels();
        const tables = loadEvaluationTables(config.workbookPath, models);
        return formatResponse(successResult(metric(tables, models)));
      } catch (error) {
        return handleError(error);
      }
    };
  }

  return {
    eval_accuracy_overall: {
      description:
        '[ACCURACY] Vendor identification accuracy per model: share of Master documents whose account number, vendor name and service address all match after normalization.',
      inputSchema: NoInput.shape,
      handler: metricHandler((t) => calculateOverallAccuracy(t.groundTruth, t.models)),
    },
    eval_accuracy_category: {
      description:
        '[ACCURACY] Notice category classification accuracy per model, one value per category in fixed order (exact label match).',
      inputSchema: NoInput.shape,
      handler: metricHandler((t) => calculateCategoryAccuracy(t.groundTruth, t.models)),
    },
    eval_accuracy_impact_amount: {
      description:
        '[ACCURACY] Impact amount accuracy per model over Disconnect Notice and Late Notice documents (exact text match).',
      inputSchema: NoInput.shape,
      handler: metricHandler((t) => calculateImpactAmountAccuracy(t.groundTruth, t.models)),
    },
    eval_accuracy_impact_date: {
      description:
        '[ACCURACY] Impact date accuracy per model over Disconnect Notice and Late Notice documents (exact text match).',
      inputSchema: NoInput.shape,
      handler: metricHandler((t) => calculateImpactDateAccuracy(t.groundTruth, t.models)),
    },
    eval_accuracy_notice_date: {
      description:
        '[ACCURACY] Notice date accuracy per model over all Master documents (exact text match).',
      inputSchema: NoInput.shape,
      handler: metricHandler((t) => calculateNoticeDateAccuracy(t.groundTruth, t.models)),
    },
    eval_accuracy_correct_rows: {
      description:
        '[ACCURACY] Per model, rows of the all-models review table where all seven fields match, out of all rows (missing rows count toward the total).',
      inputSchema: NoInput.shape,
      handler: metricHandler((t, models) =>
        calculateCorrectRowCounts(t.groundTruth, t.models, models)
      ),
    },
    eval_accuracy_report: {
      description:
        '[ACCURACY] All accuracy metrics computed from a single workbook load.',
      inputSchema: NoInput.shape,
      handler: metricHandler((t, models) => calculateAccuracyReport(t.groundTruth, t.models, models)),
    },
  };
}
