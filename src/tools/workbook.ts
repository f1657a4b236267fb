/**
 * Workbook Management Tools
 *
 * Tools: eval_workbook_info, eval_workbook_init
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/workbook
 */

import { z } from 'zod';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { validateInput } from '../utils/validation.js';
import { listExtractionModels, listKnownSheets } from '../models/extraction-model.js';
import { WorkbookStore } from '../services/storage/workbook/index.js';

const NoInput = z.object({});

export function createWorkbookTools(config: ServerConfig): Record<string, ToolDefinition> {
  /**
   * Handle eval_workbook_info - path, size and per-sheet row counts
   */
  async function handleWorkbookInfo(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      validateInput(NoInput, params);
      const info = WorkbookStore.inspect(config.workbookPath);
      const present = new Set(info.sheets.map((s) => s.name));

      return formatResponse(
        successResult({
          ...info,
          path_source: config.workbookPathSource,
          missing_sheets: listKnownSheets().filter((name) => !present.has(name)),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  /**
   * Handle eval_workbook_init - create the file and any missing sheets, and
   * repair drifted model sheet headers. The Master sheet is never cleared.
   */
  async function handleWorkbookInit(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      validateInput(NoInput, params);
      const sheets = listKnownSheets();
      const store = WorkbookStore.openForWrite(config.workbookPath, []);
      try {
        const created = store.createMissingSheets(sheets);
        const repaired = listExtractionModels()
          .map((m) => m.sheet)
          .filter((sheet) => store.ensureSheet(sheet) === 'repaired');
        console.error(
          `[INFO] Workbook initialized at ${config.workbookPath} ` +
            `(created: ${created.length}, repaired: ${repaired.length})`
        );
        return formatResponse(
          successResult({
            path: config.workbookPath,
            sheets,
            created,
            repaired,
          })
        );
      } finally {
        store.close();
      }
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    eval_workbook_info: {
      description:
        '[WORKBOOK] Show the workbook path, whether it exists, and each sheet with its row count and header validity.',
      inputSchema: NoInput.shape,
      handler: handleWorkbookInfo,
    },
    eval_workbook_init: {
      description:
        '[WORKBOOK] Create the workbook and the Master and model sheets if absent. A model sheet with a drifted header is cleared and rewritten; Master is left as is.',
      inputSchema: NoInput.shape,
      handler: handleWorkbookInit,
    },
  };
}
