/**
 * Extraction model registry
 *
 * Each evaluated model owns exactly one sheet in the workbook, shaped like
 * the ground-truth sheet. Adding a model means adding one entry here.
 */

/** Ground-truth sheet name */
export const MASTER_SHEET = 'Master';

/** Label used for the ground-truth row in comparison views */
export const MASTER_LABEL = 'Master';

export const MODEL_IDS = ['gemini', 'gpt_5_1', 'gpt_5_mini'] as const;

export type ModelId = (typeof MODEL_IDS)[number];

export interface ExtractionModel {
  id: ModelId;
  /** Display label used in comparison rows */
  label: string;
  /** Sheet holding this model's output */
  sheet: string;
}

export const EXTRACTION_MODELS: Record<ModelId, ExtractionModel> = {
  gemini: { id: 'gemini', label: 'Gemini 2.5-Flash', sheet: '2.5 Flash' },
  gpt_5_1: { id: 'gpt_5_1', label: 'GPT 5.1', sheet: 'GPT 5.1' },
  gpt_5_mini: { id: 'gpt_5_mini', label: 'GPT 5-mini', sheet: 'GPT 5-Mini' },
};

/**
 * All registered models in registry order
 */
export function listExtractionModels(): ExtractionModel[] {
  return MODEL_IDS.map((id) => EXTRACTION_MODELS[id]);
}

/**
 * Every sheet the workbook is expected to hold: ground truth first
 */
export function listKnownSheets(): string[] {
  return [MASTER_SHEET, ...listExtractionModels().map((m) => m.sheet)];
}

/**
 * Build a per-model record with the same initial value for each model
 */
export function perModel<T>(init: (model: ExtractionModel) => T): Record<ModelId, T> {
  return {
    gemini: init(EXTRACTION_MODELS.gemini),
    gpt_5_1: init(EXTRACTION_MODELS.gpt_5_1),
    gpt_5_mini: init(EXTRACTION_MODELS.gpt_5_mini),
  };
}
