/**
 * Notice Accuracy MCP System - Zod Validation Schemas
 *
 * Input validation for every MCP tool. Each schema carries type validation,
 * constraints, descriptions and defaults where appropriate.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { MODEL_IDS } from '../models/extraction-model.js';
import {
  DEFAULT_CATEGORY,
  NOT_APPLICABLE,
  NoticeField,
  type NoticeFields,
} from '../models/notice.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extraction model identifier
 */
export const ModelIdSchema = z.enum(MODEL_IDS);

/**
 * Document identifier (PDF file name), trimmed the same way sheet keys are
 */
export const PdfNameSchema = z
  .string()
  .trim()
  .min(1, 'pdf_name is required')
  .max(1024, 'pdf_name must be at most 1024 characters');

/**
 * One extracted value. Numbers are accepted and stored as text; an absent
 * or null value falls back to the given default.
 */
function extractedValue(fallback: string) {
  return z.preprocess(
    (value) => (value === null ? undefined : value),
    z
      .union([z.string(), z.number()])
      .transform((value) => String(value).trim())
      .default(fallback)
  );
}

/**
 * Flat output of an extraction client. The category is not checked against
 * the notice vocabulary.
 */
export const ExtractionOutputSchema = z.object({
  vendor_account_number: extractedValue(NOT_APPLICABLE).describe('Vendor account number'),
  vendor_name: extractedValue(NOT_APPLICABLE).describe('Vendor name'),
  service_address: extractedValue(NOT_APPLICABLE).describe('Service address'),
  notice_category: extractedValue(DEFAULT_CATEGORY).describe('Notice category label'),
  notice_date: extractedValue(NOT_APPLICABLE).describe('Notice date, YYYY-MM-DD'),
  impact_date: extractedValue(NOT_APPLICABLE).describe('Impact date, YYYY-MM-DD or NA'),
  impact_amount: extractedValue(NOT_APPLICABLE).describe('Impact amount or NA'),
});

export type ExtractionOutput = z.output<typeof ExtractionOutputSchema>;

/**
 * Map extraction client keys onto sheet fields
 */
export function toNoticeFields(output: ExtractionOutput): NoticeFields {
  return {
    [NoticeField.VENDOR_ACCOUNT_NUMBER]: output.vendor_account_number,
    [NoticeField.VENDOR_NAME]: output.vendor_name,
    [NoticeField.SERVICE_ADDRESS]: output.service_address,
    [NoticeField.NOTICE_CATEGORY]: output.notice_category,
    [NoticeField.NOTICE_DATE]: output.notice_date,
    [NoticeField.IMPACT_DATE]: output.impact_date,
    [NoticeField.IMPACT_AMOUNT]: output.impact_amount,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/** Largest page of review entries one comparison call returns */
export const MAX_COMPARISON_PAGE = 200;

const comparisonPage = {
  limit: z
    .number()
    .int()
    .min(1)
    .max(MAX_COMPARISON_PAGE)
    .default(50)
    .describe('Maximum number of documents to return (default 50)'),
  offset: z
    .number()
    .int()
    .min(0)
    .default(0)
    .describe('Number of documents to skip for pagination'),
};

/**
 * Schema for eval_comparison_all
 */
export const ComparisonAllInput = z.object({
  ...comparisonPage,
});

/**
 * Schema for eval_comparison_model
 */
export const ComparisonModelInput = z.object({
  model: ModelIdSchema.describe('Extraction model to compare against ground truth'),
  ...comparisonPage,
});

/**
 * Schema for eval_document_status
 */
export const DocumentStatusInput = z.object({
  pdf_name: PdfNameSchema.describe('PDF file name as written in the PDF Name column'),
});

/**
 * Schema for eval_result_upsert
 */
export const ResultUpsertInput = z.object({
  model: ModelIdSchema.describe('Extraction model that produced the fields'),
  pdf_name: PdfNameSchema.describe('PDF file name; must already exist in the Master sheet'),
  fields: ExtractionOutputSchema.default({}).describe(
    'Extraction output with snake_case keys; missing keys default to NA (category: Others)'
  ),
});
