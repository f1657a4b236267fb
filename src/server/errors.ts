/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Missing data is not an error: an absent workbook or sheet reads as empty.
 *
 * @module server/errors
 */

import { WorkbookError, WorkbookErrorCode } from '../services/storage/workbook/types.js';
import { ValidationError } from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Document errors
  | 'DOCUMENT_NOT_FOUND'

  // Workbook errors (open, lock, corrupt file, read-only)
  | 'WORKBOOK_ERROR'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PERMISSION_DENIED'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map error class names without a dedicated branch in fromUnknown()
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  // better-sqlite3 raises SqliteError for locked or corrupt files
  SqliteError: 'WORKBOOK_ERROR',
};

/**
 * Node system error codes that map to file system categories
 */
const SYSTEM_CODE_TO_CATEGORY: Record<string, ErrorCategory> = {
  ENOENT: 'PATH_NOT_FOUND',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
  EROFS: 'PERMISSION_DENIED',
};

function categoryForWorkbookError(error: WorkbookError): ErrorCategory {
  return error.code === WorkbookErrorCode.PERMISSION_DENIED ? 'PERMISSION_DENIED' : 'WORKBOOK_ERROR';
}

function readErrorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof ValidationError) {
      return new MCPError('VALIDATION_ERROR', error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    if (error instanceof WorkbookError) {
      return new MCPError(categoryForWorkbookError(error), error.message, {
        originalName: error.name,
        errorCode: error.code,
        stack: error.stack,
      });
    }

    if (error instanceof Error) {
      const code = readErrorCode(error);
      const category =
        (code !== undefined ? SYSTEM_CODE_TO_CATEGORY[code] : undefined) ??
        ERROR_NAME_TO_CATEGORY[error.name] ??
        defaultCategory;

      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 * Every ErrorCategory maps to a suggested tool and human-readable hint.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: {
    tool: 'eval_workbook_info',
    hint: 'Check parameter types and required fields; model must be gemini, gpt_5_1 or gpt_5_mini',
  },
  DOCUMENT_NOT_FOUND: {
    tool: 'eval_comparison_all',
    hint: 'Use eval_comparison_all to list documents in the Master sheet',
  },
  WORKBOOK_ERROR: {
    tool: 'eval_workbook_info',
    hint: 'The workbook may be locked by another writer or corrupt; check it with eval_workbook_info and retry',
  },
  CONFIGURATION_ERROR: {
    tool: 'eval_workbook_info',
    hint: 'Check NOTICE_EVAL_WORKBOOK_PATH and the .env file the server loaded',
  },
  PATH_NOT_FOUND: {
    tool: 'eval_workbook_init',
    hint: 'Create the workbook with eval_workbook_init',
  },
  PERMISSION_DENIED: {
    tool: 'eval_workbook_info',
    hint: 'Check filesystem permissions on the workbook file and its directory',
  },
  INTERNAL_ERROR: { tool: 'eval_workbook_info', hint: 'Run eval_workbook_info for diagnostics' },
};

/**
 * Get recovery hint for an error category.
 * Exported for testing and direct use.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create document not found error
 */
export function documentNotFoundError(pdfName: string, sheet: string): MCPError {
  return new MCPError(
    'DOCUMENT_NOT_FOUND',
    `Document not found in ${sheet} sheet: ${pdfName}. Use eval_comparison_all to list documents.`,
    { pdfName, sheet }
  );
}

/**
 * Create configuration error for invalid environment variables
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
