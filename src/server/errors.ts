/**
 * MCP Server Error Handling
 *
 * Every failure that reaches a tool boundary becomes an MCPError with a
 * category and a recovery hint naming the tool to call next.
 *
 * @module server/errors
 */

import { isRecord } from '../models/report.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Folder and source errors
  | 'FOLDER_NOT_FOUND'
  | 'SOURCE_JSON_NOT_FOUND'
  | 'SOURCE_JSON_INVALID'
  | 'PDF_SCAN_ERROR'
  | 'OUTPUT_WRITE_ERROR'

  // PDF errors
  | 'PDF_OPEN_ERROR'
  | 'PDF_READ_ERROR'

  // Job errors
  | 'JOB_NOT_FOUND'
  | 'JOB_INVALID_TRANSITION'
  | 'JOB_CAPACITY_EXCEEDED'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

const VALID_CATEGORIES = new Set<string>([
  'VALIDATION_ERROR',
  'FOLDER_NOT_FOUND',
  'SOURCE_JSON_NOT_FOUND',
  'SOURCE_JSON_INVALID',
  'PDF_SCAN_ERROR',
  'OUTPUT_WRITE_ERROR',
  'PDF_OPEN_ERROR',
  'PDF_READ_ERROR',
  'JOB_NOT_FOUND',
  'JOB_INVALID_TRANSITION',
  'JOB_CAPACITY_EXCEEDED',
  'CONFIGURATION_ERROR',
  'INTERNAL_ERROR',
]);

function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === 'string' && VALID_CATEGORIES.has(value);
}

/**
 * Default category per error class name. Classes that carry their own
 * `.category` (ProcessingError, ExtractionError, the JobError family)
 * take that instead when it is a known category.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',

  ProcessingError: 'INTERNAL_ERROR',

  ExtractionError: 'PDF_READ_ERROR',
  PdfOpenError: 'PDF_OPEN_ERROR',

  JobError: 'INTERNAL_ERROR',
  JobNotFoundError: 'JOB_NOT_FOUND',
  JobStateError: 'JOB_INVALID_TRANSITION',
  JobCapacityError: 'JOB_CAPACITY_EXCEEDED',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const ownCategory = 'category' in error ? error.category : undefined;
      const category = isErrorCategory(ownCategory)
        ? ownCategory
        : (ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory);

      const customDetails = 'details' in error && isRecord(error.details) ? error.details : undefined;
      const customCode = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(customCode && { errorCode: customCode }),
        ...(customDetails && { errorDetails: customDetails }),
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

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

export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'report_health', hint: 'Check parameter types and required fields' },
  FOLDER_NOT_FOUND: {
    tool: 'report_folders',
    hint: 'Use report_folders to list job folders and pass one of their paths',
  },
  SOURCE_JSON_NOT_FOUND: {
    tool: 'report_folders',
    hint: 'The folder needs a *_reports.json file; check has_json in report_folders',
  },
  SOURCE_JSON_INVALID: {
    tool: 'report_folders',
    hint: 'Fix the *_reports.json file: it must be a JSON object with a reports array',
  },
  PDF_SCAN_ERROR: {
    tool: 'report_folders',
    hint: 'The pdfs/ path must be a readable directory; check permissions and that it is not a file',
  },
  OUTPUT_WRITE_ERROR: {
    tool: 'report_health',
    hint: 'Check write permissions on the job folder',
  },
  PDF_OPEN_ERROR: { tool: 'report_folders', hint: 'Replace or remove the unreadable PDF' },
  PDF_READ_ERROR: { tool: 'report_folders', hint: 'Replace or remove the unreadable PDF' },
  JOB_NOT_FOUND: {
    tool: 'report_process',
    hint: 'Job IDs expire after REPORT_MERGE_JOB_TTL_MS; start a new job with report_process',
  },
  JOB_INVALID_TRANSITION: {
    tool: 'report_process_status',
    hint: 'Check the job status with report_process_status',
  },
  JOB_CAPACITY_EXCEEDED: {
    tool: 'report_health',
    hint: 'Wait for running jobs to finish or raise REPORT_MERGE_MAX_JOBS',
  },
  CONFIGURATION_ERROR: {
    tool: 'report_health',
    hint: 'Check REPORT_MERGE_* environment variables',
  },
  INTERNAL_ERROR: { tool: 'report_health', hint: 'Run report_health for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response, always with a recovery hint
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

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function jobNotFoundError(jobId: string): MCPError {
  return new MCPError(
    'JOB_NOT_FOUND',
    `Job not found: ${jobId}. It may have expired; start a new one with report_process.`,
    { jobId }
  );
}
