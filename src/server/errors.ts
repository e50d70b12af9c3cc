/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Handlers convert them into structured error responses with a recovery
 * hint; the metrics core itself never throws for valid strings.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Bad tool parameters
  | 'VALIDATION_ERROR'

  // A text exceeds the configured size limit
  | 'INPUT_TOO_LARGE'

  // Environment / startup configuration
  | 'CONFIGURATION_ERROR'

  // Anything unexpected
  | 'INTERNAL_ERROR';

/**
 * Map custom error class names to MCPError categories.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
};

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

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
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
    tool: 'ocr_accuracy_calculate',
    hint: 'Check parameter types and required fields (ground_truth and predicted are strings)',
  },
  INPUT_TOO_LARGE: {
    tool: 'ocr_config_set',
    hint: 'Split the text into pages or the run into smaller batches, or raise max_input_chars / max_comparison_cells / max_batch_size via ocr_config_set',
  },
  CONFIGURATION_ERROR: {
    tool: 'ocr_config_get',
    hint: 'Check OCR_ACCURACY_* environment variables; values must be positive integers or true/false',
  },
  INTERNAL_ERROR: { tool: 'ocr_config_get', hint: 'Inspect server stderr for the stack trace' },
};

/**
 * Get recovery hint for an error category.
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
      recovery: getRecoveryHint(error.category),
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create error for a text or batch over the configured limit
 */
export function inputTooLargeError(field: string, size: number, limit: number): MCPError {
  return new MCPError('INPUT_TOO_LARGE', `${field} exceeds the limit of ${limit} (got ${size})`, {
    field,
    size,
    limit,
  });
}

/**
 * Create error for texts whose edit-distance tables exceed the configured budget
 */
export function comparisonTooLargeError(field: string, cells: number, limit: number): MCPError {
  return new MCPError(
    'INPUT_TOO_LARGE',
    `${field} need ${cells} comparison cells, over the limit of ${limit}`,
    { field, cells, limit }
  );
}

/**
 * Create configuration error for invalid environment variables or setup issues
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
