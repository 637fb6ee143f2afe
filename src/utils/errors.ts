/**
 * Error types and codes for rulenest.
 *
 * The engine itself never throws for rule-content problems; these errors are
 * raised by the host layers (configuration, rule sources, CLI).
 */

/**
 * Base error class for all rulenest errors.
 */
export class RuleNestError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RuleNestError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends RuleNestError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Hierarchy errors surfaced to callers that asked for a rule by path.
 */
export class HierarchyError extends RuleNestError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'HierarchyError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends RuleNestError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // System errors (S001-S004)
  PARSE_ERROR: 'S001',
  READ_ERROR: 'S002',
  INVALID_CONFIG: 'S003',
  CONFIG_LOAD_ERROR: 'S004',

  // Hierarchy errors (H001)
  UNKNOWN_RULE: 'H001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
