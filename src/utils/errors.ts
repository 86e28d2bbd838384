/**
 * Error types and codes for canon-check.
 * Every error thrown by the tool extends CanonCheckError. Problems found in
 * the documentation itself are findings, not errors.
 */

/**
 * Base error class for all canon-check errors.
 */
export class CanonCheckError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CanonCheckError';
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
export class ConfigError extends CanonCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * External tool errors (spawn failures other than a missing binary).
 */
export class ToolError extends CanonCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ToolError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends CanonCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Finding codes (D001-D099): documentation problems reported per file
  REST_INVALID: 'D001',
  OPENAPI_INVALID: 'D002',
  GRAPHQL_INVALID: 'D003',
  PROTO_INVALID: 'D004',
  MARKDOWN_INVALID: 'D005',
  SPHINX_FAILED: 'D006',
  ACCESS_LEVEL_MISSING: 'D007',
  EMOJI_FOUND: 'D008',
  EM_DASH_FOUND: 'D009',
  FORBIDDEN_PATTERN: 'D010',
  ACCESS_LEVEL_UNKNOWN: 'D011',

  // Environment warnings (W001-W099)
  TOOL_MISSING: 'W001',
  DIRECTORY_MISSING: 'W002',
  SPHINX_CONFIG_MISSING: 'W003',

  // Success marker
  PASSED: 'P000',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_EXISTS: 'C002',

  // Tool errors
  TOOL_SPAWN_FAILED: 'T001',

  // System errors
  PARSE_ERROR: 'S001',
  INVALID_SCHEMA: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
