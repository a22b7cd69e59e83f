/**
 * Error types and codes for fncli.
 * Every error the framework raises extends FncliError; the dispatcher maps
 * each family onto an exit status.
 */

/**
 * Base error class for all fncli errors.
 */
export class FncliError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FncliError';
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
 * A command function's declaration or documentation is inconsistent.
 * Raised while the command tree is built, never while a command runs.
 * Error codes: SPEC001-SPEC027
 */
export class SpecificationError extends FncliError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SpecificationError';
  }
}

/**
 * The command line could not be mapped onto a command invocation.
 * Error codes: USE001-USE005
 */
export class UsageError extends FncliError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'UsageError';
  }
}

/**
 * A value could not be converted to or from its text form, or does not
 * match its declared type.
 * Error codes: CNV001-CNV005
 */
export class ConversionError extends FncliError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConversionError';
  }
}

/**
 * The command function itself threw. The thrown value is kept as `cause`.
 */
export class ApplicationError extends FncliError {
  constructor(code: string, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(code, message, details);
    this.name = 'ApplicationError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Configuration and manifest errors (loading, parsing, validation).
 */
export class ConfigError extends FncliError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable files, parse failures).
 * Error codes: SYS001-SYS003
 */
export class SystemError extends FncliError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Specification errors (SPEC001-SPEC027)
  UNDOCUMENTED_FUNCTION: 'SPEC001',
  MALFORMED_DOCSTRING: 'SPEC002',
  UNKNOWN_HEADER: 'SPEC003',
  UNSUPPORTED_HEADER: 'SPEC004',
  DUPLICATE_HEADER: 'SPEC005',
  UNKNOWN_TYPE: 'SPEC006',
  NONE_TYPE: 'SPEC007',
  DUPLICATE_PARAM: 'SPEC008',
  MULTIPLE_DEFAULTS: 'SPEC009',
  PARAM_MISMATCH: 'SPEC010',
  UNENUMERATED_PARAM: 'SPEC011',
  RESERVED_PARAM: 'SPEC012',
  INVALID_COMMAND_NAME: 'SPEC013',
  RESERVED_COMMAND: 'SPEC014',
  DEFAULT_TYPE_MISMATCH: 'SPEC015',
  DEFAULT_VALUE_MISMATCH: 'SPEC016',
  UNSUPPORTED_DEFAULT: 'SPEC017',
  ANNOTATION_MISMATCH: 'SPEC018',
  RETURN_MISMATCH: 'SPEC019',
  IO_PATTERN_CONFLICT: 'SPEC020',
  IO_PARAM_TYPE: 'SPEC021',
  SPARSE_IO_INDICES: 'SPEC022',
  ORPHAN_UNINDEXED_IO: 'SPEC023',
  SHORT_FORM_MISMATCH: 'SPEC024',
  FLAG_COLLISION: 'SPEC025',
  DUPLICATE_COMMAND: 'SPEC026',
  COMMAND_PATH_CONFLICT: 'SPEC027',

  // Usage errors (USE001-USE005)
  UNKNOWN_COMMAND: 'USE001',
  MISSING_ARGUMENT: 'USE002',
  CONFLICTING_ARGUMENTS: 'USE003',
  INCOMPLETE_COMMAND: 'USE004',
  INVALID_ARGUMENT: 'USE005',

  // Conversion errors (CNV001-CNV005)
  UNSUPPORTED_TYPE: 'CNV001',
  NOT_DUCTILE: 'CNV002',
  CONVERSION_FAILED: 'CNV003',
  CYCLIC_VALUE: 'CNV004',
  TYPE_MISMATCH: 'CNV005',

  // Application errors
  APPLICATION_FAILED: 'APP001',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'CFG001',
  INVALID_MANIFEST: 'CFG002',

  // System errors (SYS001-SYS003)
  PARSE_ERROR: 'SYS001',
  FILE_ERROR: 'SYS002',
  MODULE_LOAD_ERROR: 'SYS003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Render an unknown thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
