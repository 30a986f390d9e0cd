/**
 * Error types and codes for the command tree loader.
 * All errors raised by the loader extend CommandTreeError.
 */

/**
 * Base error class for all command tree errors.
 */
export class CommandTreeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CommandTreeError';
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
 * A command or group implementation could not be turned into candidates at all.
 * Carries the joined tree path of the element and the root cause.
 */
export class LoadFailure extends CommandTreeError {
  constructor(
    public readonly location: string,
    cause: unknown,
    code: string = ErrorCodes.MODULE_IMPORT_FAILED
  ) {
    super(
      code,
      `Problem loading ${location}: ${describeCause(cause)}.`,
      { location },
      { cause }
    );
    this.name = 'LoadFailure';
  }
}

/**
 * The command tree or a spec document violates a structural rule.
 * Error codes: T001-T009
 */
export class LayoutError extends CommandTreeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'LayoutError';
  }
}

/**
 * The element is well formed but has no implementation for the requested track.
 */
export class ReleaseTrackNotImplementedError extends CommandTreeError {
  constructor(
    public readonly track: string,
    public readonly element: string
  ) {
    super(
      ErrorCodes.RELEASE_TRACK_NOT_IMPLEMENTED,
      `No implementation for release track [${track}] for element: [${element}]`,
      { track, element }
    );
    this.name = 'ReleaseTrackNotImplementedError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends CommandTreeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable files, YAML syntax errors).
 * Error codes: S001-S002
 */
export class SystemError extends CommandTreeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

export const ErrorCodes = {
  // Load failures (L001-L005)
  MODULE_IMPORT_FAILED: 'L001',
  SPEC_GROUP: 'L002',
  NO_TRANSLATOR: 'L003',
  SPLIT_GROUP: 'L004',
  ELEMENT_NOT_FOUND: 'L005',

  // Layout errors (T001-T009)
  ILLEGAL_NAME: 'T001',
  UNEXPECTED_KIND: 'T002',
  MISSING_KIND: 'T003',
  UNTRACKED_IMPLEMENTATION: 'T004',
  DUPLICATE_TRACK: 'T005',
  MISSING_COMMON_DATA: 'T006',
  MISSING_COMMON_ATTRIBUTE: 'T007',
  INVALID_SPEC_DOCUMENT: 'T008',
  UNKNOWN_RELEASE_TRACK: 'T009',

  // Release tracks
  RELEASE_TRACK_NOT_IMPLEMENTED: 'R001',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  READ_ERROR: 'S002',

  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
