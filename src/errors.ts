export type DeclarationErrorCode =
  | 'DUPLICATE_NAME'
  | 'INVALID_NAME'
  | 'NO_COERCER'
  | 'DANGLING_GROUP'
  | 'UNGROUPED_OPTION'
  | 'UNBOUND_LIST'
  | 'UNKNOWN_GROUP';

export type ParseErrorCode =
  | 'UNKNOWN_OPTION'
  | 'MISSING_VALUE'
  | 'INVALID_VALUE'
  | 'REPEATED_OPTION';

export type CoercionErrorCode = 'MALFORMED' | 'OUT_OF_RANGE' | 'NOT_ALLOWED' | 'NO_COERCER' | 'TYPE_MISMATCH';

export type DocToolErrorCode =
  | 'CONFLICTING_FLAGS'
  | 'FILE_NOT_FOUND'
  | 'UNKNOWN_FORMAT'
  | 'NO_MODULES'
  | 'NO_OPTIONS'
  | 'INVALID_MODULE';

/**
 * Base class for every error raised by the option framework.
 * `code` identifies the failure, `details` carries the offending values.
 */
export class OptionError<C extends string = string> extends Error {
  readonly code: C;
  readonly details: Record<string, unknown>;

  constructor(code: C, message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'OptionError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Raised while building a registry from option declarations. */
export class DeclarationError extends OptionError<DeclarationErrorCode> {
  constructor(code: DeclarationErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
    this.name = 'DeclarationError';
  }
}

/** Raised by `Options.parse` for a malformed argument vector. */
export class ParseError extends OptionError<ParseErrorCode> {
  /** The argument that could not be processed. */
  readonly token: string;

  constructor(code: ParseErrorCode, token: string, message: string, cause?: unknown) {
    super(code, message, { token }, cause);
    this.name = 'ParseError';
    this.token = token;
  }
}

/** Raised when text cannot be converted to an option's type. */
export class CoercionError extends OptionError<CoercionErrorCode> {
  constructor(code: CoercionErrorCode, message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(code, message, details, cause);
    this.name = 'CoercionError';
  }
}

/** Misconfiguration of the documentation tool, detected before any file is touched. */
export class DocToolError extends OptionError<DocToolErrorCode> {
  constructor(code: DocToolErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
    this.name = 'DocToolError';
  }
}

/**
 * Message of an unknown thrown value, for CLI boundaries.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
