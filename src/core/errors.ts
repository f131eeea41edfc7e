/**
 * @fileoverview ini-roundtrip error hierarchy
 *
 * Typed, structured errors for every failure the library can report.
 * Per-input failures are `ParseError` (and its lexical subclass `LexError`);
 * `GrammarDefinitionError` is reserved for a broken grammar table and only
 * surfaces while the grammar module initializes.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

/** Location of a token or failure in the source text. */
export interface SourcePosition {
  /** Caller-supplied label for the text (usually a file name). */
  filename: string;
  /** Zero-based offset in UTF-16 code units. */
  offset: number;
  /** One-based line. */
  line: number;
  /** One-based column. */
  column: number;
}

export function formatPosition(pos: SourcePosition): string {
  const label = pos.filename.length > 0 ? pos.filename : '<input>';
  return `${label}:${pos.line}:${pos.column}`;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class IniError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// PARSE ERRORS
// ============================================================================

export class ParseError extends IniError {
  readonly code: string = 'PARSE_ERROR';
  readonly retryable = false;

  constructor(
    readonly position: SourcePosition,
    readonly detail: string,
    readonly expected: readonly string[] = [],
  ) {
    super(`${formatPosition(position)}: ${detail}`);
    this.name = 'ParseError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        filename: this.position.filename,
        offset: this.position.offset,
        line: this.position.line,
        column: this.position.column,
        expected: [...this.expected],
      },
    };
  }
}

// ============================================================================
// LEX ERRORS
// ============================================================================

/** No token rule matches the remaining input. */
export class LexError extends ParseError {
  readonly code: string = 'LEX_ERROR';

  constructor(position: SourcePosition, detail: string) {
    super(position, detail);
    this.name = 'LexError';
  }
}

// ============================================================================
// GRAMMAR DEFINITION ERRORS
// ============================================================================

export class GrammarDefinitionError extends IniError {
  readonly code = 'GRAMMAR_DEFINITION_ERROR';
  readonly retryable = false;

  constructor(
    readonly rule: string,
    message: string,
  ) {
    super(`Grammar rule ${rule} is invalid: ${message}`);
    this.name = 'GrammarDefinitionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        rule: this.rule,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends IniError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends IniError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isIniError(error: unknown): error is IniError {
  return error instanceof IniError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isLexError(error: unknown): error is LexError {
  return error instanceof LexError;
}
