/**
 * @fileoverview Core infrastructure
 *
 * Result types and the error hierarchy shared by the tokenizer, parser,
 * editor and configuration modules.
 */

// Result types and helpers
export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  mapResult,
  unwrap,
  unwrapOr,
  isOk,
  isErr,
} from './result.js';

// Error types
export {
  type ErrorJSON,
  type SourcePosition,
  formatPosition,
  IniError,
  ParseError,
  LexError,
  GrammarDefinitionError,
  ValidationError,
  ConfigurationError,
  isIniError,
  isParseError,
  isLexError,
} from './errors.js';
