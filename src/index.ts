/**
 * @fileoverview ini-roundtrip - Comment-preserving INI editing
 *
 * Parses INI text into a tree that keeps every comment and blank line next
 * to the node it belongs to, edits the tree by key path, and renders it back
 * in a canonical layout.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { parseIni, stringValue, numberValue } from 'ini-roundtrip';
 *
 * const doc = parseIni('settings.ini', text);
 *
 * doc.add('server/port', numberValue(8080));
 * doc.add('server/host', stringValue('localhost'));
 * doc.remove('legacy_flag');
 *
 * const updated = doc.render();
 * ```
 *
 * @packageDocumentation
 */

export * from './ini/index.js';

export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  isOk,
  isErr,
  unwrap,
  unwrapOr,
  mapResult,
  type ErrorJSON,
  type SourcePosition,
  IniError,
  ParseError,
  LexError,
  GrammarDefinitionError,
  ValidationError,
  ConfigurationError,
  isIniError,
  isParseError,
  isLexError,
} from './core/index.js';

export {
  type IniRoundtripConfig,
  type LogLevel,
  LOG_LEVELS,
  loadConfig,
  getConfig,
  resetConfig,
} from './config/index.js';
