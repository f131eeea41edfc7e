/**
 * @fileoverview INI Module - Round-trip Parser, Editor and Encoder
 *
 * @packageDocumentation
 */

// Tree model
export {
  type IniValue,
  type IniValueKind,
  type StringValue,
  type NumberValue,
  type IniProperty,
  type IniSection,
  type IniDocumentNode,

  // Factory functions
  stringValue,
  numberValue,
  createProperty,
  createSection,

  // Type guards
  isStringValue,
  isNumberValue,
  isIniValue,

  // Equality
  valuesEqual,
  propertiesEqual,
  sectionsEqual,
  documentsEqual,
} from './types.js';

// Grammar and tokenizer
export {
  type TokenType,
  type TokenRule,
  type CompiledGrammar,
  type CompiledRule,
  INI_TOKEN_RULES,
  INI_PUNCTUATION,
  INI_PRODUCTIONS,
  INI_GRAMMAR,
  compileGrammar,
} from './grammar.js';
export { type Token, type EmittedTokenType, TokenStream, tokenize } from './tokenizer.js';

// Parser
export {
  type ConstructKind,
  type ConstructPeek,
  peekConstruct,
  parseDocumentNode,
  parseIni,
  tryParseIni,
} from './parser.js';

// Editing and encoding
export {
  type KeyPath,
  splitKeyPath,
  lookup,
  lookupSection,
  add,
  remove,
  removeSection,
  removeAt,
} from './editor.js';
export { formatNumber, renderValue, renderProperty, renderSection, renderDocument } from './encoder.js';
export { quoteString, unquoteString } from './strings.js';
export { IniDocument } from './document.js';
