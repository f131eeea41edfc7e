/**
 * @fileoverview INI grammar definition
 *
 * The token rule table and the FIRST sets of the productions:
 *
 * ```
 * Document   := BlankLine* Property* Section*
 * Property   := (Comment Newline)* Ident '=' Value Newline? BlankLine*
 * Section    := (Comment Newline)* '[' Ident ']' Newline? BlankLine* Property*
 * Value      := StringLiteral | NumberLiteral
 * ```
 *
 * The table is compiled and checked once, when this module loads. A broken
 * table throws `GrammarDefinitionError` out of the import, so it can never
 * surface as a per-input failure.
 *
 * @packageDocumentation
 */

import { GrammarDefinitionError } from '../core/errors.js';
import { logError } from '../telemetry/logger.js';

// ============================================================================
// TOKEN RULES
// ============================================================================

export type TokenType = 'Ident' | 'String' | 'Number' | 'Punct' | 'Comment' | 'NewLine' | 'Whitespace';

export interface TokenRule {
  name: TokenType;
  /** Regular expression source, matched at the current offset. */
  pattern: string;
  /** Matched but never emitted. */
  skip?: boolean;
}

/** Rules are tried in order; the first non-empty match wins. */
export const INI_TOKEN_RULES: readonly TokenRule[] = [
  { name: 'Ident', pattern: String.raw`[A-Za-z][A-Za-z0-9_]*` },
  { name: 'String', pattern: String.raw`"(?:\\[\s\S]|[^"\\])*"` },
  { name: 'Number', pattern: String.raw`\d+(?:\.\d+)?` },
  { name: 'Punct', pattern: String.raw`[\[\]=]` },
  { name: 'Comment', pattern: String.raw`[#;][^\r\n]*` },
  { name: 'NewLine', pattern: String.raw`\r?\n` },
  { name: 'Whitespace', pattern: String.raw`[\t ]+`, skip: true },
];

export const INI_PUNCTUATION = ['[', ']', '='] as const;

export type Punctuation = (typeof INI_PUNCTUATION)[number];

const PUNCTUATION_SET: ReadonlySet<string> = new Set(INI_PUNCTUATION);

/** Terminals each production can start with. */
export const INI_PRODUCTIONS = {
  Document: ['NewLine', 'Comment', 'Ident', '['],
  Property: ['Comment', 'Ident'],
  Section: ['Comment', '['],
  Value: ['String', 'Number'],
} as const;

export type ProductionName = keyof typeof INI_PRODUCTIONS;

const REQUIRED_TOKEN_TYPES: readonly TokenType[] = ['Ident', 'String', 'Number', 'Punct', 'Comment', 'NewLine'];

// ============================================================================
// COMPILATION
// ============================================================================

export interface CompiledRule {
  name: TokenType;
  /** Sticky expression; set `lastIndex` before calling `exec`. */
  regex: RegExp;
  skip: boolean;
}

export interface CompiledGrammar {
  rules: readonly CompiledRule[];
}

function matchesWhole(pattern: string, text: string): boolean {
  return new RegExp(`^(?:${pattern})$`).test(text);
}

/**
 * Compile and check a grammar table.
 *
 * @throws GrammarDefinitionError when a rule does not compile, matches the
 * empty string, or repeats a name; when a required token type has no rule;
 * when a punctuation symbol is not produced by the `Punct` rule; or when a
 * production starts with an unknown terminal.
 */
export function compileGrammar(
  rules: readonly TokenRule[],
  punctuation: readonly string[] = INI_PUNCTUATION,
  productions: Readonly<Record<string, readonly string[]>> = INI_PRODUCTIONS,
): CompiledGrammar {
  const seen = new Set<TokenType>();
  const compiled: CompiledRule[] = [];

  for (const rule of rules) {
    if (seen.has(rule.name)) {
      throw new GrammarDefinitionError(rule.name, 'duplicate rule name');
    }
    seen.add(rule.name);

    let regex: RegExp;
    try {
      regex = new RegExp(rule.pattern, 'y');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new GrammarDefinitionError(rule.name, `pattern does not compile (${reason})`);
    }
    if (matchesWhole(rule.pattern, '')) {
      throw new GrammarDefinitionError(rule.name, 'pattern matches the empty string');
    }
    compiled.push({ name: rule.name, regex, skip: rule.skip ?? false });
  }

  for (const required of REQUIRED_TOKEN_TYPES) {
    if (!seen.has(required)) {
      throw new GrammarDefinitionError(required, 'no rule defines this token type');
    }
  }

  const punct = rules.find((rule) => rule.name === 'Punct');
  for (const symbol of punctuation) {
    if (!punct || !matchesWhole(punct.pattern, symbol)) {
      throw new GrammarDefinitionError('Punct', `does not match punctuation "${symbol}"`);
    }
  }

  const terminals = new Set<string>([...seen, ...punctuation]);
  for (const [production, first] of Object.entries(productions)) {
    for (const symbol of first) {
      if (!terminals.has(symbol)) {
        throw new GrammarDefinitionError(production, `starts with unknown terminal "${symbol}"`);
      }
    }
  }

  return { rules: compiled };
}

function initializeGrammar(): CompiledGrammar {
  try {
    return compileGrammar(INI_TOKEN_RULES);
  } catch (error) {
    logError('[ini] grammar definition is invalid; aborting initialization', {
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

/** Grammar used by the tokenizer and parser, validated at load time. */
export const INI_GRAMMAR: CompiledGrammar = initializeGrammar();

/** Human-readable name of a terminal, for error messages. */
export function describeTerminal(symbol: string): string {
  return PUNCTUATION_SET.has(symbol) ? `"${symbol}"` : symbol;
}
