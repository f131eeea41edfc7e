/**
 * @fileoverview INI parser
 *
 * Recursive descent over the token array, one method per production of the
 * grammar in `grammar.ts`. The only ambiguity is a run of comment lines,
 * which looks the same before a property and before a section header;
 * `peekConstruct` skips the run and reports which production follows.
 *
 * @packageDocumentation
 */

import { ParseError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import { IniDocument } from './document.js';
import { INI_PRODUCTIONS, describeTerminal } from './grammar.js';
import { unquoteString } from './strings.js';
import { tokenize, type EmittedTokenType, type Token } from './tokenizer.js';
import type { IniDocumentNode, IniProperty, IniSection, IniValue } from './types.js';

// ============================================================================
// LOOKAHEAD
// ============================================================================

export type ConstructKind =
  /** `Ident` follows: a property. */
  | 'property'
  /** `[` follows: a section header. */
  | 'section'
  /** End of input with no pending comments. */
  | 'end'
  /** Comments followed by a blank line or the end of input. */
  | 'dangling-comment'
  | 'unexpected';

export interface ConstructPeek {
  kind: ConstructKind;
  /** Index of the token that decided `kind`. */
  index: number;
  /** Number of `Comment NewLine` pairs skipped to reach it. */
  commentLines: number;
}

/**
 * Classify the construct starting at `start` without consuming anything.
 * Skips interleaved `Comment NewLine` pairs, then looks at the first token
 * past them.
 */
export function peekConstruct(tokens: readonly Token[], start: number): ConstructPeek {
  let index = start;
  let commentLines = 0;
  while (
    index + 1 < tokens.length &&
    tokens[index].type === 'Comment' &&
    tokens[index + 1].type === 'NewLine'
  ) {
    index += 2;
    commentLines += 1;
  }

  const token = tokens[index];
  const peek = (kind: ConstructKind): ConstructPeek => ({ kind, index, commentLines });

  switch (token.type) {
    case 'Ident':
      return peek('property');
    case 'Punct':
      return peek(token.value === '[' ? 'section' : 'unexpected');
    case 'EOF':
      return peek(commentLines > 0 ? 'dangling-comment' : 'end');
    case 'Comment':
      // A comment on the last line, with no newline after it.
      return peek('dangling-comment');
    case 'NewLine':
      return peek(commentLines > 0 ? 'dangling-comment' : 'unexpected');
    default:
      return peek('unexpected');
  }
}

// ============================================================================
// PARSER
// ============================================================================

function describeToken(token: Token): string {
  switch (token.type) {
    case 'EOF':
      return 'end of input';
    case 'NewLine':
      return 'newline';
    case 'Punct':
      return `"${token.value}"`;
    case 'Ident':
      return `identifier ${JSON.stringify(token.value)}`;
    case 'String':
      return `string ${token.value}`;
    case 'Number':
      return `number ${token.value}`;
    case 'Comment':
      return `comment ${JSON.stringify(token.value)}`;
  }
}

/** What may follow the global properties or a complete section. */
const DOCUMENT_CONTINUATION: readonly string[] = ['Comment', 'Ident', '[', 'EOF'];

function expectedList(symbols: readonly string[]): string[] {
  return symbols.map(describeTerminal);
}

class IniParser {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  // Document := BlankLine* Property* Section*
  parseDocument(): IniDocumentNode {
    const blankLines = this.parseBlankLines();
    const properties = this.parseProperties();
    const sections: IniSection[] = [];

    for (;;) {
      const next = peekConstruct(this.tokens, this.index);
      if (next.kind === 'section') {
        sections.push(this.parseSection());
        continue;
      }
      if (next.kind === 'end') {
        return { blankLines, properties, sections };
      }
      throw this.constructError(next, DOCUMENT_CONTINUATION);
    }
  }

  // Property* (stops before anything that is not a property)
  private parseProperties(): IniProperty[] {
    const properties: IniProperty[] = [];
    while (peekConstruct(this.tokens, this.index).kind === 'property') {
      properties.push(this.parseProperty());
    }
    return properties;
  }

  // Property := (Comment Newline)* Ident '=' Value Newline? BlankLine*
  private parseProperty(): IniProperty {
    const comments = this.parseComments();
    const key = this.expect('Ident').value;
    this.expectPunct('=');
    const value = this.parseValue();
    this.accept('NewLine');
    const blankLines = this.parseBlankLines();
    return { comments, key, value, blankLines };
  }

  // Section := (Comment Newline)* '[' Ident ']' Newline? BlankLine* Property*
  private parseSection(): IniSection {
    const comments = this.parseComments();
    this.expectPunct('[');
    const name = this.expect('Ident').value;
    const close = this.current();
    if (close.type !== 'Punct' || close.value !== ']') {
      throw new ParseError(
        close.pos,
        `unclosed section bracket for [${name}: expected "]" but found ${describeToken(close)}`,
        [describeTerminal(']')],
      );
    }
    this.index += 1;
    this.accept('NewLine');
    const blankLines = this.parseBlankLines();
    const properties = this.parseProperties();
    return { comments, name, blankLines, properties };
  }

  // Value := StringLiteral | NumberLiteral
  private parseValue(): IniValue {
    const token = this.current();
    if (token.type === 'String') {
      this.index += 1;
      return { kind: 'string', value: unquoteString(token.value, token.pos) };
    }
    if (token.type === 'Number') {
      const value = Number(token.value);
      if (!Number.isFinite(value)) {
        throw new ParseError(token.pos, `number ${token.value} is out of range`, expectedList(INI_PRODUCTIONS.Value));
      }
      this.index += 1;
      return { kind: 'number', value };
    }
    throw this.unexpected(token, INI_PRODUCTIONS.Value);
  }

  private parseComments(): string[] {
    const comments: string[] = [];
    while (this.current().type === 'Comment' && this.peek(1).type === 'NewLine') {
      comments.push(this.current().value);
      this.index += 2;
    }
    return comments;
  }

  private parseBlankLines(): string[] {
    const blankLines: string[] = [];
    let token = this.current();
    while (token.type === 'NewLine') {
      blankLines.push(token.value);
      this.index += 1;
      token = this.current();
    }
    return blankLines;
  }

  private current(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private peek(distance: number): Token {
    return this.tokens[Math.min(this.index + distance, this.tokens.length - 1)];
  }

  private accept(type: EmittedTokenType): boolean {
    if (this.current().type !== type) return false;
    this.index += 1;
    return true;
  }

  private expect(type: EmittedTokenType): Token {
    const token = this.current();
    if (token.type !== type) {
      throw this.unexpected(token, [type]);
    }
    this.index += 1;
    return token;
  }

  private expectPunct(symbol: string): Token {
    const token = this.current();
    if (token.type !== 'Punct' || token.value !== symbol) {
      throw this.unexpected(token, [symbol]);
    }
    this.index += 1;
    return token;
  }

  private unexpected(token: Token, expected: readonly string[]): ParseError {
    const names = expectedList(expected);
    return new ParseError(
      token.pos,
      `unexpected ${describeToken(token)}, expected ${names.join(' or ')}`,
      names,
    );
  }

  private constructError(next: ConstructPeek, expected: readonly string[]): ParseError {
    if (next.kind === 'dangling-comment') {
      const first = this.tokens[this.index];
      return new ParseError(
        first.pos,
        'comment must be directly followed by a property or a section header',
        expectedList(['Ident', '[']),
      );
    }
    return this.unexpected(this.tokens[next.index], expected);
  }
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Parse INI text into a plain document tree.
 *
 * @param sourceLabel - name reported in error positions, not interpreted
 * @throws LexError when the text contains a character sequence no rule matches
 * @throws ParseError when the tokens do not fit the grammar
 */
export function parseDocumentNode(sourceLabel: string, text: string): IniDocumentNode {
  const tokens = tokenize(text, sourceLabel).toArray();
  return new IniParser(tokens).parseDocument();
}

/**
 * Parse INI text into an editable {@link IniDocument}.
 *
 * @throws LexError when the text contains a character sequence no rule matches
 * @throws ParseError when the tokens do not fit the grammar
 */
export function parseIni(sourceLabel: string, text: string): IniDocument {
  const document = new IniDocument(parseDocumentNode(sourceLabel, text));
  logDebug('[ini] parsed document', {
    source: sourceLabel,
    properties: document.properties.length,
    sections: document.sections.length,
  });
  return document;
}

/** {@link parseIni} with the failure returned as a value. */
export function tryParseIni(sourceLabel: string, text: string): Result<IniDocument, ParseError> {
  try {
    return Ok(parseIni(sourceLabel, text));
  } catch (error) {
    if (error instanceof ParseError) {
      return Err(error);
    }
    throw error;
  }
}
