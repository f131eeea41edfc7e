/**
 * @fileoverview INI tokenizer
 *
 * Turns raw text into classified tokens. Horizontal whitespace is consumed
 * but never emitted. The stream always ends with one `EOF` token.
 *
 * @packageDocumentation
 */

import { LexError, type SourcePosition } from '../core/errors.js';
import { INI_GRAMMAR, type CompiledGrammar, type TokenType } from './grammar.js';

export type EmittedTokenType = Exclude<TokenType, 'Whitespace'> | 'EOF';

export interface Token {
  type: EmittedTokenType;
  /** Source text of the token, empty for `EOF`. */
  value: string;
  pos: SourcePosition;
}

/**
 * Lazy token sequence over a string. Each iteration starts again from the
 * beginning of the text, so the stream can be consumed more than once.
 */
export class TokenStream implements Iterable<Token> {
  constructor(
    readonly text: string,
    readonly filename: string = '',
    private readonly grammar: CompiledGrammar = INI_GRAMMAR,
  ) {}

  *[Symbol.iterator](): Generator<Token, void, undefined> {
    const { text, filename } = this;
    let offset = 0;
    let line = 1;
    let lineStart = 0;

    const positionAt = (at: number): SourcePosition => ({
      filename,
      offset: at,
      line,
      column: at - lineStart + 1,
    });

    while (offset < text.length) {
      const match = this.matchAt(offset);
      if (!match) {
        const ch = text[offset];
        if (ch === '"') {
          throw new LexError(positionAt(offset), 'unterminated string literal');
        }
        throw new LexError(positionAt(offset), `unexpected character ${JSON.stringify(ch)}`);
      }

      const { type, value, skip } = match;
      const end = offset + value.length;
      if (type === 'Number' && text[end] === '.') {
        throw new LexError(positionAt(offset), `malformed number "${value}."`);
      }
      if (!skip && type !== 'Whitespace') {
        yield { type, value, pos: positionAt(offset) };
      }

      const lastNewLine = value.lastIndexOf('\n');
      if (lastNewLine !== -1) {
        for (const ch of value) {
          if (ch === '\n') line += 1;
        }
        lineStart = offset + lastNewLine + 1;
      }
      offset = end;
    }

    yield { type: 'EOF', value: '', pos: positionAt(offset) };
  }

  toArray(): Token[] {
    return [...this];
  }

  private matchAt(offset: number): { type: TokenType; value: string; skip: boolean } | null {
    for (const rule of this.grammar.rules) {
      rule.regex.lastIndex = offset;
      const match = rule.regex.exec(this.text);
      if (match && match[0].length > 0) {
        return { type: rule.name, value: match[0], skip: rule.skip };
      }
    }
    return null;
  }
}

export function tokenize(text: string, filename = ''): TokenStream {
  return new TokenStream(text, filename);
}
