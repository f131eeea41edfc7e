/**
 * @fileoverview String literal escaping
 *
 * `unquoteString` reads a double-quoted literal as produced by the tokenizer;
 * `quoteString` writes one back. Every escape `quoteString` emits is accepted
 * by `unquoteString`.
 */

import { ParseError, type SourcePosition } from '../core/errors.js';

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  "'": "'",
  '\\': '\\',
  '/': '/',
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  v: '\v',
  '0': '\0',
};

const HEX_RE = /^[0-9A-Fa-f]+$/;

/** Position of `literal[index]`, given the position of `literal[0]`. */
function positionWithin(start: SourcePosition, literal: string, index: number): SourcePosition {
  const before = literal.slice(0, index);
  const lastNewLine = before.lastIndexOf('\n');
  if (lastNewLine === -1) {
    return { ...start, offset: start.offset + index, column: start.column + index };
  }
  let newLines = 0;
  for (const ch of before) {
    if (ch === '\n') newLines += 1;
  }
  return {
    filename: start.filename,
    offset: start.offset + index,
    line: start.line + newLines,
    column: index - lastNewLine,
  };
}

/**
 * Unescape a double-quoted literal, quotes included.
 *
 * @throws ParseError on an unknown or truncated escape sequence
 */
export function unquoteString(literal: string, pos: SourcePosition): string {
  let out = '';
  let i = 1;
  const end = literal.length - 1;

  const invalid = (at: number, detail: string): ParseError =>
    new ParseError(positionWithin(pos, literal, at), detail);

  const readHex = (from: number, length: number): number => {
    const digits = literal.slice(from, from + length);
    if (from + length > end || !HEX_RE.test(digits)) {
      throw invalid(from - 2, `invalid escape sequence "${literal.slice(from - 2, from + length)}"`);
    }
    return Number.parseInt(digits, 16);
  };

  while (i < end) {
    const ch = literal[i];
    if (ch !== '\\') {
      out += ch;
      i += 1;
      continue;
    }

    const next = literal[i + 1];
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }

    if (next === 'x') {
      out += String.fromCharCode(readHex(i + 2, 2));
      i += 4;
      continue;
    }

    if (next === 'u' && literal[i + 2] === '{') {
      const close = literal.indexOf('}', i + 3);
      const digits = close === -1 ? '' : literal.slice(i + 3, close);
      const codePoint = HEX_RE.test(digits) ? Number.parseInt(digits, 16) : Number.NaN;
      if (close === -1 || close > end || !(codePoint <= 0x10ffff)) {
        throw invalid(i, `invalid escape sequence "${literal.slice(i, close === -1 ? end : close + 1)}"`);
      }
      out += String.fromCodePoint(codePoint);
      i = close + 1;
      continue;
    }

    if (next === 'u') {
      out += String.fromCharCode(readHex(i + 2, 4));
      i += 6;
      continue;
    }

    throw invalid(i, `invalid escape sequence "\\${next}"`);
  }

  return out;
}

/** Double-quote `value`, escaping quotes, backslashes and control characters. */
export function quoteString(value: string): string {
  return JSON.stringify(value);
}
