/**
 * @fileoverview Canonical INI encoder
 *
 * Output rules:
 * - leading blank lines of the document are dropped;
 * - `[name]` headers and `key = value` lines, each ending in `\n`;
 * - comments verbatim above their node, blank lines as empty lines below it;
 * - strings double-quoted and escaped, numbers in shortest positional form.
 *
 * @packageDocumentation
 */

import { quoteString } from './strings.js';
import {
  assertNever,
  type IniDocumentNode,
  type IniProperty,
  type IniSection,
  type IniValue,
} from './types.js';

/**
 * Shortest decimal that reads back as the same number, without exponent
 * notation: `1.5`, `100`, `0.0000001`, never `1e-7`.
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  const sign = value < 0 ? '-' : '';
  const [mantissa, exponentText] = Math.abs(value).toExponential().split('e');
  const digits = mantissa.replace('.', '');
  const exponent = Number(exponentText);

  if (exponent >= digits.length - 1) {
    return sign + digits + '0'.repeat(exponent - digits.length + 1);
  }
  if (exponent >= 0) {
    return `${sign}${digits.slice(0, exponent + 1)}.${digits.slice(exponent + 1)}`;
  }
  return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
}

export function renderValue(value: IniValue): string {
  switch (value.kind) {
    case 'string':
      return quoteString(value.value);
    case 'number':
      return formatNumber(value.value);
    default:
      return assertNever(value);
  }
}

function renderComments(comments: readonly string[]): string {
  return comments.map((comment) => `${comment}\n`).join('');
}

function renderBlankLines(blankLines: readonly string[]): string {
  return '\n'.repeat(blankLines.length);
}

export function renderProperty(property: IniProperty): string {
  return (
    renderComments(property.comments) +
    `${property.key} = ${renderValue(property.value)}\n` +
    renderBlankLines(property.blankLines)
  );
}

export function renderSection(section: IniSection): string {
  return (
    renderComments(section.comments) +
    `[${section.name}]\n` +
    renderBlankLines(section.blankLines) +
    section.properties.map(renderProperty).join('')
  );
}

/** Canonical text of the whole document. An empty document renders as `""`. */
export function renderDocument(document: IniDocumentNode): string {
  return (
    document.properties.map(renderProperty).join('') +
    document.sections.map(renderSection).join('')
  );
}
