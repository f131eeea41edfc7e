/**
 * @fileoverview INI tree model
 *
 * In-memory representation of a parsed INI document with the formatting
 * metadata (comments, blank lines) needed to reproduce it. Comments belong to
 * the node they precede; blank lines belong to the node they follow.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../core/errors.js';

// ============================================================================
// VALUES
// ============================================================================

export interface StringValue {
  readonly kind: 'string';
  /** Logical (unescaped) text. */
  readonly value: string;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

/**
 * Value of a property. The union is closed: every consumer switches on `kind`
 * and ends with `assertNever`, so a new variant fails to compile until each
 * consumer handles it.
 */
export type IniValue = StringValue | NumberValue;

export type IniValueKind = IniValue['kind'];

export function stringValue(value: string): StringValue {
  return { kind: 'string', value };
}

/**
 * Numbers are unsigned decimals in the grammar, so negative and non-finite
 * values are rejected.
 */
export function numberValue(value: number): NumberValue {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError('value', 'a finite, non-negative number', String(value));
  }
  return { kind: 'number', value };
}

export function isStringValue(value: IniValue): value is StringValue {
  return value.kind === 'string';
}

export function isNumberValue(value: IniValue): value is NumberValue {
  return value.kind === 'number';
}

export function isIniValue(value: unknown): value is IniValue {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || !('value' in value)) return false;
  return (
    (value.kind === 'string' && typeof value.value === 'string') ||
    (value.kind === 'number' && typeof value.value === 'number')
  );
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled INI value variant: ${JSON.stringify(value)}`);
}

// ============================================================================
// NODES
// ============================================================================

/** Key/value pair, global or inside a section. */
export interface IniProperty {
  /** Comment lines above the property, verbatim including `#` or `;`. */
  comments: string[];
  key: string;
  value: IniValue;
  /** One raw line terminator per blank line below the property. */
  blankLines: string[];
}

/** `[name]` header with the properties that follow it. */
export interface IniSection {
  comments: string[];
  name: string;
  /** Blank lines between the header and the first property. */
  blankLines: string[];
  properties: IniProperty[];
}

/** Plain-data shape of a whole document. */
export interface IniDocumentNode {
  /** Blank lines before any content. Parsed but never rendered. */
  blankLines: string[];
  properties: IniProperty[];
  sections: IniSection[];
}

export function createProperty(key: string, value: IniValue): IniProperty {
  return { comments: [], key, value, blankLines: [] };
}

export function createSection(name: string, properties: IniProperty[] = []): IniSection {
  return { comments: [], name, blankLines: [], properties };
}

// ============================================================================
// EQUALITY
// ============================================================================

export function valuesEqual(a: IniValue, b: IniValue): boolean {
  switch (a.kind) {
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'number':
      return b.kind === 'number' && Object.is(a.value, b.value);
    default:
      return assertNever(a);
  }
}

function linesEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}

export function propertiesEqual(a: IniProperty, b: IniProperty): boolean {
  return (
    a.key === b.key &&
    valuesEqual(a.value, b.value) &&
    linesEqual(a.comments, b.comments) &&
    linesEqual(a.blankLines, b.blankLines)
  );
}

function propertyListsEqual(a: readonly IniProperty[], b: readonly IniProperty[]): boolean {
  return a.length === b.length && a.every((prop, i) => propertiesEqual(prop, b[i]));
}

export function sectionsEqual(a: IniSection, b: IniSection): boolean {
  return (
    a.name === b.name &&
    linesEqual(a.comments, b.comments) &&
    linesEqual(a.blankLines, b.blankLines) &&
    propertyListsEqual(a.properties, b.properties)
  );
}

/**
 * Structural equality. Leading blank lines are ignored unless
 * `includeLeadingBlankLines` is set, since the encoder never emits them.
 */
export function documentsEqual(
  a: IniDocumentNode,
  b: IniDocumentNode,
  options: { includeLeadingBlankLines?: boolean } = {},
): boolean {
  if (options.includeLeadingBlankLines && !linesEqual(a.blankLines, b.blankLines)) {
    return false;
  }
  return (
    propertyListsEqual(a.properties, b.properties) &&
    a.sections.length === b.sections.length &&
    a.sections.every((section, i) => sectionsEqual(section, b.sections[i]))
  );
}
