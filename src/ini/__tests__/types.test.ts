import { describe, it, expect } from 'vitest';
import {
  createProperty,
  createSection,
  documentsEqual,
  isIniValue,
  isNumberValue,
  isStringValue,
  numberValue,
  propertiesEqual,
  sectionsEqual,
  stringValue,
  valuesEqual,
  type IniDocumentNode,
} from '../types.js';
import { ValidationError } from '../../core/errors.js';

describe('value factories', () => {
  it('tags strings and numbers', () => {
    expect(stringValue('x')).toEqual({ kind: 'string', value: 'x' });
    expect(numberValue(0.5)).toEqual({ kind: 'number', value: 0.5 });
  });

  it('rejects numbers the grammar cannot write', () => {
    expect(() => numberValue(-1)).toThrow(ValidationError);
    expect(() => numberValue(Number.NaN)).toThrow(
      'Validation failed for value: expected a finite, non-negative number, got NaN',
    );
    expect(() => numberValue(Number.POSITIVE_INFINITY)).toThrow(ValidationError);
  });
});

describe('type guards', () => {
  it('narrows by kind', () => {
    expect(isStringValue(stringValue('1'))).toBe(true);
    expect(isStringValue(numberValue(1))).toBe(false);
    expect(isNumberValue(numberValue(1))).toBe(true);
  });

  it('recognizes values in unknown data', () => {
    expect(isIniValue({ kind: 'string', value: 'a' })).toBe(true);
    expect(isIniValue({ kind: 'number', value: 2 })).toBe(true);
    expect(isIniValue({ kind: 'number', value: '2' })).toBe(false);
    expect(isIniValue({ kind: 'bool', value: true })).toBe(false);
    expect(isIniValue(null)).toBe(false);
    expect(isIniValue('a')).toBe(false);
  });
});

describe('node factories', () => {
  it('creates nodes without comments or blank lines', () => {
    const prop = createProperty('k', numberValue(1));

    expect(prop).toEqual({ comments: [], key: 'k', value: { kind: 'number', value: 1 }, blankLines: [] });
    expect(createSection('s')).toEqual({ comments: [], name: 's', blankLines: [], properties: [] });
    expect(createSection('s', [prop]).properties[0]).toBe(prop);
  });
});

describe('structural equality', () => {
  it('compares values by kind and content', () => {
    expect(valuesEqual(stringValue('1'), stringValue('1'))).toBe(true);
    expect(valuesEqual(stringValue('1'), numberValue(1))).toBe(false);
    expect(valuesEqual(numberValue(1), numberValue(1.0))).toBe(true);
  });

  it('compares comments and blank lines of properties and sections', () => {
    const a = createProperty('k', numberValue(1));
    const b = { ...createProperty('k', numberValue(1)), comments: ['# c'] };

    expect(propertiesEqual(a, createProperty('k', numberValue(1)))).toBe(true);
    expect(propertiesEqual(a, b)).toBe(false);
    expect(sectionsEqual(createSection('s', [a]), createSection('s', [b]))).toBe(false);
    expect(sectionsEqual(createSection('s'), { ...createSection('s'), blankLines: ['\n'] })).toBe(false);
  });

  it('ignores leading blank lines unless asked', () => {
    const a: IniDocumentNode = { blankLines: ['\n'], properties: [], sections: [createSection('s')] };
    const b: IniDocumentNode = { blankLines: [], properties: [], sections: [createSection('s')] };

    expect(documentsEqual(a, b)).toBe(true);
    expect(documentsEqual(a, b, { includeLeadingBlankLines: true })).toBe(false);
    expect(documentsEqual(a, { ...b, sections: [] })).toBe(false);
  });
});
