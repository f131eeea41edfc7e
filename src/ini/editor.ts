/**
 * @fileoverview Structural edits by key path
 *
 * A key path is `"key"` for the global scope or `"section/key"` for a named
 * section; the last `/` separates the two. Lookups and removals act on the
 * first match in file order. Property and section names live in separate
 * namespaces: a path never matches a section and a section name never
 * matches a property.
 *
 * @packageDocumentation
 */

import { logDebug } from '../telemetry/logger.js';
import {
  createProperty,
  createSection,
  type IniDocumentNode,
  type IniProperty,
  type IniSection,
  type IniValue,
} from './types.js';

export interface KeyPath {
  /** Empty for the global scope. */
  section: string;
  key: string;
}

export function splitKeyPath(keyPath: string): KeyPath {
  const slash = keyPath.lastIndexOf('/');
  if (slash === -1) {
    return { section: '', key: keyPath };
  }
  return { section: keyPath.slice(0, slash), key: keyPath.slice(slash + 1) };
}

function indexOfProperty(properties: readonly IniProperty[], key: string): number {
  return properties.findIndex((prop) => prop.key === key);
}

function indexOfSection(sections: readonly IniSection[], name: string): number {
  return sections.findIndex((section) => section.name === name);
}

/**
 * Remove and return `list[index]`, shifting later elements down.
 *
 * @throws RangeError when `index` is not an integer inside the list
 */
export function removeAt<T>(list: T[], index: number): T {
  if (!Number.isInteger(index) || index < 0 || index >= list.length) {
    throw new RangeError(`index ${index} is out of bounds for a list of length ${list.length}`);
  }
  const [removed] = list.splice(index, 1);
  return removed;
}

/**
 * Property list the path addresses, or `undefined` when it names a section
 * that does not exist.
 */
function scopeOf(document: IniDocumentNode, section: string): IniProperty[] | undefined {
  if (section === '') {
    return document.properties;
  }
  return lookupSection(document, section)?.properties;
}

// ============================================================================
// LOOKUP
// ============================================================================

/** First property at `keyPath`, or `undefined`. */
export function lookup(document: IniDocumentNode, keyPath: string): IniProperty | undefined {
  const { section, key } = splitKeyPath(keyPath);
  const properties = scopeOf(document, section);
  if (!properties) return undefined;
  const index = indexOfProperty(properties, key);
  return index === -1 ? undefined : properties[index];
}

/** First section called `name`, or `undefined`. */
export function lookupSection(document: IniDocumentNode, name: string): IniSection | undefined {
  const index = indexOfSection(document.sections, name);
  return index === -1 ? undefined : document.sections[index];
}

// ============================================================================
// ADD
// ============================================================================

/**
 * Set the value at `keyPath`.
 *
 * An existing property keeps its comments and blank lines; only its value
 * changes, and the new value may be of a different kind. A missing key is
 * appended to its scope, and a missing section is appended to the document
 * holding just the new property.
 *
 * Never fails, so names are not checked against the grammar: a key or
 * section name that is not an identifier (`[A-Za-z][A-Za-z0-9_]*`), or a
 * number value built by hand instead of through `numberValue`, renders to
 * text that does not parse again.
 *
 * @returns the property that now holds `value`
 */
export function add(document: IniDocumentNode, keyPath: string, value: IniValue): IniProperty {
  const { section, key } = splitKeyPath(keyPath);
  const properties = scopeOf(document, section);

  if (!properties) {
    const property = createProperty(key, value);
    document.sections.push(createSection(section, [property]));
    return property;
  }

  const index = indexOfProperty(properties, key);
  if (index !== -1) {
    properties[index].value = value;
    return properties[index];
  }

  const property = createProperty(key, value);
  properties.push(property);
  return property;
}

// ============================================================================
// REMOVE
// ============================================================================

/**
 * Remove the first property at `keyPath`, with its comments and blank lines.
 *
 * @returns the removed property, or `undefined` if nothing matched
 */
export function remove(document: IniDocumentNode, keyPath: string): IniProperty | undefined {
  const { section, key } = splitKeyPath(keyPath);
  const properties = scopeOf(document, section);
  const index = properties ? indexOfProperty(properties, key) : -1;
  if (!properties || index === -1) {
    logDebug('[ini] remove: no property at path', { keyPath });
    return undefined;
  }
  return removeAt(properties, index);
}

/**
 * Remove the first section called `name` and everything it owns.
 *
 * @returns the removed section, or `undefined` if nothing matched
 */
export function removeSection(document: IniDocumentNode, name: string): IniSection | undefined {
  const index = indexOfSection(document.sections, name);
  if (index === -1) {
    logDebug('[ini] removeSection: no such section', { name });
    return undefined;
  }
  return removeAt(document.sections, index);
}
