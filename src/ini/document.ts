/**
 * @fileoverview Editable INI document
 *
 * `IniDocument` owns the tree produced by the parser and exposes the edit
 * and render operations as methods. Returned properties and sections are
 * live references: changing their `comments` or `blankLines` changes the
 * rendered text.
 *
 * Not synchronized; callers that share a document across tasks must
 * serialize access themselves.
 */

import * as editor from './editor.js';
import { renderDocument } from './encoder.js';
import type { IniDocumentNode, IniProperty, IniSection, IniValue } from './types.js';

export class IniDocument implements IniDocumentNode {
  blankLines: string[];
  properties: IniProperty[];
  sections: IniSection[];

  constructor(node: IniDocumentNode = { blankLines: [], properties: [], sections: [] }) {
    this.blankLines = node.blankLines;
    this.properties = node.properties;
    this.sections = node.sections;
  }

  lookup(keyPath: string): IniProperty | undefined {
    return editor.lookup(this, keyPath);
  }

  lookupSection(name: string): IniSection | undefined {
    return editor.lookupSection(this, name);
  }

  /**
   * Replace or append the value at `keyPath`; never fails.
   * Returns the property holding the value so callers can attach comments.
   */
  add(keyPath: string, value: IniValue): IniProperty {
    return editor.add(this, keyPath, value);
  }

  /** No-op when nothing is at `keyPath`. */
  remove(keyPath: string): void {
    editor.remove(this, keyPath);
  }

  /** No-op when there is no such section. */
  removeSection(name: string): void {
    editor.removeSection(this, name);
  }

  render(): string {
    return renderDocument(this);
  }

  toString(): string {
    return this.render();
  }
}
