import { describe, it, expect } from 'vitest';
import {
  INI_GRAMMAR,
  INI_PUNCTUATION,
  INI_TOKEN_RULES,
  compileGrammar,
  describeTerminal,
  type TokenRule,
} from '../grammar.js';
import { GrammarDefinitionError } from '../../core/errors.js';

function grammarFailure(compile: () => unknown): GrammarDefinitionError {
  try {
    compile();
  } catch (error) {
    if (error instanceof GrammarDefinitionError) return error;
    throw error;
  }
  throw new Error('expected the grammar to be rejected');
}

const withRule = (name: TokenRule['name'], pattern: string): TokenRule[] =>
  INI_TOKEN_RULES.map((rule) => (rule.name === name ? { ...rule, pattern } : rule));

describe('INI grammar', () => {
  it('is well formed at load time', () => {
    expect(INI_GRAMMAR.rules.map((rule) => rule.name)).toEqual([
      'Ident',
      'String',
      'Number',
      'Punct',
      'Comment',
      'NewLine',
      'Whitespace',
    ]);
    expect(INI_GRAMMAR.rules.filter((rule) => rule.skip).map((rule) => rule.name)).toEqual(['Whitespace']);
    expect(INI_GRAMMAR.rules.every((rule) => rule.regex.sticky)).toBe(true);
  });

  describe('compileGrammar', () => {
    it('rejects a duplicate rule name', () => {
      const error = grammarFailure(() => compileGrammar([...INI_TOKEN_RULES, { name: 'Ident', pattern: 'x' }]));

      expect(error.rule).toBe('Ident');
      expect(error.message).toBe('Grammar rule Ident is invalid: duplicate rule name');
    });

    it('rejects a pattern that does not compile', () => {
      const error = grammarFailure(() => compileGrammar(withRule('Number', '(\\d+')));

      expect(error.rule).toBe('Number');
      expect(error.message).toContain('pattern does not compile');
    });

    it('rejects a pattern that matches the empty string', () => {
      const error = grammarFailure(() => compileGrammar(withRule('Ident', '[A-Za-z]*')));

      expect(error.message).toBe('Grammar rule Ident is invalid: pattern matches the empty string');
    });

    it('rejects a table missing a required token type', () => {
      const error = grammarFailure(() => compileGrammar(INI_TOKEN_RULES.filter((rule) => rule.name !== 'Comment')));

      expect(error.rule).toBe('Comment');
      expect(error.message).toBe('Grammar rule Comment is invalid: no rule defines this token type');
    });

    it('rejects punctuation the Punct rule does not produce', () => {
      const error = grammarFailure(() => compileGrammar(withRule('Punct', '[\\[\\]]')));

      expect(error.message).toBe('Grammar rule Punct is invalid: does not match punctuation "="');
    });

    it('rejects a production starting with an unknown terminal', () => {
      const error = grammarFailure(() => compileGrammar(INI_TOKEN_RULES, INI_PUNCTUATION, { Value: ['String', 'Float'] }));

      expect(error.rule).toBe('Value');
      expect(error.message).toBe('Grammar rule Value is invalid: starts with unknown terminal "Float"');
      expect(error.toJSON().details).toEqual({ rule: 'Value' });
    });
  });

  it('describes punctuation quoted and token types by name', () => {
    expect(describeTerminal('=')).toBe('"="');
    expect(describeTerminal('[')).toBe('"["');
    expect(describeTerminal('Ident')).toBe('Ident');
  });
});
