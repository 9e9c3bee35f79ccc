import { describe, it, expect } from 'vitest';
import { Lexer } from '../compiler/lexer';
import { LexicalError } from '../compiler/errors';
import { Token, TokenKind } from '../types';

function texts(tokens: Token[]): string[] {
  return tokens.map(t => t.text);
}

describe('lexer', () => {
  it('tokenizes an assignment with positions', () => {
    const tokens = new Lexer('shadow a = 6 + 7').tokenize();
    expect(tokens).toEqual([
      { kind: TokenKind.KEYWORD, text: 'shadow', line: 1, column: 1 },
      { kind: TokenKind.IDENT, text: 'a', line: 1, column: 8 },
      { kind: TokenKind.ASSIGN, text: '=', line: 1, column: 10 },
      { kind: TokenKind.CONSTANT, text: '6', line: 1, column: 12 },
      { kind: TokenKind.OPERATOR, text: '+', line: 1, column: 14 },
      { kind: TokenKind.CONSTANT, text: '7', line: 1, column: 16 }
    ]);
  });

  it('reads a minus before a digit as the sign of a literal unless it follows an operand', () => {
    expect(texts(new Lexer('5 -- (-8 * -10000.1234)').tokenize()))
      .toEqual(['5', '-', '-', '(', '-8', '*', '-10000.1234', ')']);
    expect(texts(new Lexer('a-1').tokenize())).toEqual(['a', '-', '1']);
    expect(texts(new Lexer('(a)-1').tokenize())).toEqual(['(', 'a', ')', '-', '1']);
    expect(texts(new Lexer('x = -5').tokenize())).toEqual(['x', '=', '-5']);
  });

  it('prefers two-character operators', () => {
    const tokens = new Lexer('a<=b&&c!=d||e>=f==g').tokenize();
    expect(texts(tokens)).toEqual(['a', '<=', 'b', '&&', 'c', '!=', 'd', '||', 'e', '>=', 'f', '==', 'g']);
    expect(tokens.filter(t => t.kind === TokenKind.OPERATOR)).toHaveLength(6);
  });

  it('separates keywords, booleans and identifiers', () => {
    const tokens = new Lexer('if else for shadow true false false2 iffy').tokenize();
    expect(tokens.map(t => TokenKind[t.kind])).toEqual([
      'KEYWORD', 'KEYWORD', 'KEYWORD', 'KEYWORD', 'CONSTANT', 'CONSTANT', 'IDENT', 'IDENT'
    ]);
  });

  it('skips comments and tracks lines', () => {
    const tokens = new Lexer('x = 1 // note\ny = "hi"').tokenize();
    expect(tokens[3]).toEqual({ kind: TokenKind.IDENT, text: 'y', line: 2, column: 1 });
    expect(tokens[5]).toEqual({ kind: TokenKind.CONSTANT, text: '"hi"', line: 2, column: 5 });
  });

  it('reads floats with and without fraction digits', () => {
    expect(texts(new Lexer('1.5 2. 30').tokenize())).toEqual(['1.5', '2.', '30']);
  });

  it('stops at an unexpected character and records the error', () => {
    const lexer = new Lexer('a = 1 $ 2');
    const tokens = [...lexer.tokens()];
    expect(texts(tokens)).toEqual(['a', '=', '1']);
    expect(lexer.error).toBeInstanceOf(LexicalError);
    expect(lexer.error?.toString()).toBe("LexicalError at 1:7: Unexpected character '$'");
  });

  it('throws the recorded error from tokenize', () => {
    expect(() => new Lexer('s = "abc').tokenize()).toThrow('Unterminated string literal');
    try {
      new Lexer('s = "abc').tokenize();
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(LexicalError);
      if (e instanceof LexicalError) {
        expect([e.line, e.column, e.character]).toEqual([1, 5, '"']);
      }
    }
  });

  it('does not let a string run past the end of the line', () => {
    const lexer = new Lexer('s = "ab\ncd"');
    expect(texts([...lexer.tokens()])).toEqual(['s', '=']);
    expect(lexer.error?.message).toBe('Unterminated string literal');
  });

  it('can only be consumed once', () => {
    const lexer = new Lexer('a');
    [...lexer.tokens()];
    expect(() => [...lexer.tokens()]).toThrow('Lexer token sequence can only be consumed once');
  });
});
