import { Token, TokenKind } from '../types';

// Pull interface over the lexer with a single token of pushback.
export class TokenStream {
  private source: Iterator<Token>;
  private buffered: Token | null = null;
  private last: Token | null = null;

  constructor(tokens: Iterable<Token>) {
    this.source = tokens[Symbol.iterator]();
  }

  public next(): Token {
    if (this.buffered) {
      const t = this.buffered;
      this.buffered = null;
      return t;
    }
    const res = this.source.next();
    if (res.done) {
      return this.endOfInput();
    }
    this.last = res.value;
    return res.value;
  }

  public pushBack(t: Token) {
    if (this.buffered) {
      throw new Error(`Token stream can only hold one pushed back token (holding '${this.buffered.text}')`);
    }
    this.buffered = t;
  }

  public peek(): Token {
    const t = this.next();
    this.pushBack(t);
    return t;
  }

  // End of input is reported just past the last real token.
  private endOfInput(): Token {
    if (!this.last) {
      return { kind: TokenKind.EOF, text: '', line: 1, column: 1 };
    }
    return {
      kind: TokenKind.EOF,
      text: '',
      line: this.last.line,
      column: this.last.column + this.last.text.length
    };
  }
}
