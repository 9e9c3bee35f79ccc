import { Token, TokenKind, KEYWORDS } from '../types';
import { LexicalError } from './errors';

const KEYWORD_SET: ReadonlySet<string> = new Set<string>(KEYWORDS);

const TWO_CHAR_OPERATORS = ['==', '!=', '<=', '>=', '&&', '||'];

const SYMBOLS: Record<string, TokenKind> = {
  '+': TokenKind.OPERATOR,
  '-': TokenKind.OPERATOR,
  '*': TokenKind.OPERATOR,
  '/': TokenKind.OPERATOR,
  '<': TokenKind.OPERATOR,
  '>': TokenKind.OPERATOR,
  '!': TokenKind.OPERATOR,
  ',': TokenKind.SEPARATOR,
  '=': TokenKind.ASSIGN,
  ';': TokenKind.SEMICOLON,
  '(': TokenKind.LPAREN,
  ')': TokenKind.RPAREN,
  '{': TokenKind.LCURLY,
  '}': TokenKind.RCURLY
};

// Tokens after which a '-' is the minus operator rather than the sign of a literal.
const OPERAND_END = new Set<TokenKind>([TokenKind.IDENT, TokenKind.CONSTANT, TokenKind.RPAREN]);

export class Lexer {
  private src: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private prev: Token | null = null;
  private started: boolean = false;

  // Set when lexing stopped early on an unrecognised character.
  public error: LexicalError | null = null;

  constructor(src: string) {
    this.src = src;
  }

  private peek(offset: number = 0): string {
    const at = this.pos + offset;
    return at < this.src.length ? this.src[at] : '';
  }

  private advance(): string {
    const ch = this.src[this.pos++];
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private make(kind: TokenKind, text: string, line: number, column: number): Token {
    const token: Token = { kind, text, line, column };
    this.prev = token;
    return token;
  }

  private fail(error: LexicalError): void {
    this.error = error;
  }

  public *tokens(): Generator<Token, void, undefined> {
    if (this.started) {
      throw new Error('Lexer token sequence can only be consumed once');
    }
    this.started = true;

    while (this.pos < this.src.length) {
      const ch = this.peek();
      const line = this.line;
      const column = this.column;

      if (/\s/.test(ch)) {
        this.advance();
      } else if (ch === '/' && this.peek(1) === '/') {
        while (this.pos < this.src.length && this.peek() !== '\n') {
          this.advance();
        }
      } else if (/[a-zA-Z]/.test(ch)) {
        let ident = '';
        while (/[a-zA-Z0-9_]/.test(this.peek())) {
          ident += this.advance();
        }
        if (ident === 'true' || ident === 'false') {
          yield this.make(TokenKind.CONSTANT, ident, line, column);
        } else if (KEYWORD_SET.has(ident)) {
          yield this.make(TokenKind.KEYWORD, ident, line, column);
        } else {
          yield this.make(TokenKind.IDENT, ident, line, column);
        }
      } else if (/[0-9]/.test(ch) || (ch === '-' && /[0-9]/.test(this.peek(1)) && !this.followsOperand())) {
        yield this.make(TokenKind.CONSTANT, this.readNumber(), line, column);
      } else if (ch === '"') {
        const str = this.readString();
        if (str === null) {
          this.fail(new LexicalError('"', line, column, 'Unterminated string literal'));
          return;
        }
        yield this.make(TokenKind.CONSTANT, str, line, column);
      } else if (TWO_CHAR_OPERATORS.includes(ch + this.peek(1))) {
        const op = this.advance() + this.advance();
        yield this.make(TokenKind.OPERATOR, op, line, column);
      } else if (ch in SYMBOLS) {
        this.advance();
        yield this.make(SYMBOLS[ch], ch, line, column);
      } else {
        this.fail(new LexicalError(ch, line, column));
        return;
      }
    }
  }

  // Drains the whole sequence; throws the lexical error if lexing stopped early.
  public tokenize(): Token[] {
    const tokens = [...this.tokens()];
    if (this.error) throw this.error;
    return tokens;
  }

  private followsOperand(): boolean {
    return this.prev !== null && OPERAND_END.has(this.prev.kind);
  }

  private readNumber(): string {
    let numStr = '';
    if (this.peek() === '-') {
      numStr += this.advance();
    }
    while (/[0-9]/.test(this.peek())) {
      numStr += this.advance();
    }
    if (this.peek() === '.') {
      numStr += this.advance();
      while (/[0-9]/.test(this.peek())) {
        numStr += this.advance();
      }
    }
    return numStr;
  }

  private readString(): string | null {
    let str = this.advance();
    while (this.pos < this.src.length && this.peek() !== '"' && this.peek() !== '\n') {
      str += this.advance();
    }
    if (this.peek() !== '"') return null;
    return str + this.advance();
  }
}
