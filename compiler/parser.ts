import {
  Token, TokenKind, Type, Program, Statement, Expression,
  Assignment, Condition, Loop, Block, Variable, Constant, BinaryOp, UnaryOp,
  isBinaryOperator
} from '../types';
import { ParseError } from './errors';
import { ScopeArena, GLOBAL_SCOPE } from './symbolTable';
import { TokenStream } from './tokenStream';

// First matching literal shape wins.
export function classifyConstant(text: string): Type {
  if (/^-?\d+\.\d*/.test(text)) return Type.Float;
  if (/^-?\d+/.test(text)) return Type.Int;
  if (/^".*"/.test(text)) return Type.String;
  if (/^(true|false)/.test(text)) return Type.Bool;
  return Type.Unknown;
}

function describe(t: Token): string {
  return t.kind === TokenKind.EOF ? 'end of input' : `'${t.text}'`;
}

/**
 * Recursive descent parser. Every production returns its node, or null when the
 * next token cannot start it (that token is pushed back). Once a production has
 * consumed its first token, any mismatch is a ParseError.
 *
 * Binary operators have no precedence: the right operand of an operator is the
 * entire remaining expression, so chains nest right to left.
 */
export class Parser {
  private tokens: TokenStream;
  private scopes: ScopeArena = new ScopeArena();
  private currentScope: number = GLOBAL_SCOPE;

  constructor(tokens: TokenStream) {
    this.tokens = tokens;
  }

  public parse(): Program {
    const statements = this.parseStatementList();
    const t = this.tokens.next();
    if (t.kind !== TokenKind.EOF) {
      throw this.error('a statement or end of input', t);
    }
    return { root: new Block(statements, GLOBAL_SCOPE), scopes: this.scopes };
  }

  private error(expected: string, found: Token): ParseError {
    return new ParseError(expected, describe(found), found.line, found.column);
  }

  private accept(kind: TokenKind, text?: string): Token | null {
    const t = this.tokens.next();
    if (t.kind === kind && (text === undefined || t.text === text)) {
      return t;
    }
    this.tokens.pushBack(t);
    return null;
  }

  private expect(kind: TokenKind, text: string, expected: string): Token {
    const t = this.accept(kind, text);
    if (t) return t;
    throw this.error(expected, this.tokens.peek());
  }

  private parseStatementList(): Statement[] {
    const stmts: Statement[] = [];
    while (true) {
      const stmt = this.parseCondition() ?? this.parseLoop() ?? this.parseAssignment();
      if (!stmt) break;
      stmts.push(stmt);
    }
    return stmts;
  }

  private parseBlock(context: string): Block {
    this.expect(TokenKind.LCURLY, '{', `'{' after ${context}`);
    const parentScope = this.currentScope;
    const scope = this.scopes.open(parentScope);
    this.currentScope = scope;
    const statements = this.parseStatementList();
    this.currentScope = parentScope;
    this.expect(TokenKind.RCURLY, '}', `'}' after ${context} block`);
    return new Block(statements, scope);
  }

  private emptyBlock(): Block {
    return new Block([], this.scopes.open(this.currentScope));
  }

  private parseCondition(): Condition | null {
    const kw = this.accept(TokenKind.KEYWORD, 'if');
    if (!kw) return null;

    const test = this.parseExpression();
    if (!test) {
      throw this.error("expression after 'if'", this.tokens.peek());
    }
    const then = this.parseBlock('condition');

    let otherwise: Block;
    if (this.accept(TokenKind.KEYWORD, 'else')) {
      otherwise = this.parseBlock("'else'");
    } else {
      otherwise = this.emptyBlock();
    }
    return new Condition(test, then, otherwise, kw.line, kw.column);
  }

  private parseLoop(): Loop | null {
    const kw = this.accept(TokenKind.KEYWORD, 'for');
    if (!kw) return null;

    const init = this.parseAssignment() ?? new Assignment([], [], kw.line, kw.column);
    this.expect(TokenKind.SEMICOLON, ';', "';' after loop assignment");
    const tests = this.parseExpressionList();
    this.expect(TokenKind.SEMICOLON, ';', "';' after loop expression");
    const step = this.parseAssignment() ?? new Assignment([], [], kw.line, kw.column);
    const body = this.parseBlock('loop header');
    return new Loop(init, tests, step, body, kw.line, kw.column);
  }

  private parseAssignment(): Assignment | null {
    const targets = this.parseVarList();
    if (!targets) return null;

    this.expect(TokenKind.ASSIGN, '=', "'=' in assignment");
    const next = this.tokens.peek();
    const values = this.parseExpressionList();
    if (values.length !== targets.length) {
      throw new ParseError(
        `${targets.length} value(s) in assignment`,
        `${values.length}`,
        next.line,
        next.column
      );
    }
    return new Assignment(targets, values, targets[0].line, targets[0].column);
  }

  private parseVarList(): Variable[] | null {
    const first = this.parseVariable();
    if (!first) return null;

    const vars = [first];
    while (this.accept(TokenKind.SEPARATOR, ',')) {
      const v = this.parseVariable();
      if (!v) {
        throw this.error("variable after ','", this.tokens.peek());
      }
      vars.push(v);
    }
    return vars;
  }

  private parseVariable(): Variable | null {
    const shadow = this.accept(TokenKind.KEYWORD, 'shadow');
    const id = this.accept(TokenKind.IDENT);
    if (!id) {
      if (shadow) {
        throw this.error("identifier after 'shadow'", this.tokens.peek());
      }
      return null;
    }
    const start = shadow ?? id;
    return new Variable(id.text, shadow !== null, start.line, start.column);
  }

  private parseExpressionList(): Expression[] {
    const first = this.parseExpression();
    if (!first) return [];

    const exprs = [first];
    while (this.accept(TokenKind.SEPARATOR, ',')) {
      const e = this.parseExpression();
      if (!e) {
        throw this.error("expression after ','", this.tokens.peek());
      }
      exprs.push(e);
    }
    return exprs;
  }

  private parseExpression(): Expression | null {
    const expr = this.parseUnaryExpression() ?? this.parseSimpleExpression();
    if (!expr) return null;

    const t = this.tokens.next();
    if (t.kind === TokenKind.OPERATOR && isBinaryOperator(t.text)) {
      const right = this.parseExpression();
      if (!right) {
        throw this.error(`expression after '${t.text}'`, this.tokens.peek());
      }
      return new BinaryOp(t.text, expr, right, t.line, t.column);
    }
    this.tokens.pushBack(t);
    return expr;
  }

  private parseUnaryExpression(): UnaryOp | null {
    const t = this.tokens.next();
    if (t.kind !== TokenKind.OPERATOR || (t.text !== '-' && t.text !== '!')) {
      this.tokens.pushBack(t);
      return null;
    }
    const operand = this.parseExpression();
    if (!operand) {
      throw this.error(`expression after unary '${t.text}'`, this.tokens.peek());
    }
    return new UnaryOp(t.text === '-' ? 'negate' : 'not', operand, t.line, t.column);
  }

  private parseSimpleExpression(): Expression | null {
    const v = this.parseVariable();
    if (v) return v;

    const c = this.accept(TokenKind.CONSTANT);
    if (c) {
      return new Constant(classifyConstant(c.text), c.text, c.line, c.column);
    }

    if (this.accept(TokenKind.LPAREN, '(')) {
      const e = this.parseExpression();
      if (!e) {
        throw this.error("expression after '('", this.tokens.peek());
      }
      this.expect(TokenKind.RPAREN, ')', "')'");
      return e;
    }
    return null;
  }
}
