import type { ScopeArena } from './compiler/symbolTable';

// --- Lexer Types ---
export enum TokenKind {
  EOF, IDENT, KEYWORD, CONSTANT, OPERATOR,
  SEPARATOR, ASSIGN, SEMICOLON,
  LPAREN, RPAREN, LCURLY, RCURLY
}

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly line: number;
  readonly column: number;
}

export const KEYWORDS = ['if', 'else', 'for', 'shadow'] as const;
export type Keyword = typeof KEYWORDS[number];

// --- Value Types ---
export enum Type {
  Int = 'int',
  Float = 'float',
  String = 'string',
  Bool = 'bool',
  Unknown = 'unknown'
}

export const BINARY_OPERATORS = ['+', '-', '*', '/', '==', '!=', '<=', '>=', '<', '>', '&&', '||'] as const;
export type BinaryOperator = typeof BINARY_OPERATORS[number];
export type UnaryOperator = 'negate' | 'not';

export const ARITHMETIC_OPERATORS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>(['+', '-', '*', '/']);
export const COMPARISON_OPERATORS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>(['==', '!=', '<=', '>=', '<', '>']);
export const LOGICAL_OPERATORS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>(['&&', '||']);

export function isBinaryOperator(text: string): text is BinaryOperator {
  return BINARY_OPERATORS.some(op => op === text);
}

// --- AST Types ---
export type Expression = Variable | Constant | BinaryOp | UnaryOp;

export class Variable {
  readonly kind = 'variable';
  public type: Type = Type.Unknown;
  // Storage label of the binding this name resolves to, set by semantic analysis.
  public symbol: string | null = null;
  // For `shadow x` inside an expression: storage of the outer binding the new one starts from.
  public copiedFrom: string | null = null;
  constructor(
    public name: string,
    public shadow: boolean = false,
    public line: number = 0,
    public column: number = 0
  ) {}
}

export class Constant {
  readonly kind = 'constant';
  constructor(
    public type: Type,
    public value: string,
    public line: number = 0,
    public column: number = 0
  ) {}
}

export class BinaryOp {
  readonly kind = 'binary';
  public type: Type = Type.Unknown;
  constructor(
    public operator: BinaryOperator,
    public left: Expression,
    public right: Expression,
    public line: number = 0,
    public column: number = 0
  ) {}
}

export class UnaryOp {
  readonly kind = 'unary';
  public type: Type = Type.Unknown;
  constructor(
    public operator: UnaryOperator,
    public operand: Expression,
    public line: number = 0,
    public column: number = 0
  ) {}
}

export type Statement = Assignment | Condition | Loop | Block;

export class Assignment {
  readonly kind = 'assignment';
  constructor(
    public targets: Variable[],
    public values: Expression[],
    public line: number = 0,
    public column: number = 0
  ) {}

  // Loop headers use an empty assignment for an omitted clause.
  public isEmpty(): boolean {
    return this.targets.length === 0;
  }
}

export class Condition {
  readonly kind = 'condition';
  constructor(
    public test: Expression,
    public then: Block,
    public otherwise: Block,
    public line: number = 0,
    public column: number = 0
  ) {}
}

export class Loop {
  readonly kind = 'loop';
  constructor(
    public init: Assignment,
    public tests: Expression[],
    public step: Assignment,
    public body: Block,
    public line: number = 0,
    public column: number = 0
  ) {}
}

export class Block {
  readonly kind = 'block';
  constructor(
    public statements: Statement[],
    // Index of this block's own table in the scope arena.
    public scope: number
  ) {}
}

// --- Symbol Table Types ---
export class SymbolEntry {
  constructor(
    public name: string,
    public type: Type,
    public shadowing: boolean,
    public storage: string
  ) {}
}

export class SymbolTable {
  public entries: Map<string, SymbolEntry> = new Map();

  constructor(public id: number, public parent: number | null) {}
}

export interface Program {
  root: Block;
  scopes: ScopeArena;
}

// --- Assembly Types ---
export type ConstantLine = [name: string, value: string];
export type VariableLine = [name: string, directive: string, value: string];
export type ProgramLine = [label: string, instruction: string, operands: string];

export interface AssemblyDocument {
  header: string[];
  constants: ConstantLine[];
  variables: VariableLine[];
  program: ProgramLine[];
}
