export type ErrorKind = 'LexicalError' | 'ParseError' | 'ScopeError' | 'TypeError' | 'ToolchainError';

export class CompileError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(message);
    this.name = kind;
  }

  public toString(): string {
    if (this.line > 0) {
      return `${this.kind} at ${this.line}:${this.column}: ${this.message}`;
    }
    return `${this.kind}: ${this.message}`;
  }
}

export class LexicalError extends CompileError {
  constructor(
    public readonly character: string,
    line: number,
    column: number,
    message: string = `Unexpected character '${character}'`
  ) {
    super('LexicalError', message, line, column);
  }
}

export class ParseError extends CompileError {
  constructor(
    public readonly expected: string,
    public readonly found: string,
    line: number,
    column: number
  ) {
    super('ParseError', `Expected ${expected} but found ${found}`, line, column);
  }
}

export class ScopeError extends CompileError {
  constructor(message: string, line: number, column: number) {
    super('ScopeError', message, line, column);
  }
}

export type Severity = 'critical' | 'normal';

export class TypeCheckError extends CompileError {
  constructor(message: string, line: number, column: number, public readonly severity: Severity = 'normal') {
    super('TypeError', message, line, column);
  }
}

export type ToolchainStage = 'lookup' | 'assemble' | 'link';

export class ToolchainError extends CompileError {
  constructor(
    public readonly stage: ToolchainStage,
    message: string,
    public readonly diagnostics: string = ''
  ) {
    super('ToolchainError', message, 0, 0);
  }
}
