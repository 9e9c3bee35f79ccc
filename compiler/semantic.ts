import {
  Type, Program, Statement, Expression, Assignment, Block, Variable, BinaryOp, UnaryOp,
  ARITHMETIC_OPERATORS, COMPARISON_OPERATORS, LOGICAL_OPERATORS
} from '../types';
import { ScopeError, TypeCheckError } from './errors';
import { ScopeArena } from './symbolTable';
import { classifyConstant } from './parser';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

function fitsInt64(literal: string): boolean {
  const value = BigInt(literal);
  return value >= INT64_MIN && value <= INT64_MAX;
}

function isNumeric(t: Type): boolean {
  return t === Type.Int || t === Type.Float;
}

/**
 * Resolves every expression type and binding in place. Stops at the first
 * scope or type error.
 */
export class SemanticAnalyzer {
  private scopes: ScopeArena = new ScopeArena();

  public analyze(program: Program): Program {
    this.scopes = program.scopes;
    this.analyzeBlock(program.root);
    return program;
  }

  private analyzeBlock(block: Block) {
    for (const stmt of block.statements) {
      this.analyzeStatement(stmt, block.scope);
    }
  }

  private analyzeStatement(stmt: Statement, scope: number) {
    switch (stmt.kind) {
      case 'assignment':
        this.analyzeAssignment(stmt, scope);
        break;
      case 'condition':
        this.expectBool(stmt.test, scope, "'if' condition");
        this.analyzeBlock(stmt.then);
        this.analyzeBlock(stmt.otherwise);
        break;
      case 'loop':
        this.analyzeAssignment(stmt.init, scope);
        for (const test of stmt.tests) {
          this.expectBool(test, scope, 'loop condition');
        }
        this.analyzeBlock(stmt.body);
        this.analyzeAssignment(stmt.step, scope);
        break;
      case 'block':
        this.analyzeBlock(stmt);
        break;
      default: {
        const unreachable: never = stmt;
        throw new Error(`Unknown statement ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private expectBool(expr: Expression, scope: number, context: string) {
    const t = this.analyzeExpression(expr, scope);
    if (t !== Type.Bool) {
      throw new TypeCheckError(`${context} must be bool but is ${t}`, expr.line, expr.column);
    }
  }

  private analyzeAssignment(stmt: Assignment, scope: number) {
    if (stmt.targets.length !== stmt.values.length) {
      throw new TypeCheckError(
        `Assignment has ${stmt.targets.length} target(s) but ${stmt.values.length} value(s)`,
        stmt.line,
        stmt.column,
        'critical'
      );
    }

    // Values are resolved before any target is bound, so `shadow x = x` reads the outer x.
    const types = stmt.values.map(v => this.analyzeExpression(v, scope));

    const seen = new Set<string>();
    stmt.targets.forEach((target, i) => {
      if (seen.has(target.name)) {
        throw new ScopeError(`'${target.name}' is declared twice in one assignment`, target.line, target.column);
      }
      seen.add(target.name);
      this.bindTarget(target, types[i], scope);
    });
  }

  private bindTarget(target: Variable, type: Type, scope: number) {
    let entry = this.scopes.lookup(scope, target.name);

    if (target.shadow) {
      if (this.scopes.lookupLocal(scope, target.name)) {
        throw new ScopeError(`'${target.name}' is already declared in this block`, target.line, target.column);
      }
      entry = this.scopes.declare(scope, target.name, type, entry !== undefined);
    } else if (!entry) {
      // First assignment fixes the type.
      entry = this.scopes.declare(scope, target.name, type, false);
    } else if (entry.type !== type) {
      throw new TypeCheckError(
        `Cannot assign ${type} to '${target.name}' of type ${entry.type}`,
        target.line,
        target.column
      );
    }

    target.type = entry.type;
    target.symbol = entry.storage;
  }

  private analyzeExpression(expr: Expression, scope: number): Type {
    switch (expr.kind) {
      case 'variable':
        return this.analyzeVariable(expr, scope);
      case 'constant': {
        const t = classifyConstant(expr.value);
        if (t === Type.Unknown) {
          throw new TypeCheckError(`Invalid literal ${expr.value}`, expr.line, expr.column, 'critical');
        }
        if (t === Type.Int && !fitsInt64(expr.value)) {
          throw new TypeCheckError(`Integer literal ${expr.value} does not fit in 64 bits`, expr.line, expr.column);
        }
        expr.type = t;
        return t;
      }
      case 'unary':
        return this.analyzeUnary(expr, scope);
      case 'binary':
        return this.analyzeBinary(expr, scope);
      default: {
        const unreachable: never = expr;
        throw new Error(`Unknown expression ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private analyzeVariable(v: Variable, scope: number): Type {
    if (v.shadow) {
      return this.reenterVariable(v, scope);
    }
    const entry = this.scopes.lookup(scope, v.name);
    if (!entry) {
      throw new ScopeError(`Unresolved identifier '${v.name}'`, v.line, v.column);
    }
    v.type = entry.type;
    v.symbol = entry.storage;
    return v.type;
  }

  // `shadow x` in an expression opens a new binding of x in this block, typed and
  // initialised from the binding it masks.
  private reenterVariable(v: Variable, scope: number): Type {
    const outer = this.scopes.lookup(scope, v.name);
    if (!outer) {
      throw new ScopeError(`Unresolved identifier '${v.name}'`, v.line, v.column);
    }
    if (this.scopes.lookupLocal(scope, v.name)) {
      throw new ScopeError(`'${v.name}' is already declared in this block`, v.line, v.column);
    }
    const entry = this.scopes.declare(scope, v.name, outer.type, true);
    v.type = entry.type;
    v.symbol = entry.storage;
    v.copiedFrom = outer.storage;
    return v.type;
  }

  private analyzeUnary(u: UnaryOp, scope: number): Type {
    const t = this.analyzeExpression(u.operand, scope);
    if (u.operator === 'negate' && !isNumeric(t)) {
      throw new TypeCheckError(`Operator '-' cannot be applied to ${t}`, u.line, u.column);
    }
    if (u.operator === 'not' && t !== Type.Bool) {
      throw new TypeCheckError(`Operator '!' cannot be applied to ${t}`, u.line, u.column);
    }
    u.type = t;
    return t;
  }

  private analyzeBinary(b: BinaryOp, scope: number): Type {
    const left = this.analyzeExpression(b.left, scope);
    const right = this.analyzeExpression(b.right, scope);

    let result = Type.Unknown;
    if (ARITHMETIC_OPERATORS.has(b.operator)) {
      if (left === right && isNumeric(left)) result = left;
    } else if (COMPARISON_OPERATORS.has(b.operator)) {
      if (left === right && left !== Type.Unknown) result = Type.Bool;
    } else if (LOGICAL_OPERATORS.has(b.operator)) {
      if (left === Type.Bool && right === Type.Bool) result = Type.Bool;
    }

    if (result === Type.Unknown) {
      throw new TypeCheckError(
        `Operator '${b.operator}' cannot be applied to ${left} and ${right}`,
        b.line,
        b.column
      );
    }
    b.type = result;
    return result;
  }
}
