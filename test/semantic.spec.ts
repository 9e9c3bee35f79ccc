import { describe, it, expect } from 'vitest';
import { Compiler } from '../compiler/pipeline';
import { SemanticAnalyzer } from '../compiler/semantic';
import { ScopeArena } from '../compiler/symbolTable';
import { CompileError, ScopeError, TypeCheckError } from '../compiler/errors';
import { Program, Block, Statement, Expression, Assignment, Variable, Constant, Type } from '../types';

function analyze(src: string): Program {
  return new Compiler().frontEnd(src).program;
}

function analysisError(src: string): CompileError {
  try {
    analyze(src);
  } catch (e: unknown) {
    if (e instanceof CompileError) return e;
    throw e;
  }
  throw new Error(`'${src}' analyzed without error`);
}

function assignmentAt(block: Block, index: number): Assignment {
  const stmt = block.statements[index];
  if (stmt.kind !== 'assignment') throw new Error(`expected an assignment, got ${stmt.kind}`);
  return stmt;
}

function expressions(block: Block): Expression[] {
  const out: Expression[] = [];
  const visitExpr = (e: Expression) => {
    out.push(e);
    if (e.kind === 'binary') {
      visitExpr(e.left);
      visitExpr(e.right);
    } else if (e.kind === 'unary') {
      visitExpr(e.operand);
    }
  };
  const visitAssignment = (a: Assignment) => {
    a.targets.forEach(visitExpr);
    a.values.forEach(visitExpr);
  };
  const visit = (s: Statement) => {
    switch (s.kind) {
      case 'assignment':
        visitAssignment(s);
        break;
      case 'condition':
        visitExpr(s.test);
        s.then.statements.forEach(visit);
        s.otherwise.statements.forEach(visit);
        break;
      case 'loop':
        visitAssignment(s.init);
        s.tests.forEach(visitExpr);
        visitAssignment(s.step);
        s.body.statements.forEach(visit);
        break;
      case 'block':
        s.statements.forEach(visit);
        break;
    }
  };
  block.statements.forEach(visit);
  return out;
}

describe('semantic analyzer', () => {
  it('types every expression of a well-formed program', () => {
    const program = analyze([
      'i, s, f, ok = 0, "text", 1.5, true',
      'for ; (i < 10) && ok; i = i + 1 {',
      '  f = f * 2.0',
      '  if s == "text" { ok = !(i > 5) } else { shadow s = -f }',
      '}'
    ].join('\n'));
    const all = expressions(program.root);
    expect(all.length).toBeGreaterThan(20);
    expect(all.filter(e => e.type === Type.Unknown)).toEqual([]);
  });

  it('keeps a shadowing binding inside its block', () => {
    const program = analyze('x = 1\nif true { shadow x = 2.5\n y = x }\nz = x');
    const global = program.scopes.get(0);
    const inner = program.scopes.get(1);

    expect(global.entries.get('x')).toMatchObject({ type: Type.Int, storage: 'v_x', shadowing: false });
    expect(inner.entries.get('x')).toMatchObject({ type: Type.Float, storage: 'v1_x', shadowing: true });
    expect(inner.entries.get('y')).toMatchObject({ type: Type.Float, storage: 'v_y' });

    const after = assignmentAt(program.root, 2);
    expect(after.targets[0].type).toBe(Type.Int);
    expect(after.values[0]).toMatchObject({ type: Type.Int, symbol: 'v_x' });
  });

  it('reads the outer binding in the value of a shadowing assignment', () => {
    const program = analyze('x = 1\nif true { shadow x = x + 1 }');
    const cond = program.root.statements[1];
    if (cond.kind !== 'condition') throw new Error('expected a condition');
    const inner = assignmentAt(cond.then, 0);
    expect(inner.targets[0].symbol).toBe('v1_x');
    const value = inner.values[0];
    if (value.kind !== 'binary') throw new Error('expected a binary operation');
    expect(value.left).toMatchObject({ symbol: 'v_x', type: Type.Int });
  });

  it('marks a shadow declaration without an outer binding as not shadowing', () => {
    const program = analyze('if true { shadow y = 1 }');
    expect(program.scopes.get(1).entries.get('y')?.shadowing).toBe(false);
  });

  it('assigns to a visible outer binding of the same type', () => {
    const program = analyze('x = 1\nif true { x = 2 }');
    expect(program.scopes.get(1).entries.size).toBe(0);
    const cond = program.root.statements[1];
    if (cond.kind !== 'condition') throw new Error('expected a condition');
    expect(assignmentAt(cond.then, 0).targets[0].symbol).toBe('v_x');
  });

  it('binds loop header variables in the enclosing scope', () => {
    const program = analyze('for i = 0; i < 3; i = i + 1 { s = i }');
    expect([...program.scopes.get(0).entries.keys()]).toEqual(['i']);
    expect([...program.scopes.get(1).entries.keys()]).toEqual(['s']);
  });

  it('rejects shadowing a name twice in one block', () => {
    const err = analysisError('x = 1\nshadow x = 2');
    expect(err).toBeInstanceOf(ScopeError);
    expect(err.toString()).toBe("ScopeError at 2:1: 'x' is already declared in this block");
  });

  it('rejects the same target twice in one assignment', () => {
    const err = analysisError('x, x = 1, 2');
    expect(err).toBeInstanceOf(ScopeError);
    expect(err.toString()).toBe("ScopeError at 1:4: 'x' is declared twice in one assignment");
  });

  it('rejects assigning a float to an int binding', () => {
    const err = analysisError('x = 1\nx = 2.5');
    expect(err).toBeInstanceOf(TypeCheckError);
    expect(err.toString()).toBe("TypeError at 2:1: Cannot assign float to 'x' of type int");
  });

  it('rejects non-bool conditions', () => {
    expect(analysisError('if 1 { }').toString()).toBe("TypeError at 1:4: 'if' condition must be bool but is int");
    expect(analysisError('for ; 1 + 2; {}').toString()).toBe('TypeError at 1:9: loop condition must be bool but is int');
  });

  it('rejects unresolved identifiers', () => {
    expect(analysisError('a = b').toString()).toBe("ScopeError at 1:5: Unresolved identifier 'b'");
  });

  it('opens a new binding for shadow inside an expression', () => {
    const program = analyze('x = 1\nif true { y = shadow x + 1 }');
    const inner = program.scopes.get(1);
    expect(inner.entries.get('x')).toMatchObject({ type: Type.Int, storage: 'v1_x', shadowing: true });
    expect(inner.entries.get('y')).toMatchObject({ type: Type.Int, storage: 'v_y' });

    const cond = program.root.statements[1];
    if (cond.kind !== 'condition') throw new Error('expected a condition');
    const value = assignmentAt(cond.then, 0).values[0];
    if (value.kind !== 'binary') throw new Error('expected a binary operation');
    expect(value.left).toMatchObject({ type: Type.Int, symbol: 'v1_x', copiedFrom: 'v_x' });
  });

  it('rejects shadow inside an expression without a binding to mask', () => {
    expect(analysisError('if true { y = shadow q }').toString()).toBe("ScopeError at 1:15: Unresolved identifier 'q'");
    expect(analysisError('x = 1\ny = shadow x').toString())
      .toBe("ScopeError at 2:5: 'x' is already declared in this block");
  });

  it('rejects integer literals outside 64 bits', () => {
    expect(analysisError('x = 99999999999999999999').toString())
      .toBe('TypeError at 1:5: Integer literal 99999999999999999999 does not fit in 64 bits');
    expect(analysisError('x = 9223372036854775808').message)
      .toBe('Integer literal 9223372036854775808 does not fit in 64 bits');
    expect(analyze('x = -9223372036854775808').scopes.get(0).entries.get('x')?.type).toBe(Type.Int);
  });

  it('rejects mismatched operand types', () => {
    expect(analysisError('a = 1 + 2.0').message).toBe("Operator '+' cannot be applied to int and float");
    expect(analysisError('a = "x" + "y"').message).toBe("Operator '+' cannot be applied to string and string");
    expect(analysisError('a = 1 && true').message).toBe("Operator '&&' cannot be applied to int and bool");
    expect(analysisError('a = -true').message).toBe("Operator '-' cannot be applied to bool");
    expect(analysisError('a = !1').message).toBe("Operator '!' cannot be applied to int");
  });

  it('types comparisons as bool', () => {
    const program = analyze('a = "x" == "y"\nb = 1.5 < 2.5');
    expect(assignmentAt(program.root, 0).targets[0].type).toBe(Type.Bool);
    expect(assignmentAt(program.root, 1).targets[0].type).toBe(Type.Bool);
  });

  it('reports malformed trees as critical', () => {
    const scopes = new ScopeArena();
    const broken: Program = {
      root: new Block([new Assignment([new Variable('a', false, 1, 1)], [], 1, 1)], 0),
      scopes
    };
    try {
      new SemanticAnalyzer().analyze(broken);
      throw new Error('expected a type error');
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(TypeCheckError);
      if (e instanceof TypeCheckError) {
        expect(e.severity).toBe('critical');
        expect(e.message).toBe('Assignment has 1 target(s) but 0 value(s)');
      }
    }

    const badLiteral: Program = {
      root: new Block([new Assignment([new Variable('a')], [new Constant(Type.Unknown, 'xyz', 1, 5)], 1, 1)], 0),
      scopes: new ScopeArena()
    };
    expect(() => new SemanticAnalyzer().analyze(badLiteral)).toThrow('Invalid literal xyz');
  });
});
