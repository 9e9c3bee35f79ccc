import { Program, Statement, Expression, Assignment, Block } from '../types';

const INDENT = '  ';

function printOperand(e: Expression): string {
  // A binary or unary left operand would swallow the rest of the chain without parentheses.
  return e.kind === 'binary' || e.kind === 'unary' ? `(${printExpression(e)})` : printExpression(e);
}

/** Source form that parses back to the same tree. */
export function printExpression(e: Expression): string {
  switch (e.kind) {
    case 'variable':
      return e.shadow ? `shadow ${e.name}` : e.name;
    case 'constant':
      return e.value;
    case 'unary':
      return `${e.operator === 'negate' ? '-' : '!'}(${printExpression(e.operand)})`;
    case 'binary':
      return `${printOperand(e.left)} ${e.operator} ${printExpression(e.right)}`;
  }
}

/** Debug form with every nested binary operation parenthesised. */
export function describeExpression(e: Expression, nested: boolean = false): string {
  switch (e.kind) {
    case 'variable':
      return e.shadow ? `shadow ${e.name}` : e.name;
    case 'constant':
      return e.value;
    case 'unary':
      return `${e.operator === 'negate' ? '-' : '!'}(${describeExpression(e.operand)})`;
    case 'binary': {
      const s = `${describeExpression(e.left, true)} ${e.operator} ${describeExpression(e.right, true)}`;
      return nested ? `(${s})` : s;
    }
  }
}

/** Debug form annotating every node with its resolved type, e.g. `(x:int + 1:int):int`. */
export function describeTypedExpression(e: Expression): string {
  switch (e.kind) {
    case 'variable':
      return `${e.shadow ? 'shadow ' : ''}${e.name}:${e.type}`;
    case 'constant':
      return `${e.value}:${e.type}`;
    case 'unary':
      return `${e.operator === 'negate' ? '-' : '!'}(${describeTypedExpression(e.operand)}):${e.type}`;
    case 'binary':
      return `(${describeTypedExpression(e.left)} ${e.operator} ${describeTypedExpression(e.right)}):${e.type}`;
  }
}

type Render = (e: Expression) => string;

function printAssignment(a: Assignment, render: Render): string {
  if (a.isEmpty()) return '';
  return `${a.targets.map(t => render(t)).join(', ')} = ${a.values.map(v => render(v)).join(', ')}`;
}

function printStatements(block: Block, depth: number, render: Render, out: string[]) {
  for (const stmt of block.statements) {
    printStatement(stmt, depth, render, out);
  }
}

function printStatement(stmt: Statement, depth: number, render: Render, out: string[]) {
  const pad = INDENT.repeat(depth);
  switch (stmt.kind) {
    case 'assignment':
      out.push(pad + printAssignment(stmt, render));
      break;
    case 'condition':
      out.push(`${pad}if ${render(stmt.test)} {`);
      printStatements(stmt.then, depth + 1, render, out);
      if (stmt.otherwise.statements.length > 0) {
        out.push(`${pad}} else {`);
        printStatements(stmt.otherwise, depth + 1, render, out);
      }
      out.push(`${pad}}`);
      break;
    case 'loop': {
      const init = printAssignment(stmt.init, render);
      const tests = stmt.tests.map(t => render(t)).join(', ');
      const step = printAssignment(stmt.step, render);
      out.push(`${pad}for ${init}; ${tests};${step ? ` ${step}` : ''} {`);
      printStatements(stmt.body, depth + 1, render, out);
      out.push(`${pad}}`);
      break;
    }
    case 'block':
      // The grammar has no bare blocks; nested statements are written in place.
      printStatements(stmt, depth, render, out);
      break;
  }
}

function renderProgram(program: Program, expression: Render): string {
  const out: string[] = [];
  printStatements(program.root, 0, expression, out);
  return out.length > 0 ? out.join('\n') + '\n' : '';
}

export function printProgram(program: Program): string {
  return renderProgram(program, printExpression);
}

/** The program's statements with every expression in `describeTypedExpression` form. */
export function describeTypedProgram(program: Program): string {
  return renderProgram(program, describeTypedExpression);
}

/** Lists every scope with its bindings, e.g. `scope 1 (parent 0)` then `  x: int -> v1_x (shadow)`. */
export function describeScopes(program: Program): string {
  const out: string[] = [];
  for (const table of program.scopes.tables) {
    out.push(table.parent === null ? `scope ${table.id} (global)` : `scope ${table.id} (parent ${table.parent})`);
    for (const entry of table.entries.values()) {
      out.push(`${INDENT}${entry.name}: ${entry.type} -> ${entry.storage}${entry.shadowing ? ' (shadow)' : ''}`);
    }
  }
  return out.join('\n') + '\n';
}
