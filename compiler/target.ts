import {
  Type, Program, Statement, Expression, Assignment, Condition, Loop, Block,
  Variable, Constant, BinaryOp, UnaryOp, BinaryOperator,
  AssemblyDocument, ARITHMETIC_OPERATORS, LOGICAL_OPERATORS
} from '../types';
import { lengthLabel } from './symbolTable';

export const HEADER = ['bits 64', 'global _start', 'extern exit', 'section .data'];

const INT_ARITHMETIC: Partial<Record<BinaryOperator, string>> = { '+': 'add', '-': 'sub', '*': 'imul' };
const FLOAT_ARITHMETIC: Partial<Record<BinaryOperator, string>> = { '+': 'addsd', '-': 'subsd', '*': 'mulsd', '/': 'divsd' };
const SIGNED_SET: Partial<Record<BinaryOperator, string>> = {
  '==': 'sete', '!=': 'setne', '<': 'setl', '<=': 'setle', '>': 'setg', '>=': 'setge'
};
const UNSIGNED_SET: Partial<Record<BinaryOperator, string>> = {
  '==': 'sete', '!=': 'setne', '<': 'setb', '<=': 'setbe', '>': 'seta', '>=': 'setae'
};
// Set instructions for 'a < b' and 'a <= b' evaluated as 'b > a' and 'b >= a'.
const SWAPPED_FLOAT_SET: Partial<Record<BinaryOperator, string>> = { '<': 'seta', '<=': 'setae' };

export function floatBits(text: string): string {
  const buf = Buffer.alloc(8);
  buf.writeDoubleBE(Number(text));
  return `0x${buf.toString('hex')}`;
}

function lookupInstruction(table: Partial<Record<BinaryOperator, string>>, op: BinaryOperator): string {
  const ins = table[op];
  if (!ins) {
    throw new Error(`No instruction for operator '${op}'`);
  }
  return ins;
}

/**
 * Lowers a typed program to a yasm document for x86-64 Linux.
 * Every expression leaves its value on the machine stack: one qword, or
 * pointer then length for strings.
 */
export class TargetCodeGenerator {
  private doc: AssemblyDocument = { header: [], constants: [], variables: [], program: [] };
  private labelCount: number = 0;
  private constantLabels: Map<string, string> = new Map();

  public generate(program: Program): AssemblyDocument {
    this.doc = { header: [...HEADER], constants: [], variables: [], program: [] };
    this.labelCount = 0;
    this.constantLabels = new Map();

    for (const entry of program.scopes.allEntries()) {
      if (entry.type === Type.Unknown) {
        throw new Error(`Binding '${entry.name}' has no type`);
      }
      this.doc.variables.push([entry.storage, 'dq', '0']);
      if (entry.type === Type.String) {
        this.doc.variables.push([lengthLabel(entry.storage), 'dq', '0']);
      }
    }

    this.emit('', 'section', '.text');
    this.emit('_start:', '', '');
    this.emit('', 'cld', '');
    this.emit('', 'mov', 'rbp, rsp');
    this.genBlock(program.root);
    this.emit('', 'mov', 'rsp, rbp');
    this.emit('', 'xor', 'edi, edi');
    this.emit('', 'call', 'exit');
    return this.doc;
  }

  private emit(label: string, instruction: string, operands: string) {
    this.doc.program.push([label, instruction, operands]);
  }

  private ins(instruction: string, operands: string = '') {
    this.emit('', instruction, operands);
  }

  private label(name: string) {
    this.emit(`${name}:`, '', '');
  }

  private newLabelSuffix(): number {
    return this.labelCount++;
  }

  private genBlock(block: Block) {
    for (const stmt of block.statements) {
      this.genStatement(stmt);
    }
  }

  private genStatement(stmt: Statement) {
    switch (stmt.kind) {
      case 'assignment':
        this.genAssignment(stmt);
        break;
      case 'condition':
        this.genCondition(stmt);
        break;
      case 'loop':
        this.genLoop(stmt);
        break;
      case 'block':
        this.genBlock(stmt);
        break;
      default: {
        const unreachable: never = stmt;
        throw new Error(`Unknown statement ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private genAssignment(stmt: Assignment) {
    for (const value of stmt.values) {
      this.genExpression(value);
    }
    // Last value is on top of the stack.
    for (let i = stmt.targets.length - 1; i >= 0; i--) {
      const target = stmt.targets[i];
      const storage = this.storageOf(target);
      if (target.type === Type.String) {
        this.ins('pop', `qword [${lengthLabel(storage)}]`);
      }
      this.ins('pop', `qword [${storage}]`);
    }
  }

  private genCondition(stmt: Condition) {
    const n = this.newLabelSuffix();
    this.genExpression(stmt.test);
    this.ins('pop', 'rax');
    this.ins('cmp', 'rax, 0');
    this.ins('je', `else_${n}`);
    this.genBlock(stmt.then);
    this.ins('jmp', `endif_${n}`);
    this.label(`else_${n}`);
    this.genBlock(stmt.otherwise);
    this.label(`endif_${n}`);
  }

  private genLoop(stmt: Loop) {
    const n = this.newLabelSuffix();
    this.genAssignment(stmt.init);
    this.label(`loop_${n}`);
    // All tests must hold; no tests loops forever.
    for (const test of stmt.tests) {
      this.genExpression(test);
      this.ins('pop', 'rax');
      this.ins('cmp', 'rax, 0');
      this.ins('je', `endloop_${n}`);
    }
    this.genBlock(stmt.body);
    this.genAssignment(stmt.step);
    this.ins('jmp', `loop_${n}`);
    this.label(`endloop_${n}`);
  }

  private storageOf(v: Variable): string {
    if (v.symbol === null) {
      throw new Error(`Variable '${v.name}' was not resolved`);
    }
    return v.symbol;
  }

  private genExpression(expr: Expression) {
    switch (expr.kind) {
      case 'variable': {
        const storage = this.storageOf(expr);
        if (expr.copiedFrom !== null) {
          this.copySlot(expr.copiedFrom, storage);
          if (expr.type === Type.String) {
            this.copySlot(lengthLabel(expr.copiedFrom), lengthLabel(storage));
          }
        }
        this.ins('push', `qword [${storage}]`);
        if (expr.type === Type.String) {
          this.ins('push', `qword [${lengthLabel(storage)}]`);
        }
        break;
      }
      case 'constant':
        this.genConstant(expr);
        break;
      case 'unary':
        this.genUnary(expr);
        break;
      case 'binary':
        this.genBinary(expr);
        break;
      default: {
        const unreachable: never = expr;
        throw new Error(`Unknown expression ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private copySlot(from: string, to: string) {
    this.ins('mov', `rax, qword [${from}]`);
    this.ins('mov', `qword [${to}], rax`);
  }

  private genConstant(c: Constant) {
    if (c.type === Type.String) {
      const { data, length } = this.stringConstant(c.value);
      this.ins('mov', `rax, ${data}`);
      this.ins('push', 'rax');
      this.ins('mov', `rax, ${length}`);
      this.ins('push', 'rax');
      return;
    }
    this.ins('mov', `rax, ${this.numericConstant(c)}`);
    this.ins('push', 'rax');
  }

  // Equal literals share one symbol.
  private numericConstant(c: Constant): string {
    const key = `${c.type}:${c.value}`;
    const known = this.constantLabels.get(key);
    if (known) return known;

    let value: string;
    switch (c.type) {
      case Type.Int:
        value = BigInt(c.value).toString();
        break;
      case Type.Float:
        value = floatBits(c.value);
        break;
      case Type.Bool:
        value = c.value === 'true' ? '1' : '0';
        break;
      default:
        throw new Error(`Constant ${c.value} has no numeric type`);
    }
    const name = `const_${this.constantLabels.size}`;
    this.constantLabels.set(key, name);
    this.doc.constants.push([name, value]);
    return name;
  }

  private stringConstant(literal: string): { data: string, length: string } {
    const key = `${Type.String}:${literal}`;
    const index = this.constantLabels.get(key) ?? `${this.constantLabels.size}`;
    const data = `str_${index}`;
    const length = `strlen_${index}`;
    if (!this.constantLabels.has(key)) {
      this.constantLabels.set(key, index);
      const text = literal.slice(1, -1);
      this.doc.constants.push([length, `${Buffer.byteLength(text)}`]);
      this.doc.variables.push([data, 'db', text.length > 0 ? `"${text}"` : '0']);
    }
    return { data, length };
  }

  private genUnary(u: UnaryOp) {
    this.genExpression(u.operand);
    this.ins('pop', 'rax');
    if (u.operator === 'not') {
      this.ins('xor', 'rax, 1');
    } else if (u.type === Type.Float) {
      this.ins('btc', 'rax, 63');
    } else {
      this.ins('neg', 'rax');
    }
    this.ins('push', 'rax');
  }

  private genBinary(b: BinaryOp) {
    this.genExpression(b.left);
    this.genExpression(b.right);

    const operandType = b.left.type;
    if (operandType === Type.String) {
      this.genStringComparison(b.operator);
      return;
    }

    this.ins('pop', 'rbx');
    this.ins('pop', 'rax');

    if (LOGICAL_OPERATORS.has(b.operator)) {
      this.ins(b.operator === '&&' ? 'and' : 'or', 'rax, rbx');
    } else if (operandType === Type.Float) {
      this.ins('movq', 'xmm0, rax');
      this.ins('movq', 'xmm1, rbx');
      if (ARITHMETIC_OPERATORS.has(b.operator)) {
        this.ins(lookupInstruction(FLOAT_ARITHMETIC, b.operator), 'xmm0, xmm1');
        this.ins('movq', 'rax, xmm0');
      } else {
        this.genFloatComparison(b.operator);
      }
    } else if (ARITHMETIC_OPERATORS.has(b.operator)) {
      if (b.operator === '/') {
        this.ins('cqo');
        this.ins('idiv', 'rbx');
      } else {
        this.ins(lookupInstruction(INT_ARITHMETIC, b.operator), 'rax, rbx');
      }
    } else {
      this.ins('cmp', 'rax, rbx');
      this.ins(lookupInstruction(SIGNED_SET, b.operator), 'al');
      this.ins('movzx', 'rax, al');
    }
    this.ins('push', 'rax');
  }

  // An unordered ucomisd sets ZF, PF and CF, so every test below is false on NaN
  // except '!='. '<' and '<=' swap the operands to test CF clear instead of set.
  private genFloatComparison(op: BinaryOperator) {
    const swapped = op === '<' || op === '<=';
    this.ins('ucomisd', swapped ? 'xmm1, xmm0' : 'xmm0, xmm1');
    if (op === '==') {
      this.ins('sete', 'al');
      this.ins('setnp', 'cl');
      this.ins('and', 'al, cl');
    } else if (op === '!=') {
      this.ins('setne', 'al');
      this.ins('setp', 'cl');
      this.ins('or', 'al, cl');
    } else {
      this.ins(lookupInstruction(swapped ? SWAPPED_FLOAT_SET : UNSIGNED_SET, op), 'al');
    }
    this.ins('movzx', 'rax, al');
  }

  // Compares the common prefix bytewise, then the lengths.
  private genStringComparison(op: BinaryOperator) {
    const n = this.newLabelSuffix();
    this.ins('pop', 'r9');
    this.ins('pop', 'rdi');
    this.ins('pop', 'r8');
    this.ins('pop', 'rsi');
    this.ins('mov', 'rcx, r8');
    this.ins('cmp', 'rcx, r9');
    this.ins('cmova', 'rcx, r9');
    this.ins('test', 'rcx, rcx');
    this.ins('jz', `strlen_cmp_${n}`);
    this.ins('repe', 'cmpsb');
    this.ins('jne', `str_cmp_${n}`);
    this.label(`strlen_cmp_${n}`);
    this.ins('cmp', 'r8, r9');
    this.label(`str_cmp_${n}`);
    this.ins(lookupInstruction(UNSIGNED_SET, op), 'al');
    this.ins('movzx', 'rax, al');
    this.ins('push', 'rax');
  }
}
