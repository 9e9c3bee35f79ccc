import { AssemblyDocument } from '../types';

const NAME_WIDTH = 12;
const DIRECTIVE_WIDTH = 10;

function columns(first: string, second: string, third: string): string {
  // Long names still get one separating space.
  return `${first.padEnd(NAME_WIDTH - 1)} ${second.padEnd(DIRECTIVE_WIDTH - 1)} ${third}`.trimEnd();
}

// Renders the document as yasm source, one section after the other.
export function formatAssembly(doc: AssemblyDocument): string {
  const lines: string[] = [...doc.header];
  for (const [name, value] of doc.constants) {
    lines.push(columns(name, 'equ', value));
  }
  for (const [name, directive, value] of doc.variables) {
    lines.push(columns(name, directive, value));
  }
  for (const [label, instruction, operands] of doc.program) {
    lines.push(columns(label, instruction, operands));
  }
  return lines.join('\n') + '\n';
}
