import { describe, it, expect } from 'vitest';
import { formatAssembly } from '../compiler/assembly';
import { compileSource } from '../compiler/pipeline';
import { AssemblyDocument } from '../types';

describe('assembly formatter', () => {
  it('renders the sections in order with aligned columns', () => {
    expect(compileSource('x = 1').assembly).toBe([
      'bits 64',
      'global _start',
      'extern exit',
      'section .data',
      'const_0     equ       1',
      'v_x         dq        0',
      '            section   .text',
      '_start:',
      '            cld',
      '            mov       rbp, rsp',
      '            mov       rax, const_0',
      '            push      rax',
      '            pop       qword [v_x]',
      '            mov       rsp, rbp',
      '            xor       edi, edi',
      '            call      exit',
      ''
    ].join('\n'));
  });

  it('keeps a space after names wider than the column', () => {
    const doc: AssemblyDocument = {
      header: [],
      constants: [],
      variables: [['a_very_long_name', 'dq', '0']],
      program: []
    };
    expect(formatAssembly(doc)).toBe('a_very_long_name dq        0\n');
  });
});
