import { Token, Program, AssemblyDocument } from '../types';
import { Lexer } from './lexer';
import { TokenStream } from './tokenStream';
import { Parser } from './parser';
import { SemanticAnalyzer } from './semantic';
import { TargetCodeGenerator } from './target';
import { formatAssembly } from './assembly';

export interface FrontEndResult {
  tokens: Token[];
  program: Program;
}

export interface CompileResult extends FrontEndResult {
  document: AssemblyDocument;
  assembly: string;
}

function* recording(tokens: Iterable<Token>, sink: Token[]): Generator<Token, void, undefined> {
  for (const t of tokens) {
    sink.push(t);
    yield t;
  }
}

export class Compiler {
  public onLog: (msg: string) => void = () => {};

  /**
   * Lexes and parses in lockstep. A lexical error ends the token stream early, so
   * it is reported in place of whatever parse error the truncated stream caused.
   */
  public parse(source: string): FrontEndResult {
    const lexer = new Lexer(source);
    const tokens: Token[] = [];
    const parser = new Parser(new TokenStream(recording(lexer.tokens(), tokens)));

    let program: Program;
    try {
      program = parser.parse();
    } catch (e: unknown) {
      if (lexer.error) throw lexer.error;
      throw e;
    }
    if (lexer.error) throw lexer.error;

    this.onLog(`parsed ${program.root.statements.length} top-level statement(s) from ${tokens.length} token(s)`);
    return { tokens, program };
  }

  public frontEnd(source: string): FrontEndResult {
    const result = this.parse(source);
    new SemanticAnalyzer().analyze(result.program);
    this.onLog(`analyzed ${result.program.scopes.tables.length} scope(s)`);
    return result;
  }

  public compile(source: string): CompileResult {
    const result = this.frontEnd(source);
    const document = new TargetCodeGenerator().generate(result.program);
    this.onLog(`generated ${document.program.length} program line(s)`);
    return { ...result, document, assembly: formatAssembly(document) };
  }
}

export function compileSource(source: string): CompileResult {
  return new Compiler().compile(source);
}
