#!/usr/bin/env node
import * as fs from 'fs';
import { TokenKind } from './types';
import { loadConfig, ConfigOverrides } from './config';
import { Compiler } from './compiler/pipeline';
import { describeTypedProgram, describeScopes } from './compiler/printer';
import { Toolchain, CommandRunner } from './compiler/toolchain';
import { CompileError, ToolchainError } from './compiler/errors';
import { renderReport } from './Report';

export const VERSION = '0.1.0';

export interface CliOptions {
  file?: string;
  output?: string;
  emitAsm: boolean;
  ast: boolean;
  tokens: boolean;
  report?: string;
  config?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Process runner for the assembler and linker; the real one when omitted. */
  runner?: CommandRunner;
}

const USAGE = `Usage: shadec [options] <file>

Options:
  -o <path>          Write the executable to <path> (default a.out)
  --emit-asm         Print the generated assembly instead of building
  --ast              Print the typed program and its scopes
  --tokens           Print the token stream
  --report <html>    Write an HTML compilation report
  --config <path>    Read configuration from <path>
  --verbose          Trace each compilation stage
  -h, --help         Show this help
  -v, --version      Show the version`;

export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    emitAsm: false,
    ast: false,
    tokens: false,
    verbose: false,
    help: false,
    version: false
  };

  const valueOf = (flag: string, i: number): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`Option ${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-o':
        options.output = valueOf(arg, i++);
        break;
      case '--report':
        options.report = valueOf(arg, i++);
        break;
      case '--config':
        options.config = valueOf(arg, i++);
        break;
      case '--emit-asm':
        options.emitAsm = true;
        break;
      case '--ast':
        options.ast = true;
        break;
      case '--tokens':
        options.tokens = true;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      default:
        if (arg.startsWith('-')) throw new Error(`Unknown option ${arg}`);
        if (options.file !== undefined) throw new Error(`Unexpected argument ${arg}`);
        options.file = arg;
    }
  }
  return options;
}

function reportError(e: unknown, io: CliIO) {
  if (e instanceof CompileError) {
    io.err(e.toString());
    if (e instanceof ToolchainError && e.diagnostics) io.err(e.diagnostics);
  } else {
    io.err(`error: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/** Runs the compiler for one command line and returns the process exit code. */
export async function run(argv: string[], io: CliIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (e: unknown) {
    reportError(e, io);
    io.err(USAGE);
    return 1;
  }

  if (options.help) {
    io.out(USAGE);
    return 0;
  }
  if (options.version) {
    io.out(`shadec ${VERSION}`);
    return 0;
  }
  if (options.file === undefined) {
    io.err('error: no input file');
    io.err(USAGE);
    return 1;
  }

  try {
    const overrides: ConfigOverrides = {};
    if (options.output !== undefined) overrides.output = { executable: options.output };
    if (options.verbose) overrides.verbose = true;
    const config = loadConfig({ configFile: options.config, cwd: io.cwd, env: io.env, overrides });

    const log = config.verbose ? io.out : () => {};
    const source = fs.readFileSync(options.file, 'utf8');
    const compiler = new Compiler();
    compiler.onLog = log;
    const result = compiler.compile(source);

    if (options.tokens) {
      for (const t of result.tokens) {
        io.out(`${t.line}:${t.column}\t${TokenKind[t.kind]}\t${t.text}`);
      }
    }
    if (options.ast) {
      io.out(describeTypedProgram(result.program).trimEnd());
      io.out(describeScopes(result.program).trimEnd());
    }
    if (options.report !== undefined) {
      fs.writeFileSync(options.report, renderReport(result, options.file), 'utf8');
      log(`wrote report to ${options.report}`);
    }
    if (options.emitAsm) {
      io.out(result.assembly.trimEnd());
      return 0;
    }
    if (options.tokens || options.ast) return 0;

    const toolchain = new Toolchain(config.toolchain, io.runner);
    toolchain.onLog = log;
    await toolchain.build(result.document, config.output.executable, config.output.assemblyFile);
    log(`built ${config.output.executable}`);
    return 0;
  } catch (e: unknown) {
    reportError(e, io);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line)
  }).then(
    (code) => { process.exitCode = code; },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    }
  );
}
