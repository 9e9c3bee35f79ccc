import { spawn } from 'child_process';
import { promises as fs, constants as fsConstants } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AssemblyDocument } from '../types';
import { ToolchainConfig } from '../config';
import { ToolchainError, ToolchainStage } from './errors';
import { formatAssembly } from './assembly';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
  /** Absolute path of the executable, or null when it is not installed. */
  which(command: string): Promise<string | null>;
}

export class ProcessRunner implements CommandRunner {
  public run(command: string, args: string[]): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: 'pipe' });

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (d: string) => { stdout += d; });
      child.stderr.on('data', (d: string) => { stderr += d; });

      child.on('error', reject);
      child.on('close', (code) => {
        resolve({ exitCode: code, stdout, stderr });
      });
    });
  }

  public async which(command: string): Promise<string | null> {
    const candidates = command.includes(path.sep)
      ? [command]
      : (process.env.PATH ?? '').split(path.delimiter).filter(Boolean).map(dir => path.join(dir, command));

    for (const candidate of candidates) {
      const executable = await fs.access(candidate, fsConstants.X_OK).then(() => true, () => false);
      if (executable) return candidate;
    }
    return null;
  }
}

/**
 * Turns an assembly document into an executable with an external assembler and
 * linker. Never leaves a partial executable behind.
 */
export class Toolchain {
  public onLog: (msg: string) => void = () => {};

  constructor(
    private config: ToolchainConfig,
    private runner: CommandRunner = new ProcessRunner()
  ) {}

  public async build(doc: AssemblyDocument, executable: string, assemblyFile?: string): Promise<void> {
    const assembler = await this.locate(this.config.assembler);
    const linker = await this.locate(this.config.linker);

    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'shadec-'));
    try {
      const source = assemblyFile ?? path.join(workDir, 'program.asm');
      const object = path.join(workDir, 'program.o');
      await fs.writeFile(source, formatAssembly(doc), 'utf8');
      this.onLog(`wrote assembly to ${source}`);

      await this.step('assemble', assembler, [...this.config.assemblerArgs, source, '-o', object]);

      try {
        await this.step('link', linker, [
          '-dynamic-linker', this.config.dynamicLinker,
          '-o', executable,
          object,
          ...this.config.libraries.map(lib => `-l${lib}`)
        ]);
      } catch (e: unknown) {
        await fs.rm(executable, { force: true });
        throw e;
      }
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  private async locate(command: string): Promise<string> {
    const found = await this.runner.which(command);
    if (!found) {
      throw new ToolchainError('lookup', `'${command}' not found. Please install it`);
    }
    return found;
  }

  private async step(stage: ToolchainStage, command: string, args: string[]): Promise<void> {
    this.onLog(`${stage}: ${command} ${args.join(' ')}`);
    let result: CommandResult;
    try {
      result = await this.runner.run(command, args);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new ToolchainError(stage, `Could not run ${command}: ${msg}`);
    }
    if (result.exitCode !== 0) {
      const what = stage === 'assemble' ? 'assembling the source code' : 'linking the object file';
      throw new ToolchainError(
        stage,
        `Error while ${what} (exit code ${result.exitCode ?? 'none'})`,
        [result.stderr, result.stdout].filter(s => s.length > 0).join('\n')
      );
    }
  }
}
