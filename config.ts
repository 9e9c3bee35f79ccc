import * as fs from 'fs';
import * as path from 'path';

// --- Configuration Types ---

export type ToolchainConfig = {
  /** Assembler executable, looked up on PATH */
  assembler: string;
  /** Flags passed before the source file */
  assemblerArgs: string[];
  /** Linker executable, looked up on PATH */
  linker: string;
  /** ELF interpreter the executable is linked against */
  dynamicLinker: string;
  /** Libraries passed as -l<name> */
  libraries: string[];
};

export type OutputConfig = {
  executable: string;
  /** Keep the generated assembly at this path instead of a temp file */
  assemblyFile?: string;
};

export type CompilerConfig = {
  toolchain: ToolchainConfig;
  output: OutputConfig;
  verbose: boolean;
};

export type ConfigOverrides = {
  toolchain?: Partial<ToolchainConfig>;
  output?: Partial<OutputConfig>;
  verbose?: boolean;
};

// --- Defaults ---

export const CONFIG_FILE_NAME = 'shadec.config.json';

export const DEFAULT_TOOLCHAIN_CONFIG: ToolchainConfig = {
  assembler: 'yasm',
  assemblerArgs: ['-Worphan-labels', '-g', 'dwarf2', '-f', 'elf64'],
  linker: 'ld',
  dynamicLinker: '/lib64/ld-linux-x86-64.so.2',
  libraries: ['c']
};

export const DEFAULT_CONFIG: CompilerConfig = {
  toolchain: DEFAULT_TOOLCHAIN_CONFIG,
  output: { executable: 'a.out' },
  verbose: false
};

// --- Loading ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function readString(source: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Config ${where}.${key} must be a string`);
  }
  return value;
}

function readStringArray(source: Record<string, unknown>, key: string, where: string): string[] | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!isStringArray(value)) {
    throw new Error(`Config ${where}.${key} must be an array of strings`);
  }
  return value;
}

/**
 * Validates a parsed config object. Unknown keys are ignored.
 */
export function configFromObject(data: unknown): ConfigOverrides {
  if (!isRecord(data)) {
    throw new Error('Config must be a JSON object');
  }
  const result: ConfigOverrides = {};

  const toolchain = data.toolchain;
  if (toolchain !== undefined) {
    if (!isRecord(toolchain)) throw new Error('Config toolchain must be an object');
    // Only keys that are present, so later layers keep earlier values.
    const tc: Partial<ToolchainConfig> = {};
    const assembler = readString(toolchain, 'assembler', 'toolchain');
    if (assembler !== undefined) tc.assembler = assembler;
    const assemblerArgs = readStringArray(toolchain, 'assemblerArgs', 'toolchain');
    if (assemblerArgs !== undefined) tc.assemblerArgs = assemblerArgs;
    const linker = readString(toolchain, 'linker', 'toolchain');
    if (linker !== undefined) tc.linker = linker;
    const dynamicLinker = readString(toolchain, 'dynamicLinker', 'toolchain');
    if (dynamicLinker !== undefined) tc.dynamicLinker = dynamicLinker;
    const libraries = readStringArray(toolchain, 'libraries', 'toolchain');
    if (libraries !== undefined) tc.libraries = libraries;
    result.toolchain = tc;
  }

  const output = data.output;
  if (output !== undefined) {
    if (!isRecord(output)) throw new Error('Config output must be an object');
    const out: Partial<OutputConfig> = {};
    const executable = readString(output, 'executable', 'output');
    if (executable !== undefined) out.executable = executable;
    const assemblyFile = readString(output, 'assemblyFile', 'output');
    if (assemblyFile !== undefined) out.assemblyFile = assemblyFile;
    result.output = out;
  }

  if (data.verbose !== undefined) {
    if (typeof data.verbose !== 'boolean') throw new Error('Config verbose must be a boolean');
    result.verbose = data.verbose;
  }
  return result;
}

export function configFromFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Config file ${filePath} is not valid JSON: ${msg}`);
  }
  return configFromObject(data);
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const tc: Partial<ToolchainConfig> = {};
  if (env.SHADEC_ASSEMBLER) tc.assembler = env.SHADEC_ASSEMBLER;
  if (env.SHADEC_LINKER) tc.linker = env.SHADEC_LINKER;
  if (env.SHADEC_DYNAMIC_LINKER) tc.dynamicLinker = env.SHADEC_DYNAMIC_LINKER;
  return { toolchain: tc };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ConfigOverrides[]): CompilerConfig {
  const result: CompilerConfig = {
    toolchain: { ...DEFAULT_CONFIG.toolchain },
    output: { ...DEFAULT_CONFIG.output },
    verbose: DEFAULT_CONFIG.verbose
  };
  for (const cfg of configs) {
    if (cfg.toolchain) result.toolchain = { ...result.toolchain, ...cfg.toolchain };
    if (cfg.output) result.output = { ...result.output, ...cfg.output };
    if (cfg.verbose !== undefined) result.verbose = cfg.verbose;
  }
  return result;
}

/**
 * Priority: overrides (CLI) > environment > config file > defaults.
 */
export function loadConfig(options: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
} = {}): CompilerConfig {
  const layers: ConfigOverrides[] = [];

  if (options.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const defaultPath = path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);
    if (fs.existsSync(defaultPath)) {
      layers.push(configFromFile(defaultPath));
    }
  }

  layers.push(configFromEnv(options.env ?? process.env));
  if (options.overrides) layers.push(options.overrides);
  return mergeConfigs(...layers);
}
