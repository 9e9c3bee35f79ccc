import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CONFIG, CONFIG_FILE_NAME, configFromObject, configFromEnv, configFromFile, mergeConfigs, loadConfig
} from '../config';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shadec-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('defaults to yasm and ld', () => {
    expect(mergeConfigs()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.toolchain.assembler).toBe('yasm');
    expect(DEFAULT_CONFIG.output.executable).toBe('a.out');
  });

  it('keeps only the keys a layer sets', () => {
    expect(configFromObject({ toolchain: { assembler: 'nasm' }, extra: 1 })).toEqual({ toolchain: { assembler: 'nasm' } });
    expect(mergeConfigs({ toolchain: { assembler: 'nasm' } }).toolchain.linker).toBe('ld');
  });

  it('rejects values of the wrong type', () => {
    expect(() => configFromObject('x')).toThrow('Config must be a JSON object');
    expect(() => configFromObject({ toolchain: { assembler: 5 } })).toThrow('Config toolchain.assembler must be a string');
    expect(() => configFromObject({ toolchain: { libraries: [1] } }))
      .toThrow('Config toolchain.libraries must be an array of strings');
    expect(() => configFromObject({ output: [] })).toThrow('Config output must be an object');
    expect(() => configFromObject({ verbose: 'yes' })).toThrow('Config verbose must be a boolean');
  });

  it('reads tool names from the environment', () => {
    expect(configFromEnv({ SHADEC_ASSEMBLER: 'nasm', SHADEC_DYNAMIC_LINKER: '/lib/ld.so' })).toEqual({
      toolchain: { assembler: 'nasm', dynamicLinker: '/lib/ld.so' }
    });
    expect(configFromEnv({})).toEqual({ toolchain: {} });
  });

  it('layers file, environment and overrides', () => {
    fs.writeFileSync(
      path.join(dir, CONFIG_FILE_NAME),
      JSON.stringify({ toolchain: { linker: 'ld.gold', libraries: ['c', 'm'] }, output: { executable: 'prog' } })
    );
    const config = loadConfig({
      cwd: dir,
      env: { SHADEC_LINKER: 'lld' },
      overrides: { output: { executable: 'cli-out' } }
    });
    expect(config.toolchain.linker).toBe('lld');
    expect(config.toolchain.libraries).toEqual(['c', 'm']);
    expect(config.toolchain.assembler).toBe('yasm');
    expect(config.output.executable).toBe('cli-out');
  });

  it('uses the defaults without a config file', () => {
    expect(loadConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('reports missing and malformed config files', () => {
    const missing = path.join(dir, 'missing.json');
    expect(() => loadConfig({ configFile: missing, env: {} })).toThrow(`Config file not found: ${missing}`);

    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{ nope');
    expect(() => configFromFile(broken)).toThrow(`Config file ${broken} is not valid JSON`);
  });
});
