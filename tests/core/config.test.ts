import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { defaultConfigPath, loadConfig, parseConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';

describe('config', () => {
  let dir: string;
  const savedPath = process.env.ALPHA_FORGE_CONFIG_PATH;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'alpha-forge-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    if (savedPath === undefined) {
      delete process.env.ALPHA_FORGE_CONFIG_PATH;
    } else {
      process.env.ALPHA_FORGE_CONFIG_PATH = savedPath;
    }
  });

  it('fills every section with defaults', () => {
    const config = parseConfig({});
    expect(config.generation).toEqual({ tier: 'creative', count: 5, neutralization: 'industry' });
    expect(config.validation.maxFieldRepeats).toBe(3);
    expect(config.optimization).toEqual({ enabled: false, iterations: 50, patience: 10, retriesPerIteration: 5 });
    expect(config.pipeline.maxAttempts).toBe(3);
    expect(config.output.dir).toBe('./data/generated_alphas');
    expect(config.logging.level).toBe('info');
    expect(config.catalog.path).toBeUndefined();
  });

  it('rejects values that do not match the schema', () => {
    expect(() => parseConfig({ generation: { tier: 'fancy' } })).toThrow(ConfigError);
    expect(() => parseConfig({ generation: { count: 0 } })).toThrow(/^Invalid configuration: generation\.count/);
  });

  it('reads YAML and resolves paths', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(
      path,
      ['generation:', '  tier: optimize', '  count: 7', 'catalog:', '  path: ./catalog.yaml', 'output:', '  dir: ~/alphas'].join(
        '\n'
      )
    );
    const config = loadConfig(path);
    expect(config.generation.tier).toBe('optimize');
    expect(config.generation.count).toBe(7);
    expect(config.catalog.path).toBe(resolve(process.cwd(), './catalog.yaml'));
    expect(config.output.dir).toBe(join(homedir(), 'alphas'));
  });

  it('treats an empty file as all defaults', () => {
    const path = join(dir, 'empty.yaml');
    writeFileSync(path, '');
    expect(loadConfig(path).generation.count).toBe(5);
  });

  it('fails for an explicit path that does not exist', () => {
    expect(() => loadConfig(join(dir, 'absent.yaml'))).toThrow(ConfigError);
  });

  it('falls back to defaults when the default file is missing', () => {
    process.env.ALPHA_FORGE_CONFIG_PATH = join(dir, 'absent.yaml');
    expect(defaultConfigPath()).toBe(join(dir, 'absent.yaml'));
    expect(loadConfig().generation.tier).toBe('creative');
  });

  it('wraps YAML syntax errors in ConfigError', () => {
    const path = join(dir, 'bad.yaml');
    writeFileSync(path, 'generation: [1, 2\n');
    expect(() => loadConfig(path)).toThrow(ConfigError);
  });
});
