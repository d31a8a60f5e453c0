import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { ConfigError, describeError } from './errors.js';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const ConfigSchema = z.object({
  catalog: z
    .object({
      // Bundled config/catalog.yaml when unset.
      path: z.string().optional(),
    })
    .default({}),
  generation: z
    .object({
      tier: z.enum(['basic', 'creative', 'optimize']).default('creative'),
      count: z.number().int().positive().default(5),
      neutralization: z.string().default('industry'),
      seed: z.number().int().nonnegative().optional(),
    })
    .default({}),
  validation: z
    .object({
      maxFieldRepeats: z.number().int().positive().default(3),
    })
    .default({}),
  optimization: z
    .object({
      enabled: z.boolean().default(false),
      iterations: z.number().int().positive().default(50),
      patience: z.number().int().positive().default(10),
      retriesPerIteration: z.number().int().positive().default(5),
    })
    .default({}),
  pipeline: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
    })
    .default({}),
  output: z
    .object({
      dir: z.string().default('./data/generated_alphas'),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type AlphaForgeConfig = z.infer<typeof ConfigSchema>;

export function defaultConfigPath(): string {
  return process.env.ALPHA_FORGE_CONFIG_PATH ?? join(homedir(), '.alpha-forge', 'config.yaml');
}

export function parseConfig(input: unknown): AlphaForgeConfig {
  const result = ConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Load configuration from YAML. Without an explicit path a missing file
 * means defaults; an explicit path must exist.
 */
export function loadConfig(configPath?: string): AlphaForgeConfig {
  const path = expandHome(configPath ?? defaultConfigPath());

  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return parseConfig({});
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read config ${path}: ${describeError(error)}`, { cause: error });
  }

  const cfg = parseConfig(parsed);

  if (cfg.catalog.path) {
    cfg.catalog.path = resolvePath(cfg.catalog.path);
  }
  cfg.output.dir = expandHome(cfg.output.dir);

  return cfg;
}

function resolvePath(value: string): string {
  const expanded = expandHome(value);
  return isAbsolute(expanded) ? expanded : resolve(process.cwd(), expanded);
}
