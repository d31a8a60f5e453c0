/**
 * Alpha Forge - Alpha Expression Generator
 *
 * Main entry point for the Alpha Forge library.
 */

import type { Catalog } from './catalog/catalog.js';
import { loadCatalog, loadDefaultCatalog } from './catalog/loader.js';
import { loadConfig, type AlphaForgeConfig } from './core/config.js';
import { Logger } from './core/logger.js';
import { AlphaGenerator } from './generator/generator.js';
import { AlphaOptimizer } from './optimizer/optimizer.js';
import { runPipeline, type PipelineResult } from './pipeline/driver.js';
import { toCandidateRecord } from './pipeline/records.js';
import { saveCandidates } from './pipeline/store.js';
import type { CandidateRecord, GenerationTier } from './types/index.js';
import { AlphaValidator } from './validator/validator.js';

// Re-export types
export * from './types/index.js';

export * from './catalog/types.js';
export { Catalog, createCatalog, type OperatorQuery } from './catalog/catalog.js';
export { defaultCatalogPath, loadCatalog, loadDefaultCatalog, parseCatalogDefinition } from './catalog/loader.js';
export {
  AlphaForgeError,
  CatalogError,
  ConfigError,
  GenerationError,
  OptimizationError,
  type AlphaForgeErrorCode,
} from './core/errors.js';
export { defaultConfigPath, loadConfig, parseConfig, type AlphaForgeConfig } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export * from './expression/types.js';
export { depth, fieldUsage, nodeCount, walk } from './expression/tree.js';
export { formatExpression, renderExpression, type FormatOptions } from './expression/render.js';
export {
  AlphaGenerator,
  CandidateSequence,
  generateAlphas,
  type GenerateOptions,
  type GeneratorOptions,
} from './generator/generator.js';
export { SeededRandom } from './generator/random.js';
export {
  AlphaValidator,
  type ReviewedBatch,
  type ValidatorOptions,
} from './validator/validator.js';
export { MAX_EXPRESSION_DEPTH, MAX_EXPRESSION_NODES, VALIDATION_RULES, type ValidationRule } from './validator/rules.js';
export { AlphaOptimizer, type OptimizerOptions } from './optimizer/optimizer.js';
export { DEFAULT_SCORE_WEIGHTS, scoreExpression, type ScoreBreakdown, type ScoreWeights } from './optimizer/score.js';
export type { OptimizationResult, SearchConfig, StopReason } from './optimizer/types.js';
export { runPipeline, type PipelineDeps, type PipelineRequest, type PipelineResult } from './pipeline/driver.js';
export { toCandidateRecord } from './pipeline/records.js';
export { loadCandidates, saveCandidates } from './pipeline/store.js';
export { formatCandidates, formatReport } from './display/display.js';

// Version
export const VERSION = '0.1.0';

export interface RunOverrides {
  tier?: GenerationTier;
  count?: number;
  optimize?: boolean;
  iterations?: number;
  seed?: number;
  neutralization?: string;
}

export interface RunResult extends PipelineResult {
  records: CandidateRecord[];
}

interface ForgeState {
  config: AlphaForgeConfig;
  catalog: Catalog;
  validator: AlphaValidator;
  generator: AlphaGenerator;
}

/**
 * Alpha Forge client for programmatic access.
 *
 * @example
 * ```typescript
 * import { AlphaForge } from 'alpha-forge';
 *
 * const forge = new AlphaForge({ configPath: '~/.alpha-forge/config.yaml' });
 * forge.start();
 *
 * const result = forge.run({ tier: 'optimize', count: 3, optimize: true, seed: 7 });
 * const file = forge.save(result.records);
 * ```
 */
export class AlphaForge {
  private readonly configPath?: string;
  private readonly presetConfig?: AlphaForgeConfig;
  private readonly logger: Logger;
  private state: ForgeState | null = null;

  constructor(options?: { configPath?: string; config?: AlphaForgeConfig; logger?: Logger }) {
    this.configPath = options?.configPath;
    this.presetConfig = options?.config;
    this.logger = options?.logger ?? new Logger(options?.config?.logging.level ?? 'info');
  }

  /**
   * Load configuration and catalog. Catalog errors surface here.
   */
  start(): void {
    if (this.state) {
      throw new Error('AlphaForge already started');
    }
    const config = this.presetConfig ?? loadConfig(this.configPath);
    this.logger.setLevel(config.logging.level);

    const catalog = config.catalog.path ? loadCatalog(config.catalog.path) : loadDefaultCatalog();
    this.logger.debug(
      `Catalog loaded: ${catalog.listFields().length} fields, ${catalog.listOperators().length} operators`
    );

    this.state = {
      config,
      catalog,
      validator: new AlphaValidator(catalog, {
        maxFieldRepeats: config.validation.maxFieldRepeats,
        logger: this.logger,
      }),
      generator: new AlphaGenerator(catalog, { logger: this.logger }),
    };
  }

  getConfig(): AlphaForgeConfig {
    return this.ensureStarted().config;
  }

  getCatalog(): Catalog {
    return this.ensureStarted().catalog;
  }

  /**
   * Run the pipeline with configured defaults, overridden per call.
   */
  run(overrides: RunOverrides = {}): RunResult {
    const { config, catalog, validator, generator } = this.ensureStarted();
    const optimize = overrides.optimize ?? config.optimization.enabled;
    const seed = overrides.seed ?? config.generation.seed;

    const optimizer = optimize
      ? new AlphaOptimizer(catalog, validator, {
          iterations: config.optimization.iterations,
          patience: config.optimization.patience,
          retriesPerIteration: config.optimization.retriesPerIteration,
          seed,
          logger: this.logger,
        })
      : undefined;

    const result = runPipeline(
      catalog,
      {
        tier: overrides.tier ?? config.generation.tier,
        count: overrides.count ?? config.generation.count,
        optimize,
        iterations: overrides.iterations ?? config.optimization.iterations,
        maxAttempts: config.pipeline.maxAttempts,
        seed,
        neutralization: overrides.neutralization ?? config.generation.neutralization,
        maxFieldRepeats: config.validation.maxFieldRepeats,
      },
      { generator, validator, optimizer, logger: this.logger }
    );

    return { ...result, records: result.accepted.map((candidate) => toCandidateRecord(candidate, catalog)) };
  }

  save(records: readonly CandidateRecord[], dir?: string): string {
    const { config } = this.ensureStarted();
    return saveCandidates(records, dir ?? config.output.dir, new Date(), this.logger);
  }

  private ensureStarted(): ForgeState {
    if (!this.state) {
      throw new Error('AlphaForge not started. Call start() first.');
    }
    return this.state;
  }
}
