#!/usr/bin/env node
import 'dotenv/config';
/**
 * Alpha Forge CLI
 *
 * Command-line interface for generating, validating and optimizing alpha
 * expressions for manual submission.
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';

import { AlphaForge, VERSION } from '../index.js';
import type { Catalog } from '../catalog/catalog.js';
import { loadCatalog, loadDefaultCatalog } from '../catalog/loader.js';
import { loadConfig } from '../core/config.js';
import { AlphaForgeError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { formatCandidates, formatReport } from '../display/display.js';
import { formatExpression } from '../expression/render.js';
import { loadCandidates } from '../pipeline/store.js';
import { GENERATION_TIERS, isGenerationTier, type GenerationTier } from '../types/index.js';
import type { OperatorArity } from '../catalog/types.js';

const logger = new Logger('info');

interface GenerateCliOptions {
  count?: number;
  mode?: GenerationTier;
  optimize?: boolean;
  iterations?: number;
  seed?: number;
  outputDir?: string;
  catalog?: string;
  config?: string;
  tree?: boolean;
}

interface CatalogCliOptions {
  catalog?: string;
  config?: string;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}

function parseTier(value: string): GenerationTier {
  if (!isGenerationTier(value)) {
    throw new InvalidArgumentError(`Expected one of ${GENERATION_TIERS.join(', ')}.`);
  }
  return value;
}

function parseArity(value: string): OperatorArity {
  if (value === 'unary' || value === 'binary' || value === 'windowed') {
    return value;
  }
  throw new InvalidArgumentError('Expected unary, binary or windowed.');
}

/**
 * Library errors end the command with a logged message and exit code 1.
 */
function guarded<A extends unknown[]>(action: (...args: A) => void): (...args: A) => void {
  return (...args: A) => {
    try {
      action(...args);
    } catch (error) {
      if (!(error instanceof AlphaForgeError)) throw error;
      logger.error(error.name, error);
      process.exitCode = 1;
    }
  };
}

function catalogFor(options: CatalogCliOptions): Catalog {
  if (options.catalog) {
    return loadCatalog(resolve(options.catalog));
  }
  const config = loadConfig(options.config);
  return config.catalog.path ? loadCatalog(config.catalog.path) : loadDefaultCatalog();
}

const program = new Command();

program
  .name('alpha-forge')
  .description('Generate, validate and optimize alpha expressions')
  .version(VERSION);

// ============================================================================
// Generate
// ============================================================================

program
  .command('generate')
  .description('Generate alpha expressions and save the accepted ones')
  .option('-c, --count <number>', 'Number of alpha expressions to generate', parsePositiveInteger)
  .option('-m, --mode <tier>', `Generation mode (${GENERATION_TIERS.join(', ')})`, parseTier)
  .option('--optimize', 'Optimize generated alphas before validation')
  .option('-i, --iterations <number>', 'Optimization rounds per alpha', parsePositiveInteger)
  .option('-s, --seed <number>', 'Seed for reproducible batches', parseInteger)
  .option('-o, --output-dir <dir>', 'Directory to save results')
  .option('--catalog <path>', 'Catalog file (YAML or JSON)')
  .option('--config <path>', 'Config file')
  .option('--tree', 'Also print each expression as an indented tree')
  .action(
    guarded((options: GenerateCliOptions) => {
      const config = loadConfig(options.config);
      if (options.catalog) {
        config.catalog.path = resolve(options.catalog);
      }

      const forge = new AlphaForge({ config, logger });
      forge.start();
      const result = forge.run({
        tier: options.mode,
        count: options.count,
        optimize: options.optimize,
        iterations: options.iterations,
        seed: options.seed,
      });

      const outputFile = forge.save(result.records, options.outputDir);
      console.log(formatCandidates(result.records, outputFile));

      if (options.tree) {
        const catalog = forge.getCatalog();
        for (const candidate of result.accepted) {
          console.log('');
          console.log(candidate.id);
          console.log(formatExpression(candidate.root, catalog));
        }
      }
      if (result.rejected.length > 0) {
        logger.warn(`${result.rejected.length} candidate(s) rejected over ${result.attempts} attempt(s)`);
      }
    })
  );

// ============================================================================
// Show
// ============================================================================

program
  .command('show <file>')
  .description('Display a saved alpha file')
  .option('-r, --report', 'Print each validation report')
  .action(
    guarded((file: string, options: { report?: boolean }) => {
      const records = loadCandidates(file, logger);
      console.log(formatCandidates(records, file));
      if (options.report) {
        for (const record of records) {
          console.log('');
          console.log(formatReport(record));
        }
      }
    })
  );

// ============================================================================
// Catalog Commands
// ============================================================================

const catalog = program.command('catalog').description('Inspect the field and operator catalog');

catalog
  .command('fields')
  .description('List data fields')
  .option('--category <category>', 'Filter by category')
  .option('--catalog <path>', 'Catalog file (YAML or JSON)')
  .option('--config <path>', 'Config file')
  .action(
    guarded((options: CatalogCliOptions & { category?: string }) => {
      const cat = catalogFor(options);
      const fields = options.category ? cat.fieldsByCategory(options.category) : cat.listFields();
      console.log('Data Fields');
      console.log('─'.repeat(60));
      for (const field of fields) {
        const description = field.description ? ` - ${field.description}` : '';
        console.log(`${field.id} | ${field.category} | ${field.domain}${description}`);
      }
      if (fields.length === 0) {
        console.log('No fields match.');
      }
    })
  );

catalog
  .command('operators')
  .description('List operators')
  .option('--arity <arity>', 'Filter by arity (unary, binary, windowed)', parseArity)
  .option('--catalog <path>', 'Catalog file (YAML or JSON)')
  .option('--config <path>', 'Config file')
  .action(
    guarded((options: CatalogCliOptions & { arity?: OperatorArity }) => {
      const cat = catalogFor(options);
      const operators = options.arity ? cat.operatorsByArity(options.arity) : cat.listOperators();
      console.log('Operators');
      console.log('─'.repeat(60));
      for (const op of operators) {
        const window = op.window ? ` | window ${op.window.min}..${op.window.max}` : '';
        const role = op.role ? ` | ${op.role}` : '';
        console.log(`${op.id} | ${op.category} | ${op.arity} | -> ${op.output}${window}${role}`);
      }
      if (operators.length === 0) {
        console.log('No operators match.');
      }
    })
  );

// ============================================================================
// Parse and Run
// ============================================================================

program.parse();
