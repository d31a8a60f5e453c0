/**
 * Error taxonomy.
 *
 * Validation failures are not errors: they are reported as data through
 * ValidationReport. Everything thrown by the library extends AlphaForgeError.
 */

export type AlphaForgeErrorCode =
  | 'CATALOG_ERROR'
  | 'GENERATION_ERROR'
  | 'OPTIMIZATION_ERROR'
  | 'CONFIG_ERROR';

export class AlphaForgeError extends Error {
  constructor(
    public readonly code: AlphaForgeErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AlphaForgeError';
  }
}

/**
 * Malformed catalog definition. Fatal at startup, never retried.
 */
export class CatalogError extends AlphaForgeError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super('CATALOG_ERROR', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'CatalogError';
  }
}

/**
 * Bad generation request (unknown tier, count < 1, ...). Raised before any
 * candidate is produced.
 */
export class GenerationError extends AlphaForgeError {
  constructor(message: string) {
    super('GENERATION_ERROR', message);
    this.name = 'GenerationError';
  }
}

/**
 * The optimizer was handed a candidate the validator rejects.
 */
export class OptimizationError extends AlphaForgeError {
  constructor(
    message: string,
    public readonly candidateId: string
  ) {
    super('OPTIMIZATION_ERROR', message);
    this.name = 'OptimizationError';
  }
}

export class ConfigError extends AlphaForgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
