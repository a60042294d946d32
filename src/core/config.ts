/**
 * Configuration
 *
 * Default configuration and environment variable mapping for matchledger.
 * The .env file itself is loaded by the CLI entry point; library callers pass
 * their own environment or build a LedgerConfig directly.
 */

import { join } from 'path';
import { ConfigurationError } from './errors.js';
import type { LedgerConfig, StorageConfig } from './types.js';

export const DEFAULT_SCHEMA_VERSION = 'v1';
export const DEFAULT_ANALYSIS_VERSION = '1.0.0';
export const LEDGER_FILE = 'ledger.db';

export type Environment = Record<string, string | undefined>;

export type LedgerConfigOverrides = Partial<Omit<LedgerConfig, 'storage'>> & { storage?: Partial<StorageConfig> };

export function getDefaultConfig(dataDir?: string, env: Environment = process.env): LedgerConfig {
  const baseDir = dataDir ?? env.MATCHLEDGER_DATA_DIR ?? './data';

  return {
    dataDir: baseDir,
    storage: {
      sqlitePath: join(baseDir, LEDGER_FILE),
      enableWAL: env.MATCHLEDGER_ENABLE_WAL !== 'false'
    },
    schemaVersion: env.MATCHLEDGER_SCHEMA_VERSION ?? DEFAULT_SCHEMA_VERSION,
    analysisVersion: env.MATCHLEDGER_ANALYSIS_VERSION ?? DEFAULT_ANALYSIS_VERSION,
    codeVersion: env.MATCHLEDGER_CODE_VERSION ?? null,
    modelVersion: env.MATCHLEDGER_MODEL_VERSION ?? null,
    edgeThreshold: parseFloat(env.MATCHLEDGER_EDGE_THRESHOLD ?? '0.03'),
    batchConcurrency: parseInt(env.MATCHLEDGER_BATCH_CONCURRENCY ?? '4', 10)
  };
}

export function validateConfig(config: LedgerConfig): string[] {
  const errors: string[] = [];

  if (!config.storage.sqlitePath) {
    errors.push('storage.sqlitePath is required');
  }

  if (!config.schemaVersion) {
    errors.push('schemaVersion must not be empty');
  }

  if (!config.analysisVersion) {
    errors.push('analysisVersion must not be empty');
  }

  if (!Number.isFinite(config.edgeThreshold) || config.edgeThreshold < 0 || config.edgeThreshold >= 1) {
    errors.push('edgeThreshold must be a number in [0, 1)');
  }

  if (!Number.isInteger(config.batchConcurrency) || config.batchConcurrency < 1) {
    errors.push('batchConcurrency must be a positive integer');
  }

  return errors;
}

export function mergeConfig(base: LedgerConfig, overrides: LedgerConfigOverrides): LedgerConfig {
  return {
    ...base,
    ...overrides,
    storage: { ...base.storage, ...overrides.storage }
  };
}

/**
 * Validate and return the config, or throw ConfigurationError listing every problem
 */
export function assertValidConfig(config: LedgerConfig): LedgerConfig {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}
