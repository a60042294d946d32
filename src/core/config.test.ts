/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { assertValidConfig, getDefaultConfig, mergeConfig, validateConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('getDefaultConfig', () => {
  it('places the database inside the data directory', () => {
    const config = getDefaultConfig('/tmp/ledger-data', {});
    expect(config.dataDir).toBe('/tmp/ledger-data');
    expect(config.storage).toEqual({ sqlitePath: join('/tmp/ledger-data', 'ledger.db'), enableWAL: true });
    expect(config.edgeThreshold).toBe(0.03);
    expect(config.batchConcurrency).toBe(4);
    expect(config.codeVersion).toBeNull();
  });

  it('reads overrides from the environment', () => {
    const config = getDefaultConfig(undefined, {
      MATCHLEDGER_DATA_DIR: '/srv/ledger',
      MATCHLEDGER_ENABLE_WAL: 'false',
      MATCHLEDGER_EDGE_THRESHOLD: '0.05',
      MATCHLEDGER_BATCH_CONCURRENCY: '8',
      MATCHLEDGER_CODE_VERSION: 'abc123'
    });
    expect(config.storage.sqlitePath).toBe(join('/srv/ledger', 'ledger.db'));
    expect(config.storage.enableWAL).toBe(false);
    expect(config.edgeThreshold).toBe(0.05);
    expect(config.batchConcurrency).toBe(8);
    expect(config.codeVersion).toBe('abc123');
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(getDefaultConfig('/tmp/x', {}))).toEqual([]);
  });

  it('lists every problem', () => {
    const config = mergeConfig(getDefaultConfig('/tmp/x', { MATCHLEDGER_EDGE_THRESHOLD: 'wide' }), {
      batchConcurrency: 0,
      storage: { sqlitePath: '' }
    });
    expect(validateConfig(config)).toEqual([
      'storage.sqlitePath is required',
      'edgeThreshold must be a number in [0, 1)',
      'batchConcurrency must be a positive integer'
    ]);
    expect(() => assertValidConfig(config)).toThrow(ConfigurationError);
  });
});

describe('mergeConfig', () => {
  it('merges storage settings field by field', () => {
    const merged = mergeConfig(getDefaultConfig('/tmp/x', {}), { storage: { enableWAL: false } });
    expect(merged.storage).toEqual({ sqlitePath: join('/tmp/x', 'ledger.db'), enableWAL: false });
  });
});
