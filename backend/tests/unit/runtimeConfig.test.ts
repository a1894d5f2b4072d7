/**
 * Unit tests for environment-driven configuration.
 */

import { describe, test, expect, vi, afterEach } from 'vitest';
import path from 'path';
import { parseDuplicatePolicy, resolveRuntimeConfig } from '../../src/shared/config/runtimeConfig.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('resolveRuntimeConfig', () => {
  test('uses defaults for an empty environment', () => {
    expect(resolveRuntimeConfig({})).toEqual({
      port: 4000,
      dataDirectory: path.resolve('data'),
      ledgerFileName: 'financial_data.csv',
      duplicatePolicy: 'reject',
      displayScale: 1_000_000,
      amountPrefix: ''
    });
  });

  test('reads every setting from the environment', () => {
    const config = resolveRuntimeConfig({
      PORT: '8080',
      LEDGER_DATA_DIR: '/srv/ledger',
      LEDGER_FILE_NAME: 'balances.csv',
      LEDGER_DUPLICATE_POLICY: 'Overwrite',
      LEDGER_DISPLAY_SCALE: '1000',
      LEDGER_AMOUNT_PREFIX: 'Rp. '
    });

    expect(config).toEqual({
      port: 8080,
      dataDirectory: path.resolve('/srv/ledger'),
      ledgerFileName: 'balances.csv',
      duplicatePolicy: 'overwrite',
      displayScale: 1000,
      amountPrefix: 'Rp. '
    });
  });

  test('keeps the file inside the data directory', () => {
    expect(resolveRuntimeConfig({ LEDGER_FILE_NAME: '../outside/ledger.csv' }).ledgerFileName).toBe('ledger.csv');
  });

  test('falls back on invalid numbers', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const config = resolveRuntimeConfig({ PORT: 'abc', LEDGER_DISPLAY_SCALE: '-5' });

    expect(config.port).toBe(4000);
    expect(config.displayScale).toBe(1_000_000);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

describe('parseDuplicatePolicy', () => {
  test('accepts both policies', () => {
    expect(parseDuplicatePolicy('reject')).toBe('reject');
    expect(parseDuplicatePolicy(' OVERWRITE ')).toBe('overwrite');
    expect(parseDuplicatePolicy(undefined)).toBe('reject');
  });

  test('falls back to reject on unknown values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(parseDuplicatePolicy('merge')).toBe('reject');
    expect(warn).toHaveBeenCalledWith('Ignoring invalid LEDGER_DUPLICATE_POLICY="merge", using reject.');
  });
});
