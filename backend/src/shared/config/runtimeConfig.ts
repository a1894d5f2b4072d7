// Resolves server settings from the environment once, so modules never read process.env directly.
import 'dotenv/config';
import path from 'path';
import type { DuplicatePolicy } from '../../modules/ledger/ledger.types.js';

export interface RuntimeConfig {
  port: number;
  dataDirectory: string;
  ledgerFileName: string;
  duplicatePolicy: DuplicatePolicy;
  displayScale: number;
  amountPrefix: string;
}

const DEFAULT_PORT = 4000;
const DEFAULT_DATA_DIRECTORY = 'data';
const DEFAULT_LEDGER_FILE_NAME = 'financial_data.csv';
const DEFAULT_DISPLAY_SCALE = 1_000_000;

const readTrimmed = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const parsePositiveNumber = (raw: string | undefined, fallback: number, key: string): number => {
  if (raw === undefined) {
    return fallback;
  }
  const numeric = Number(raw);
  if (!Number.isFinite(numeric) || numeric <= 0) {
    console.warn(`Ignoring invalid ${key}="${raw}", using ${fallback}.`);
    return fallback;
  }
  return numeric;
};

export const parseDuplicatePolicy = (raw: string | undefined): DuplicatePolicy => {
  if (raw === undefined) {
    return 'reject';
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'reject' || normalized === 'overwrite') {
    return normalized;
  }
  console.warn(`Ignoring invalid LEDGER_DUPLICATE_POLICY="${raw}", using reject.`);
  return 'reject';
};

export const resolveRuntimeConfig = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const fileName = readTrimmed(env, 'LEDGER_FILE_NAME') ?? DEFAULT_LEDGER_FILE_NAME;
  return {
    port: Math.floor(parsePositiveNumber(readTrimmed(env, 'PORT'), DEFAULT_PORT, 'PORT')),
    dataDirectory: path.resolve(readTrimmed(env, 'LEDGER_DATA_DIR') ?? DEFAULT_DATA_DIRECTORY),
    // The file always lives directly inside the data directory
    ledgerFileName: path.basename(fileName),
    duplicatePolicy: parseDuplicatePolicy(readTrimmed(env, 'LEDGER_DUPLICATE_POLICY')),
    displayScale: parsePositiveNumber(
      readTrimmed(env, 'LEDGER_DISPLAY_SCALE'),
      DEFAULT_DISPLAY_SCALE,
      'LEDGER_DISPLAY_SCALE'
    ),
    amountPrefix: env.LEDGER_AMOUNT_PREFIX ?? ''
  };
};

export const runtimeConfig = resolveRuntimeConfig();
