/**
 * Shared fixtures for ledger tests: temp data directories and snapshot builders.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createEmptyFieldValues } from '../../src/modules/ledger/ledger.defaults.js';
import type { LedgerFieldName, LedgerSnapshot, LedgerTable } from '../../src/modules/ledger/ledger.types.js';
import { createEmptyTable } from '../../src/modules/ledger/ledger.repository.js';

export const createTempDirectory = () => fs.mkdtemp(path.join(os.tmpdir(), 'balance-ledger-'));

export const removeDirectory = (directory: string) => fs.rm(directory, { recursive: true, force: true });

export const makeSnapshot = (date: string, values: Partial<Record<LedgerFieldName, number>> = {}): LedgerSnapshot => ({
  date,
  fields: { ...createEmptyFieldValues(), ...values }
});

export const makeTable = (snapshots: LedgerSnapshot[]): LedgerTable => ({
  ...createEmptyTable(),
  snapshots
});
