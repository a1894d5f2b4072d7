/**
 * Unit tests for the demo ledger seeder.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { buildDemoFieldValues, seedDemoData } from '../../src/scripts/seedDemoData.js';
import { LedgerRepository } from '../../src/modules/ledger/ledger.repository.js';
import { LedgerService } from '../../src/modules/ledger/ledger.service.js';
import { createTempDirectory, removeDirectory } from '../helpers/ledger.js';

let directory: string;
let service: LedgerService;
const silent = { info: () => {} };

beforeEach(async () => {
  directory = await createTempDirectory();
  service = new LedgerService(new LedgerRepository(path.join(directory, 'financial_data.csv')));
});

afterEach(async () => {
  await removeDirectory(directory);
});

describe('buildDemoFieldValues', () => {
  test('produces a balanced month', () => {
    const fields = buildDemoFieldValues(3);

    expect(fields['Total Asset']).toBe(fields['Current Asset'] + fields['Fixed Asset']);
    expect(fields['Current Asset']).toBe(fields['Cash and Equivalents'] + fields.Receivables);
    expect(fields.Equity).toBe(fields['Total Asset'] - fields['Total Liabilities']);
    expect(fields.Equity).toBe(fields['Paid-in Capital'] + fields['Retained Earnings']);
    expect(fields.Revenue).toBe(fields['Operating Revenue'] + fields['Other Revenue']);
    expect(fields['Net Income']).toBe(fields['Income Before Tax'] - fields.Tax);
  });
});

describe('seedDemoData', () => {
  test('creates the requested months ending at the given month', async () => {
    const result = await seedDemoData(service, { monthCount: 3, endYear: 2024, endMonth: 2, logger: silent });

    expect(result).toEqual({ created: 3, skipped: 0 });
    const table = await service.load();
    expect(service.toReportView(table).map((snapshot) => snapshot.date)).toEqual([
      '2023-12-31',
      '2024-01-31',
      '2024-02-29'
    ]);
  });

  test('skips months that are already stored', async () => {
    await seedDemoData(service, { monthCount: 2, endYear: 2024, endMonth: 1, logger: silent });

    const result = await seedDemoData(service, { monthCount: 3, endYear: 2024, endMonth: 2, logger: silent });

    expect(result).toEqual({ created: 1, skipped: 2 });
    expect((await service.load()).snapshots).toHaveLength(3);
  });
});
