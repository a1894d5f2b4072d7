import { pathToFileURL } from 'url';
import { DateTime } from 'luxon';
import { ledgerService } from '../modules/ledger/ledger.module.js';
import type { LedgerService } from '../modules/ledger/ledger.service.js';
import { LEDGER_FIELDS } from '../modules/ledger/ledger.defaults.js';
import type { LedgerFieldValues } from '../modules/ledger/ledger.types.js';

export interface SeedDemoDataOptions {
  // Number of months to generate, ending with endMonth
  monthCount?: number;
  endYear?: number;
  endMonth?: number;
  logger?: {
    info?: (message: string) => void;
  };
}

export interface SeedDemoDataResult {
  created: number;
  skipped: number;
}

const DEFAULT_MONTH_COUNT = 12;

const createSeriesGenerator = (base: number, monthlyGrowth: number, seasonalAmplitude = 0) => (index: number) => {
  const growth = base * (1 + monthlyGrowth) ** index;
  const seasonal = seasonalAmplitude ? Math.sin((index / 12) * Math.PI * 2) * seasonalAmplitude * base : 0;
  return Math.round(growth + seasonal);
};

const cashSeries = createSeriesGenerator(1_200_000_000, 0.01, 0.05);
const receivablesSeries = createSeriesGenerator(800_000_000, 0.015, 0.1);
const fixedAssetSeries = createSeriesGenerator(2_500_000_000, 0.002);
const currentLiabilitiesSeries = createSeriesGenerator(900_000_000, 0.008, 0.04);
const longTermLiabilitiesSeries = createSeriesGenerator(1_100_000_000, -0.004);
const paidInCapitalSeries = createSeriesGenerator(1_500_000_000, 0);
const operatingRevenueSeries = createSeriesGenerator(350_000_000, 0.012, 0.15);
const otherRevenueSeries = createSeriesGenerator(20_000_000, 0.005);
const operatingExpenseSeries = createSeriesGenerator(240_000_000, 0.01, 0.05);
const otherExpenseSeries = createSeriesGenerator(12_000_000, 0.002);

const TAX_RATE = 0.22;

// Builds a balanced month: totals and income lines are derived from the generated inputs
export const buildDemoFieldValues = (index: number): LedgerFieldValues => {
  const cash = cashSeries(index);
  const receivables = receivablesSeries(index);
  const currentAsset = cash + receivables;
  const fixedAsset = fixedAssetSeries(index);
  const totalAsset = currentAsset + fixedAsset;
  const currentLiabilities = currentLiabilitiesSeries(index);
  const longTermLiabilities = longTermLiabilitiesSeries(index);
  const totalLiabilities = currentLiabilities + longTermLiabilities;
  const equity = totalAsset - totalLiabilities;
  const paidInCapital = paidInCapitalSeries(index);
  const operatingRevenue = operatingRevenueSeries(index);
  const otherRevenue = otherRevenueSeries(index);
  const operatingExpense = operatingExpenseSeries(index);
  const otherExpense = otherExpenseSeries(index);
  const operatingIncome = operatingRevenue - operatingExpense;
  const incomeBeforeTax = operatingIncome + otherRevenue - otherExpense;
  const tax = Math.round(Math.max(0, incomeBeforeTax) * TAX_RATE);

  return {
    'Cash and Equivalents': cash,
    Receivables: receivables,
    'Current Asset': currentAsset,
    'Fixed Asset': fixedAsset,
    'Total Asset': totalAsset,
    'Current Liabilities': currentLiabilities,
    'Long-term Liabilities': longTermLiabilities,
    'Total Liabilities': totalLiabilities,
    'Paid-in Capital': paidInCapital,
    'Retained Earnings': equity - paidInCapital,
    Equity: equity,
    'Operating Revenue': operatingRevenue,
    'Other Revenue': otherRevenue,
    Revenue: operatingRevenue + otherRevenue,
    'Operating Expense': operatingExpense,
    'Other Expense': otherExpense,
    'Operating Income': operatingIncome,
    'Income Before Tax': incomeBeforeTax,
    Tax: tax,
    'Net Income': incomeBeforeTax - tax
  };
};

export const seedDemoData = async (
  service: LedgerService,
  options: SeedDemoDataOptions = {}
): Promise<SeedDemoDataResult> => {
  const logger = options.logger ?? { info: console.log };
  const monthCount = options.monthCount ?? DEFAULT_MONTH_COUNT;
  const previousMonth = DateTime.utc().startOf('month').minus({ months: 1 });
  const end = DateTime.fromObject(
    { year: options.endYear ?? previousMonth.year, month: options.endMonth ?? previousMonth.month, day: 1 },
    { zone: 'utc' }
  );

  let table = await service.load();
  const result: SeedDemoDataResult = { created: 0, skipped: 0 };

  for (let index = 0; index < monthCount; index += 1) {
    const cursor = end.minus({ months: monthCount - 1 - index });
    const fields = buildDemoFieldValues(index);
    const exists = service.toReportView(table).some((snapshot) => snapshot.date.startsWith(cursor.toFormat('yyyy-MM')));
    if (exists) {
      result.skipped += 1;
      continue;
    }
    const upsert = await service.upsertMonth(
      table,
      cursor.year,
      cursor.month,
      LEDGER_FIELDS.map((field) => fields[field])
    );
    table = upsert.table;
    result.created += 1;
  }

  logger.info?.(`Demo ledger seeded: ${result.created} month(s) created, ${result.skipped} already present.`);
  return result;
};

if (process.argv[1]) {
  const entryUrl = pathToFileURL(process.argv[1]).href;
  if (import.meta.url === entryUrl) {
    seedDemoData(ledgerService)
      .then(() => {
        console.log('Done.');
      })
      .catch((error) => {
        console.error('Demo seed script failed:', error);
        process.exit(1);
      });
  }
}
