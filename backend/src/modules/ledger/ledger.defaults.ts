import type { LedgerFieldCategory, LedgerFieldDefinition, LedgerFieldName, LedgerFieldValues } from './ledger.types.js';

export const DATE_COLUMN = 'Date';

export const LEDGER_FIELDS = [
  'Cash and Equivalents',
  'Receivables',
  'Current Asset',
  'Fixed Asset',
  'Total Asset',
  'Current Liabilities',
  'Long-term Liabilities',
  'Total Liabilities',
  'Paid-in Capital',
  'Retained Earnings',
  'Equity',
  'Operating Revenue',
  'Other Revenue',
  'Revenue',
  'Operating Expense',
  'Other Expense',
  'Operating Income',
  'Income Before Tax',
  'Tax',
  'Net Income'
] as const;

const FIELD_CATEGORIES: Record<LedgerFieldName, LedgerFieldCategory> = {
  'Cash and Equivalents': 'asset',
  Receivables: 'asset',
  'Current Asset': 'asset',
  'Fixed Asset': 'asset',
  'Total Asset': 'asset',
  'Current Liabilities': 'liability',
  'Long-term Liabilities': 'liability',
  'Total Liabilities': 'liability',
  'Paid-in Capital': 'equity',
  'Retained Earnings': 'equity',
  Equity: 'equity',
  'Operating Revenue': 'revenue',
  'Other Revenue': 'revenue',
  Revenue: 'revenue',
  'Operating Expense': 'expense',
  'Other Expense': 'expense',
  'Operating Income': 'income',
  'Income Before Tax': 'income',
  Tax: 'income',
  'Net Income': 'income'
};

export const LEDGER_COLUMNS: readonly string[] = [DATE_COLUMN, ...LEDGER_FIELDS];

export const LEDGER_FIELD_DEFINITIONS: LedgerFieldDefinition[] = LEDGER_FIELDS.map((name, index) => ({
  name,
  category: FIELD_CATEGORIES[name],
  position: index
}));

const FIELD_NAME_SET: ReadonlySet<string> = new Set(LEDGER_FIELDS);

export const isLedgerField = (value: string): value is LedgerFieldName => FIELD_NAME_SET.has(value);

export const createEmptyFieldValues = () =>
  LEDGER_FIELDS.reduce((acc, field) => {
    acc[field] = 0;
    return acc;
  }, {} as LedgerFieldValues);
