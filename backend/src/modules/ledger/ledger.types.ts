import type { LEDGER_FIELDS } from './ledger.defaults.js';

export type DuplicatePolicy = 'reject' | 'overwrite';

export type LedgerFieldName = (typeof LEDGER_FIELDS)[number];

export type LedgerFieldCategory = 'asset' | 'liability' | 'equity' | 'revenue' | 'expense' | 'income';

export interface LedgerFieldDefinition {
  name: LedgerFieldName;
  category: LedgerFieldCategory;
  position: number;
}

export type LedgerFieldValues = Record<LedgerFieldName, number>;

export interface LedgerSnapshot {
  // YYYY-MM-DD, always the last calendar day of the reporting month
  date: string;
  fields: LedgerFieldValues;
}

export interface LedgerTable {
  columns: readonly string[];
  snapshots: LedgerSnapshot[];
}

export type UpsertOutcome = 'created' | 'updated' | 'rejected-duplicate';

export interface UpsertResult {
  table: LedgerTable;
  outcome: UpsertOutcome;
}

export interface LedgerReportColumn {
  date: string;
  label: string;
}

export interface LedgerReportRow {
  field: LedgerFieldName;
  values: string[];
}

export interface LedgerReport {
  scale: number;
  columns: LedgerReportColumn[];
  rows: LedgerReportRow[];
}
