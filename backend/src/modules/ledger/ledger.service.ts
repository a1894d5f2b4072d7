import { LedgerRepository, coerceAmount } from './ledger.repository.js';
import {
  LEDGER_FIELDS,
  LEDGER_FIELD_DEFINITIONS,
  createEmptyFieldValues,
  isLedgerField
} from './ledger.defaults.js';
import type {
  DuplicatePolicy,
  LedgerFieldDefinition,
  LedgerFieldValues,
  LedgerReport,
  LedgerSnapshot,
  LedgerTable,
  UpsertResult
} from './ledger.types.js';
import { formatAmount } from '../../shared/utils/formatting.js';
import { formatMonthLabel, isMonthEndKey, lastDayOfMonth } from '../../shared/utils/date.js';

export interface LedgerServiceOptions {
  duplicatePolicy: DuplicatePolicy;
  displayScale: number;
  amountPrefix: string;
}

const DEFAULT_OPTIONS: LedgerServiceOptions = {
  duplicatePolicy: 'reject',
  displayScale: 1_000_000,
  amountPrefix: ''
};

const buildFieldValues = (values: readonly unknown[]): LedgerFieldValues => {
  if (values.length !== LEDGER_FIELDS.length) {
    throw new Error('INVALID_INPUT');
  }
  const fields = createEmptyFieldValues();
  LEDGER_FIELDS.forEach((field, index) => {
    fields[field] = coerceAmount(values[index]);
  });
  return fields;
};

/**
 * Converts request input into values aligned with the field schema. Arrays are taken
 * positionally; objects are keyed by field name, with absent fields defaulting to 0.
 */
export const parseFieldValues = (input: unknown): unknown[] => {
  if (Array.isArray(input)) {
    return input;
  }
  if (!input || typeof input !== 'object') {
    throw new Error('INVALID_INPUT');
  }
  const fields = createEmptyFieldValues();
  for (const [key, raw] of Object.entries(input)) {
    if (!isLedgerField(key)) {
      throw new Error('INVALID_INPUT');
    }
    fields[key] = coerceAmount(raw);
  }
  return LEDGER_FIELDS.map((field) => fields[field]);
};

export const sortSnapshots = (snapshots: readonly LedgerSnapshot[]): LedgerSnapshot[] =>
  [...snapshots].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

export class LedgerService {
  private readonly options: LedgerServiceOptions;

  constructor(
    private readonly repository: LedgerRepository,
    options: Partial<LedgerServiceOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  getDuplicatePolicy(): DuplicatePolicy {
    return this.options.duplicatePolicy;
  }

  listFields(): LedgerFieldDefinition[] {
    return LEDGER_FIELD_DEFINITIONS;
  }

  async ensureStorage(): Promise<void> {
    await this.repository.ensureStorage();
  }

  load(): Promise<LedgerTable> {
    return this.repository.load();
  }

  async upsert(table: LedgerTable, date: string, values: readonly unknown[]): Promise<UpsertResult> {
    if (!isMonthEndKey(date)) {
      throw new Error('INVALID_INPUT');
    }
    const fields = buildFieldValues(values);
    const exists = table.snapshots.some((snapshot) => snapshot.date === date);

    if (exists && this.options.duplicatePolicy === 'reject') {
      return { table, outcome: 'rejected-duplicate' };
    }

    const snapshots = exists
      ? table.snapshots.map((snapshot) => (snapshot.date === date ? { date, fields } : snapshot))
      : [...table.snapshots, { date, fields }];
    const next: LedgerTable = { columns: table.columns, snapshots };
    await this.repository.save(next);
    return { table: next, outcome: exists ? 'updated' : 'created' };
  }

  async upsertMonth(table: LedgerTable, year: number, month: number, values: readonly unknown[]): Promise<UpsertResult> {
    return this.upsert(table, lastDayOfMonth(year, month), values);
  }

  async delete(table: LedgerTable, date: string): Promise<LedgerTable> {
    const snapshots = table.snapshots.filter((snapshot) => snapshot.date !== date);
    if (snapshots.length === table.snapshots.length) {
      return table;
    }
    const next: LedgerTable = { columns: table.columns, snapshots };
    await this.repository.save(next);
    return next;
  }

  toReportView(table: LedgerTable): LedgerSnapshot[] {
    return sortSnapshots(table.snapshots);
  }

  // Pivot of stored months: one row per field, one column per month, amounts in display units
  buildReport(table: LedgerTable): LedgerReport {
    const view = this.toReportView(table);
    const { displayScale, amountPrefix } = this.options;
    return {
      scale: displayScale,
      columns: view.map((snapshot) => ({ date: snapshot.date, label: formatMonthLabel(snapshot.date) })),
      rows: LEDGER_FIELDS.map((field) => ({
        field,
        values: view.map((snapshot) => formatAmount(snapshot.fields[field] / displayScale, amountPrefix))
      }))
    };
  }
}
