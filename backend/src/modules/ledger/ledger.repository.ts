import path from 'path';
import { ensureDirectory, readCsvFile, writeCsvFile, type CsvRow } from '../../shared/storage/csvFile.client.js';
import { normalizeDateKey } from '../../shared/utils/date.js';
import { formatPlainNumber } from '../../shared/utils/formatting.js';
import { DATE_COLUMN, LEDGER_COLUMNS, LEDGER_FIELDS, createEmptyFieldValues } from './ledger.defaults.js';
import type { LedgerFieldValues, LedgerSnapshot, LedgerTable } from './ledger.types.js';

export const coerceAmount = (raw: unknown): number => {
  if (typeof raw === 'number') {
    // -0 collapses to 0
    return Number.isFinite(raw) && raw !== 0 ? raw : 0;
  }
  if (typeof raw !== 'string') {
    return 0;
  }
  const numeric = Number(raw.trim());
  return Number.isFinite(numeric) && numeric !== 0 ? numeric : 0;
};

export const createEmptyTable = (): LedgerTable => ({ columns: LEDGER_COLUMNS, snapshots: [] });

const buildHeaderIndex = (header: CsvRow) => {
  const index = new Map<string, number>();
  header.forEach((name, position) => {
    const key = name.trim().toLowerCase();
    if (key && !index.has(key)) {
      index.set(key, position);
    }
  });
  return index;
};

const mapRows = (rows: CsvRow[]): LedgerTable => {
  const [header, ...body] = rows;
  if (!header) {
    return createEmptyTable();
  }

  const headerIndex = buildHeaderIndex(header);
  const dateIndex = headerIndex.get(DATE_COLUMN.toLowerCase());
  const missingFields = LEDGER_FIELDS.filter((field) => !headerIndex.has(field.toLowerCase()));
  if (missingFields.length) {
    console.warn(`Ledger file is missing ${missingFields.length} column(s), defaulting to 0: ${missingFields.join(', ')}`);
  }

  const seenDates = new Set<string>();
  const snapshots: LedgerSnapshot[] = [];
  let droppedRows = 0;
  let duplicateRows = 0;

  for (const row of body) {
    const date = dateIndex === undefined ? null : normalizeDateKey(row[dateIndex]);
    if (!date) {
      droppedRows += 1;
      continue;
    }
    if (seenDates.has(date)) {
      duplicateRows += 1;
      continue;
    }
    seenDates.add(date);

    const fields: LedgerFieldValues = createEmptyFieldValues();
    for (const field of LEDGER_FIELDS) {
      const position = headerIndex.get(field.toLowerCase());
      fields[field] = position === undefined ? 0 : coerceAmount(row[position]);
    }
    snapshots.push({ date, fields });
  }

  if (droppedRows) {
    console.warn(`Dropped ${droppedRows} ledger row(s) without a readable date.`);
  }
  if (duplicateRows) {
    console.warn(`Dropped ${duplicateRows} ledger row(s) repeating an earlier date.`);
  }

  return { columns: LEDGER_COLUMNS, snapshots };
};

const toRow = (snapshot: LedgerSnapshot): CsvRow => [
  snapshot.date,
  ...LEDGER_FIELDS.map((field) => formatPlainNumber(coerceAmount(snapshot.fields[field])))
];

export class LedgerRepository {
  constructor(private readonly filePath: string) {}

  getFilePath() {
    return this.filePath;
  }

  async ensureStorage(): Promise<void> {
    await ensureDirectory(path.dirname(this.filePath));
  }

  async load(): Promise<LedgerTable> {
    const rows = await readCsvFile(this.filePath);
    if (!rows) {
      return createEmptyTable();
    }
    return mapRows(rows);
  }

  async save(table: LedgerTable): Promise<void> {
    await writeCsvFile(this.filePath, [[...LEDGER_COLUMNS], ...table.snapshots.map(toRow)]);
  }
}
