import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import * as XLSX from 'xlsx';

export type CsvRow = string[];

const BYTE_ORDER_MARK = '\uFEFF';

const isMissingFileError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

const normalizeCell = (value: unknown): string => {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return `${value}`;
  }
  return '';
};

export const ensureDirectory = async (directory: string) => {
  await fs.mkdir(directory, { recursive: true });
};

/**
 * Reads a delimited text file into rows of trimmed cells, header row included.
 * Returns null when the file does not exist; every other I/O error propagates.
 */
export const readCsvFile = async (filePath: string): Promise<CsvRow[] | null> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }

  const content = text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
  if (!content.trim()) {
    return [];
  }

  // raw keeps every cell as text; numeric and date coercion belongs to the caller
  const workbook = XLSX.read(content, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    return [];
  }
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
    defval: '',
    raw: true
  });
  return rows.map((row) => row.map(normalizeCell));
};

/**
 * Replaces the file with the given rows. The content is written to a temporary file in the
 * same directory and renamed over the target, so readers never observe a partial file.
 */
export const writeCsvFile = async (filePath: string, rows: CsvRow[]): Promise<void> => {
  const directory = path.dirname(filePath);
  await ensureDirectory(directory);

  const sheet = XLSX.utils.aoa_to_sheet(rows);
  const csv = XLSX.utils.sheet_to_csv(sheet, { blankrows: false });
  const tempPath = path.join(directory, `.${path.basename(filePath)}.${randomUUID()}.tmp`);

  try {
    await fs.writeFile(tempPath, `${csv}\n`, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
};
