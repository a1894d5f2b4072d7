import type { LedgerFieldName, LedgerSnapshot } from '../ledger/ledger.types.js';
import { formatDecimal, formatPercent } from '../../shared/utils/formatting.js';
import { formatMonthLabel } from '../../shared/utils/date.js';
import type { RatioCell, RatioDefinition, RatioKind, RatioRow } from './ratios.types.js';

const sumFields = (snapshot: LedgerSnapshot, fields: readonly LedgerFieldName[]) =>
  fields.reduce((total, field) => total + (snapshot.fields[field] ?? 0), 0);

/**
 * Evaluates a ratio for one snapshot. Returns null when the denominator is exactly 0
 * or the quotient is not finite.
 */
export const computeRatio = (snapshot: LedgerSnapshot, definition: RatioDefinition): number | null => {
  const denominator = sumFields(snapshot, definition.denominator);
  if (denominator === 0) {
    return null;
  }
  const value = sumFields(snapshot, definition.numerator) / denominator;
  return Number.isFinite(value) ? value : null;
};

export const formatRatio = (value: number | null, kind: RatioKind): string =>
  kind === 'percent' ? formatPercent(value) : formatDecimal(value);

/**
 * Computes every ratio of the set over the given snapshots, in the order both were given.
 * The full history and a date window are handled alike.
 */
export const computeRatios = (
  snapshots: readonly LedgerSnapshot[],
  definitions: readonly RatioDefinition[]
): RatioRow[] =>
  definitions.map((definition) => ({
    key: definition.key,
    name: definition.name,
    kind: definition.kind,
    cells: snapshots.map((snapshot): RatioCell => {
      const value = computeRatio(snapshot, definition);
      return {
        date: snapshot.date,
        label: formatMonthLabel(snapshot.date),
        value,
        formatted: formatRatio(value, definition.kind)
      };
    })
  }));

export const toFormattedRatioMap = (rows: readonly RatioRow[]): Map<string, string[]> =>
  new Map(rows.map((row) => [row.name, row.cells.map((cell) => cell.formatted)]));
