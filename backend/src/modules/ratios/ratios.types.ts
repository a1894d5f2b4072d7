import type { LedgerFieldName } from '../ledger/ledger.types.js';

export type RatioKind = 'decimal' | 'percent';

export type RatioSetKey = 'standard' | 'brokerage';

export interface RatioDefinition {
  key: string;
  name: string;
  // Numerator and denominator are the sums of the listed fields
  numerator: readonly LedgerFieldName[];
  denominator: readonly LedgerFieldName[];
  kind: RatioKind;
}

export interface RatioSet {
  key: RatioSetKey;
  label: string;
  ratios: readonly RatioDefinition[];
}

export interface RatioCell {
  date: string;
  label: string;
  value: number | null;
  formatted: string;
}

export interface RatioRow {
  key: string;
  name: string;
  kind: RatioKind;
  cells: RatioCell[];
}
