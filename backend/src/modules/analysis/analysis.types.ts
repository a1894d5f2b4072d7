import type { DateWindow } from '../../shared/utils/date.js';
import type { LedgerFieldDefinition, LedgerFieldName, LedgerReportColumn } from '../ledger/ledger.types.js';
import type { RatioRow, RatioSetKey } from '../ratios/ratios.types.js';

export interface AnalysisRequest {
  // YYYY-MM; an absent bound leaves that side of the window open
  from?: string;
  to?: string;
  series?: readonly string[];
  ratioSet?: string;
}

export interface TrendPoint {
  date: string;
  label: string;
  value: number;
}

export interface TrendSeries {
  field: LedgerFieldName;
  points: TrendPoint[];
}

export interface TrendTableRow {
  field: LedgerFieldName;
  values: string[];
}

export interface AnalysisResult {
  window: DateWindow | null;
  scale: number;
  months: LedgerReportColumn[];
  trend: TrendSeries[];
  table: TrendTableRow[];
  ratioSet: RatioSetKey;
  ratios: RatioRow[];
}

export interface AnalysisOptions {
  years: number[];
  months: string[];
  fields: LedgerFieldDefinition[];
  ratioSets: Array<{ key: RatioSetKey; label: string }>;
}
