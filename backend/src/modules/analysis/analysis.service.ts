import type { LedgerService } from '../ledger/ledger.service.js';
import type { LedgerFieldName, LedgerSnapshot, LedgerTable } from '../ledger/ledger.types.js';
import { LEDGER_FIELDS, isLedgerField } from '../ledger/ledger.defaults.js';
import { RATIO_SETS, DEFAULT_RATIO_SET, isRatioSetKey } from '../ratios/ratios.defaults.js';
import { computeRatios } from '../ratios/ratios.service.js';
import type { RatioSetKey } from '../ratios/ratios.types.js';
import { formatAmount } from '../../shared/utils/formatting.js';
import {
  formatMonthLabel,
  isWithinWindow,
  listMonthNames,
  parseMonthKey,
  resolveMonthWindow,
  yearOf,
  type DateWindow,
  type MonthDescriptor
} from '../../shared/utils/date.js';
import type { AnalysisOptions, AnalysisRequest, AnalysisResult, TrendSeries, TrendTableRow } from './analysis.types.js';

export interface AnalysisServiceOptions {
  displayScale: number;
  amountPrefix: string;
}

const parseBound = (value: string | undefined): MonthDescriptor | null => {
  if (value === undefined || !value.trim()) {
    return null;
  }
  const month = parseMonthKey(value);
  if (!month) {
    throw new Error('INVALID_INPUT');
  }
  return month;
};

const toDescriptor = (dateKey: string): MonthDescriptor => ({
  key: dateKey.slice(0, 7),
  year: yearOf(dateKey),
  month: Number(dateKey.slice(5, 7))
});

const earlierOf = (a: MonthDescriptor | null, b: MonthDescriptor | null) =>
  a && b ? (a.key <= b.key ? a : b) : a ?? b;

const laterOf = (a: MonthDescriptor | null, b: MonthDescriptor | null) =>
  a && b ? (a.key >= b.key ? a : b) : a ?? b;

const resolveSeries = (series: readonly string[] | undefined): LedgerFieldName[] => {
  if (series === undefined) {
    return [...LEDGER_FIELDS];
  }
  return series.map((name) => {
    if (!isLedgerField(name)) {
      throw new Error('INVALID_INPUT');
    }
    return name;
  });
};

const resolveRatioSet = (value: string | undefined): RatioSetKey => {
  if (value === undefined || !value.trim()) {
    return DEFAULT_RATIO_SET;
  }
  if (!isRatioSetKey(value)) {
    throw new Error('INVALID_INPUT');
  }
  return value;
};

export class AnalysisService {
  constructor(
    private readonly ledger: LedgerService,
    private readonly options: AnalysisServiceOptions
  ) {}

  listOptions(table: LedgerTable): AnalysisOptions {
    const years = new Set(table.snapshots.map((snapshot) => yearOf(snapshot.date)));
    return {
      years: Array.from(years).sort((a, b) => a - b),
      months: listMonthNames(),
      fields: this.ledger.listFields(),
      ratioSets: Object.values(RATIO_SETS).map(({ key, label }) => ({ key, label }))
    };
  }

  /**
   * Resolves the requested month range against the stored history. Open bounds take the
   * first or last stored month, clamped to the given bound; with no bounds and no data the
   * window is null.
   */
  resolveWindow(table: LedgerTable, request: Pick<AnalysisRequest, 'from' | 'to'>): DateWindow | null {
    const view = this.ledger.toReportView(table);
    const from = parseBound(request.from);
    const to = parseBound(request.to);
    const first = view[0];
    const last = view[view.length - 1];
    // An open bound never crosses the given one, so a bound outside the history selects nothing
    const start = from ?? earlierOf(first ? toDescriptor(first.date) : null, to);
    const end = to ?? laterOf(last ? toDescriptor(last.date) : null, from);
    if (!start || !end) {
      return null;
    }
    return resolveMonthWindow(start, end);
  }

  selectSnapshots(table: LedgerTable, window: DateWindow | null): LedgerSnapshot[] {
    const view = this.ledger.toReportView(table);
    return window ? view.filter((snapshot) => isWithinWindow(snapshot.date, window)) : view;
  }

  analyze(table: LedgerTable, request: AnalysisRequest = {}): AnalysisResult {
    const window = this.resolveWindow(table, request);
    const series = resolveSeries(request.series);
    const ratioSet = resolveRatioSet(request.ratioSet);
    const selected = this.selectSnapshots(table, window);
    const { displayScale, amountPrefix } = this.options;

    const months = selected.map((snapshot) => ({ date: snapshot.date, label: formatMonthLabel(snapshot.date) }));
    const trend: TrendSeries[] = series.map((field) => ({
      field,
      points: selected.map((snapshot) => ({
        date: snapshot.date,
        label: formatMonthLabel(snapshot.date),
        value: snapshot.fields[field] / displayScale
      }))
    }));
    const formatted: TrendTableRow[] = trend.map(({ field, points }) => ({
      field,
      values: points.map((point) => formatAmount(point.value, amountPrefix))
    }));

    return {
      window,
      scale: displayScale,
      months,
      trend,
      table: formatted,
      ratioSet,
      ratios: computeRatios(selected, RATIO_SETS[ratioSet].ratios)
    };
  }
}
