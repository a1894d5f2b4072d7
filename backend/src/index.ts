export { LedgerRepository, coerceAmount, createEmptyTable } from './modules/ledger/ledger.repository.js';
export { LedgerService, parseFieldValues, sortSnapshots, type LedgerServiceOptions } from './modules/ledger/ledger.service.js';
export { LEDGER_FIELDS, LEDGER_COLUMNS, LEDGER_FIELD_DEFINITIONS, DATE_COLUMN } from './modules/ledger/ledger.defaults.js';
export type * from './modules/ledger/ledger.types.js';
export { computeRatio, computeRatios, formatRatio, toFormattedRatioMap } from './modules/ratios/ratios.service.js';
export { STANDARD_RATIOS, BROKERAGE_RATIOS, RATIO_SETS } from './modules/ratios/ratios.defaults.js';
export type * from './modules/ratios/ratios.types.js';
export { AnalysisService, type AnalysisServiceOptions } from './modules/analysis/analysis.service.js';
export type * from './modules/analysis/analysis.types.js';
export { formatAmount, formatDecimal, formatPercent } from './shared/utils/formatting.js';
export { lastDayOfMonth, normalizeDateKey, formatMonthLabel } from './shared/utils/date.js';
