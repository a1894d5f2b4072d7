import type { RatioDefinition, RatioSet, RatioSetKey } from './ratios.types.js';

export const STANDARD_RATIOS: readonly RatioDefinition[] = [
  {
    key: 'current-ratio',
    name: 'Current Ratio',
    numerator: ['Current Asset'],
    denominator: ['Current Liabilities'],
    kind: 'decimal'
  },
  {
    key: 'debt-to-equity',
    name: 'Debt to Equity',
    numerator: ['Total Liabilities'],
    denominator: ['Equity'],
    kind: 'decimal'
  },
  {
    key: 'operating-profit-margin',
    name: 'Operating Profit Margin',
    numerator: ['Operating Income'],
    denominator: ['Revenue'],
    kind: 'percent'
  },
  {
    key: 'net-profit-margin',
    name: 'Net Profit Margin',
    numerator: ['Net Income'],
    denominator: ['Revenue'],
    kind: 'percent'
  },
  {
    key: 'return-on-assets',
    name: 'Return on Assets',
    numerator: ['Net Income'],
    denominator: ['Total Asset'],
    kind: 'percent'
  },
  {
    key: 'return-on-equity',
    name: 'Return on Equity',
    numerator: ['Net Income'],
    denominator: ['Equity'],
    kind: 'percent'
  }
];

export const BROKERAGE_RATIOS: readonly RatioDefinition[] = [
  {
    key: 'liquidity-ratio',
    name: 'Liquidity Ratio',
    numerator: ['Cash and Equivalents'],
    denominator: ['Current Liabilities'],
    kind: 'decimal'
  },
  {
    key: 'leverage-ratio',
    name: 'Leverage Ratio',
    numerator: ['Total Liabilities'],
    denominator: ['Total Asset'],
    kind: 'decimal'
  },
  {
    key: 'operating-margin',
    name: 'Operating Margin',
    numerator: ['Operating Income'],
    denominator: ['Revenue'],
    kind: 'percent'
  },
  {
    key: 'efficiency-margin',
    name: 'Efficiency Margin',
    numerator: ['Operating Expense'],
    denominator: ['Revenue'],
    kind: 'percent'
  },
  {
    key: 'profit-margin',
    name: 'Profit Margin',
    numerator: ['Income Before Tax'],
    denominator: ['Revenue'],
    kind: 'percent'
  },
  {
    key: 'after-tax-margin',
    name: 'After-Tax Margin',
    numerator: ['Net Income'],
    denominator: ['Revenue'],
    kind: 'percent'
  },
  {
    key: 'tax-rate',
    name: 'Tax Rate',
    numerator: ['Tax'],
    denominator: ['Net Income', 'Tax'],
    kind: 'percent'
  }
];

export const RATIO_SETS: Record<RatioSetKey, RatioSet> = {
  standard: { key: 'standard', label: 'Financial Ratios', ratios: STANDARD_RATIOS },
  brokerage: { key: 'brokerage', label: 'Brokerage Ratios', ratios: BROKERAGE_RATIOS }
};

export const DEFAULT_RATIO_SET: RatioSetKey = 'standard';

export const isRatioSetKey = (value: string): value is RatioSetKey => value === 'standard' || value === 'brokerage';
