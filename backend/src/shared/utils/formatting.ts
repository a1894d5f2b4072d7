const FORMAT_LOCALE = 'en-US';

const integerFormatter = new Intl.NumberFormat(FORMAT_LOCALE, { maximumFractionDigits: 0 });
const fractionalFormatter = new Intl.NumberFormat(FORMAT_LOCALE, {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

// Serialization form: no grouping, no exponent
const plainFormatter = new Intl.NumberFormat(FORMAT_LOCALE, { useGrouping: false, maximumFractionDigits: 20 });

const isPresent = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value);

/**
 * Renders a currency amount: whole amounts with grouped thousands and no decimals,
 * anything else with exactly two decimals. Missing or non-finite values render as ''.
 */
export const formatAmount = (value: number | null | undefined, prefix = ''): string => {
  if (!isPresent(value)) {
    return '';
  }
  const formatter = Number.isInteger(value) ? integerFormatter : fractionalFormatter;
  return `${prefix}${formatter.format(value === 0 ? 0 : value)}`;
};

export const formatPlainNumber = (value: number): string =>
  Number.isFinite(value) ? plainFormatter.format(value === 0 ? 0 : value) : '0';

export const formatDecimal = (value: number | null | undefined): string =>
  isPresent(value) ? value.toFixed(2) : '';

export const formatPercent = (value: number | null | undefined): string =>
  isPresent(value) ? `${(value * 100).toFixed(2)}%` : '';
