import { Decimal } from 'decimal.js';

/**
 * Exact decimal arithmetic for money and ratios. Values are rounded once, at
 * output, half-up.
 */

export const ZERO = new Decimal(0);
const HUNDRED = new Decimal(100);

export const sumAmounts = (rows: readonly { readonly amount: Decimal }[]): Decimal =>
  rows.reduce((total, row) => total.plus(row.amount), ZERO);

/** Division that yields 0 for a zero denominator */
export const safeDivide = (numerator: Decimal.Value, denominator: Decimal.Value): Decimal => {
  const divisor = new Decimal(denominator);
  return divisor.isZero() ? ZERO : new Decimal(numerator).div(divisor);
};

/** 100 × part / whole, 0 when whole is 0 */
export const percentOf = (part: Decimal.Value, whole: Decimal.Value): Decimal =>
  safeDivide(new Decimal(part).times(HUNDRED), whole);

/** Relative change in percent, guarded for a zero base */
export const percentChange = (current: Decimal.Value, previous: Decimal.Value): Decimal => {
  const base = new Decimal(previous);
  if (base.isZero()) {
    return new Decimal(current).isZero() ? ZERO : HUNDRED;
  }
  return new Decimal(current).minus(base).times(HUNDRED).div(base);
};

// `+ 0` folds -0 into 0 so negative values that round to zero serialize as 0
const roundTo = (value: Decimal.Value, places: number): number =>
  new Decimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber() + 0;

export const toMoney = (value: Decimal.Value): number => roundTo(value, 2);
export const toPercent = (value: Decimal.Value): number => roundTo(value, 1);
export const toRatio = (value: Decimal.Value): number => roundTo(value, 1);

// ─────────────────────────────────────────────────────────────────────────────
// Summary Formatting
// ─────────────────────────────────────────────────────────────────────────────

const moneyFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const countFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** `$12,345.67` */
export const formatMoney = (value: number): string => `$${moneyFormatter.format(value)}`;

/** `12,345` */
export const formatCount = (value: number): string => countFormatter.format(value);

/** `12.5%` */
export const formatPercent = (value: number): string => `${value.toFixed(1)}%`;

export const capitalize = (value: string): string =>
  value.length === 0 ? value : `${value.charAt(0).toUpperCase()}${value.slice(1)}`;

/** `credit_card` → `credit card` */
export const humanize = (value: string): string => value.replaceAll('_', ' ');

/** `1 category`, `3 categories` */
export const pluralize = (count: number, singular: string, plural: string): string =>
  `${formatCount(count)} ${count === 1 ? singular : plural}`;
