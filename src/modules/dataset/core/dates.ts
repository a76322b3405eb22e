/**
 * Calendar date helpers.
 *
 * Dates are kept as validated `YYYY-MM-DD` strings. Zero-padded ISO dates
 * order lexicographically, so range checks are plain string comparisons and
 * no value ever depends on the host time zone.
 */

// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type IsoDate = string & { readonly __brand: unique symbol };

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const brand = (value: string): IsoDate => value as IsoDate;

const fromUtcParts = (year: number, monthIndex: number, day: number): IsoDate =>
  brand(new Date(Date.UTC(year, monthIndex, day)).toISOString().slice(0, 10));

/**
 * Parses a strict `YYYY-MM-DD` value that names a real calendar day.
 * Returns null for anything else (`2024-02-30`, `2024-1-5`, `05/01/2024`).
 */
export const parseIsoDate = (value: string): IsoDate | null => {
  const match = ISO_DATE_RE.exec(value);
  if (match === null) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const date = new Date(Date.UTC(year, month - 1, day));
  date.setUTCFullYear(year);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return brand(value);
};

const yearOf = (date: IsoDate): number => Number(date.slice(0, 4));
const monthIndexOf = (date: IsoDate): number => Number(date.slice(5, 7)) - 1;

/** `YYYY-MM` bucket label */
export const monthKey = (date: IsoDate): string => date.slice(0, 7);

export const startOfMonth = (date: IsoDate): IsoDate => brand(`${monthKey(date)}-01`);

export const startOfPreviousMonth = (date: IsoDate): IsoDate =>
  fromUtcParts(yearOf(date), monthIndexOf(date) - 1, 1);

/** Day 0 of a month is the last day of the month before it. */
export const endOfPreviousMonth = (date: IsoDate): IsoDate =>
  fromUtcParts(yearOf(date), monthIndexOf(date), 0);

export const compareIsoDates = (a: IsoDate, b: IsoDate): number => (a < b ? -1 : a > b ? 1 : 0);

export interface DateWindow {
  readonly start: IsoDate;
  readonly end: IsoDate;
}

/** Inclusive on both ends */
export const isWithin = (date: IsoDate, window: DateWindow): boolean =>
  date >= window.start && date <= window.end;
