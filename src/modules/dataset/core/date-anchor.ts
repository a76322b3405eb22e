import { err, ok, type Result } from 'neverthrow';

import {
  endOfPreviousMonth,
  startOfMonth,
  startOfPreviousMonth,
  type DateWindow,
  type IsoDate,
} from './dates.js';
import { emptyDatasetError, type DatasetLoadError } from './errors.js';

import type { Transaction } from './types.js';

/**
 * "Now" as seen by the dataset. Derived from the transaction dates only;
 * nothing here reads the wall clock.
 */
export interface DateAnchor {
  readonly dataStart: IsoDate;
  readonly dataEnd: IsoDate;
  /** First day of the month of `dataEnd` through `dataEnd` */
  readonly currentMonth: DateWindow;
  /** The full calendar month before `currentMonth` (may hold no rows) */
  readonly previousMonth: DateWindow;
}

export const computeDateAnchor = (
  transactions: readonly Pick<Transaction, 'transactionDate'>[]
): Result<DateAnchor, DatasetLoadError> => {
  const first = transactions[0];
  if (first === undefined) {
    return err(emptyDatasetError());
  }

  let dataStart = first.transactionDate;
  let dataEnd = first.transactionDate;

  for (const { transactionDate } of transactions) {
    if (transactionDate < dataStart) dataStart = transactionDate;
    if (transactionDate > dataEnd) dataEnd = transactionDate;
  }

  return ok({
    dataStart,
    dataEnd,
    currentMonth: { start: startOfMonth(dataEnd), end: dataEnd },
    previousMonth: { start: startOfPreviousMonth(dataEnd), end: endOfPreviousMonth(dataEnd) },
  });
};
