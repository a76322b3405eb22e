import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { parseIsoDate, type IsoDate } from './dates.js';
import { parseError, schemaError, type DatasetLoadError } from './errors.js';
import {
  CATEGORIES,
  PAYMENT_METHODS,
  REGIONS,
  SEGMENTS,
  isMember,
  type Customer,
  type TableName,
  type Transaction,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Table Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const TRANSACTION_COLUMNS = [
  'transaction_id',
  'customer_id',
  'transaction_date',
  'category',
  'product_name',
  'amount',
  'quantity',
  'payment_method',
  'is_returned',
] as const;

export const CUSTOMER_COLUMNS = ['customer_id', 'region', 'signup_date', 'customer_segment'] as const;

/** One CSV data row keyed by header name. */
export type RawRecord = Readonly<Record<string, string>>;

/**
 * Checks a header row against the required columns. Extra columns are allowed.
 */
export const checkColumns = (
  table: TableName,
  header: readonly string[],
  required: readonly string[]
): Result<void, DatasetLoadError> => {
  const present = new Set(header);
  const missing = required.filter((column) => !present.has(column));
  return missing.length > 0 ? err(schemaError(table, missing)) : ok(undefined);
};

// ─────────────────────────────────────────────────────────────────────────────
// Field Parsers
// ─────────────────────────────────────────────────────────────────────────────

type FieldParser<T> = (raw: string) => T | null;

const AMOUNT_RE = /^\d+(\.\d+)?$/;
const QUANTITY_RE = /^\d+$/;

const parseIdentifier: FieldParser<string> = (raw) => (raw === '' ? null : raw);

const parseText: FieldParser<string> = (raw) => raw;

const parseAmount: FieldParser<Decimal> = (raw) => (AMOUNT_RE.test(raw) ? new Decimal(raw) : null);

const parseQuantity: FieldParser<number> = (raw) => {
  if (!QUANTITY_RE.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) && value >= 1 ? value : null;
};

const parseReturnedFlag: FieldParser<boolean> = (raw) => {
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return null;
  }
};

const parseDate: FieldParser<IsoDate> = parseIsoDate;

const parseEnum =
  <T extends string>(values: readonly T[]): FieldParser<T> =>
  (raw) =>
    isMember(values, raw) ? raw : null;

interface RowContext {
  table: TableName;
  /** 1-based data row */
  row: number;
  record: RawRecord;
}

const readField = <T>(
  ctx: RowContext,
  column: string,
  parser: FieldParser<T>,
  expected: string
): Result<T, DatasetLoadError> => {
  const raw = ctx.record[column] ?? '';
  const value = parser(raw);
  if (value === null) {
    return err(parseError(ctx.table, ctx.row, column, `expected ${expected}, got '${raw}'`));
  }
  return ok(value);
};

// ─────────────────────────────────────────────────────────────────────────────
// Row Parsers
// ─────────────────────────────────────────────────────────────────────────────

export const parseTransactionRecord = (
  record: RawRecord,
  row: number
): Result<Transaction, DatasetLoadError> => {
  const ctx: RowContext = { table: 'transactions', row, record };

  const transactionId = readField(ctx, 'transaction_id', parseIdentifier, 'a non-empty identifier');
  if (transactionId.isErr()) return err(transactionId.error);

  const customerId = readField(ctx, 'customer_id', parseIdentifier, 'a non-empty identifier');
  if (customerId.isErr()) return err(customerId.error);

  const transactionDate = readField(ctx, 'transaction_date', parseDate, 'a YYYY-MM-DD date');
  if (transactionDate.isErr()) return err(transactionDate.error);

  const category = readField(
    ctx,
    'category',
    parseEnum(CATEGORIES),
    `one of ${CATEGORIES.join(', ')}`
  );
  if (category.isErr()) return err(category.error);

  const productName = readField(ctx, 'product_name', parseText, 'text');
  if (productName.isErr()) return err(productName.error);

  const amount = readField(ctx, 'amount', parseAmount, 'a non-negative decimal');
  if (amount.isErr()) return err(amount.error);

  const quantity = readField(ctx, 'quantity', parseQuantity, 'an integer >= 1');
  if (quantity.isErr()) return err(quantity.error);

  const paymentMethod = readField(
    ctx,
    'payment_method',
    parseEnum(PAYMENT_METHODS),
    `one of ${PAYMENT_METHODS.join(', ')}`
  );
  if (paymentMethod.isErr()) return err(paymentMethod.error);

  const isReturned = readField(ctx, 'is_returned', parseReturnedFlag, 'true, false, 1 or 0');
  if (isReturned.isErr()) return err(isReturned.error);

  return ok({
    transactionId: transactionId.value,
    customerId: customerId.value,
    transactionDate: transactionDate.value,
    category: category.value,
    productName: productName.value,
    amount: amount.value,
    quantity: quantity.value,
    paymentMethod: paymentMethod.value,
    isReturned: isReturned.value,
  });
};

export const parseCustomerRecord = (
  record: RawRecord,
  row: number
): Result<Customer, DatasetLoadError> => {
  const ctx: RowContext = { table: 'customers', row, record };

  const customerId = readField(ctx, 'customer_id', parseIdentifier, 'a non-empty identifier');
  if (customerId.isErr()) return err(customerId.error);

  const region = readField(ctx, 'region', parseEnum(REGIONS), `one of ${REGIONS.join(', ')}`);
  if (region.isErr()) return err(region.error);

  const signupDate = readField(ctx, 'signup_date', parseDate, 'a YYYY-MM-DD date');
  if (signupDate.isErr()) return err(signupDate.error);

  const segment = readField(
    ctx,
    'customer_segment',
    parseEnum(SEGMENTS),
    `one of ${SEGMENTS.join(', ')}`
  );
  if (segment.isErr()) return err(segment.error);

  return ok({
    customerId: customerId.value,
    region: region.value,
    signupDate: signupDate.value,
    segment: segment.value,
  });
};

/**
 * Parses every record of a table, failing on the first bad row or on a
 * repeated identifier.
 */
export const parseTable = <T>(
  table: TableName,
  records: readonly RawRecord[],
  parseRow: (record: RawRecord, row: number) => Result<T, DatasetLoadError>,
  idOf: (row: T) => string,
  idColumn: string
): Result<T[], DatasetLoadError> => {
  const rows: T[] = [];
  const firstSeen = new Map<string, number>();

  for (const [index, record] of records.entries()) {
    const rowNumber = index + 1;
    const parsed = parseRow(record, rowNumber);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    const id = idOf(parsed.value);
    const previous = firstSeen.get(id);
    if (previous !== undefined) {
      return err(
        parseError(
          table,
          rowNumber,
          idColumn,
          `duplicate identifier '${id}' (first seen at row ${String(previous)})`
        )
      );
    }

    firstSeen.set(id, rowNumber);
    rows.push(parsed.value);
  }

  return ok(rows);
};
