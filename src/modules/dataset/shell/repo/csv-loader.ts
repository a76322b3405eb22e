import fs from 'node:fs/promises';
import path from 'node:path';

import { parse } from 'csv-parse/sync';
import { err, fromThrowable, ok, type Result } from 'neverthrow';

import { createInsightsContext, type InsightsContext } from '../../core/context.js';
import {
  dataNotFoundError,
  emptyDatasetError,
  parseError,
  readError,
  type DatasetLoadError,
} from '../../core/errors.js';
import {
  CUSTOMER_COLUMNS,
  TRANSACTION_COLUMNS,
  checkColumns,
  parseCustomerRecord,
  parseTable,
  parseTransactionRecord,
  type RawRecord,
} from '../../core/parse.js';

import type { DatasetTables, TableName } from '../../core/types.js';

export const TRANSACTIONS_FILE = 'transactions.csv';
export const CUSTOMERS_FILE = 'customers.csv';

const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));

const safeParseCsv = fromThrowable(
  (text: string): unknown =>
    parse(text, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
    }),
  errorMessage
);

const readTableFile = async (filePath: string): Promise<Result<string, DatasetLoadError>> => {
  try {
    return ok(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return err(dataNotFoundError(filePath));
    }
    return err(readError(filePath, errorMessage(error)));
  }
};

/**
 * Splits CSV text into records keyed by header, after checking the header
 * carries every required column.
 */
export const parseCsvTable = (
  table: TableName,
  text: string,
  requiredColumns: readonly string[]
): Result<RawRecord[], DatasetLoadError> => {
  const parsed = safeParseCsv(text);
  if (parsed.isErr()) {
    return err(parseError(table, null, null, parsed.error));
  }

  const matrix = parsed.value;
  if (!isStringMatrix(matrix)) {
    return err(parseError(table, null, null, 'unexpected CSV structure'));
  }

  const [header = [], ...rows] = matrix;

  const columns = checkColumns(table, header, requiredColumns);
  if (columns.isErr()) return err(columns.error);

  return ok(
    rows.map((cells) => Object.fromEntries(header.map((name, index) => [name, cells[index] ?? ''])))
  );
};

const loadTable = async <T>(
  filePath: string,
  table: TableName,
  requiredColumns: readonly string[],
  parseRow: (record: RawRecord, row: number) => Result<T, DatasetLoadError>,
  idOf: (row: T) => string,
  idColumn: string
): Promise<Result<T[], DatasetLoadError>> => {
  const text = await readTableFile(filePath);
  if (text.isErr()) return err(text.error);

  return parseCsvTable(table, text.value, requiredColumns).andThen((records) =>
    parseTable(table, records, parseRow, idOf, idColumn)
  );
};

/**
 * Reads and validates `transactions.csv` and `customers.csv` from a directory.
 */
export const readDatasetTables = async (
  dataDir: string
): Promise<Result<DatasetTables, DatasetLoadError>> => {
  const transactions = await loadTable(
    path.join(dataDir, TRANSACTIONS_FILE),
    'transactions',
    TRANSACTION_COLUMNS,
    parseTransactionRecord,
    (row) => row.transactionId,
    'transaction_id'
  );
  if (transactions.isErr()) return err(transactions.error);

  const customers = await loadTable(
    path.join(dataDir, CUSTOMERS_FILE),
    'customers',
    CUSTOMER_COLUMNS,
    parseCustomerRecord,
    (row) => row.customerId,
    'customer_id'
  );
  if (customers.isErr()) return err(customers.error);

  if (transactions.value.length === 0) {
    return err(emptyDatasetError());
  }

  return ok({ transactions: transactions.value, customers: customers.value });
};

/**
 * Loads the dataset directory into a ready-to-query context.
 */
export const loadDataset = async (
  dataDir: string
): Promise<Result<InsightsContext, DatasetLoadError>> => {
  const tables = await readDatasetTables(dataDir);
  return tables.andThen(createInsightsContext);
};
