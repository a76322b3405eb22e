import type { TableName } from './types.js';

/**
 * Load-time failures. All of them are fatal: no operation can run until the
 * dataset loads.
 */
export type DatasetLoadError =
  | { type: 'DataNotFound'; message: string; path: string }
  | { type: 'SchemaError'; message: string; table: TableName; missingColumns: string[] }
  | {
      type: 'ParseError';
      message: string;
      table: TableName;
      /** 1-based data row (header excluded); null when the file itself is malformed */
      row: number | null;
      column: string | null;
    }
  | { type: 'EmptyDataset'; message: string }
  | { type: 'ReadError'; message: string; path: string };

export const dataNotFoundError = (path: string): DatasetLoadError => ({
  type: 'DataNotFound',
  message: `Required data file not found at ${path}`,
  path,
});

export const schemaError = (table: TableName, missingColumns: string[]): DatasetLoadError => ({
  type: 'SchemaError',
  message: `Table '${table}' is missing required columns: ${missingColumns.join(', ')}`,
  table,
  missingColumns,
});

export const parseError = (
  table: TableName,
  row: number | null,
  column: string | null,
  detail: string
): DatasetLoadError => {
  const location =
    row === null ? '' : ` at row ${String(row)}${column === null ? '' : `, column '${column}'`}`;
  return {
    type: 'ParseError',
    message: `Failed to parse table '${table}'${location}: ${detail}`,
    table,
    row,
    column,
  };
};

export const emptyDatasetError = (): DatasetLoadError => ({
  type: 'EmptyDataset',
  message: 'Transaction table has no rows; the dataset cannot be anchored',
});

export const readError = (path: string, detail: string): DatasetLoadError => ({
  type: 'ReadError',
  message: `Failed to read data file at ${path}: ${detail}`,
  path,
});
