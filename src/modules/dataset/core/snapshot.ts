import type { Customer, DatasetTables, MergedTransaction, Transaction } from './types.js';

/**
 * Immutable, read-only view over the loaded tables.
 *
 * Every accessor hands out a fresh array of fresh row objects, so nothing a
 * caller does to its copy can reach the shared rows.
 */
export interface DatasetSnapshot {
  readonly transactionCount: number;
  readonly customerCount: number;
  transactions(): Transaction[];
  customers(): Customer[];
  /** Transactions left-joined with their customer (computed on first use) */
  merged(): MergedTransaction[];
}

const joinCustomers = (
  transactions: readonly Transaction[],
  customers: readonly Customer[]
): readonly MergedTransaction[] => {
  const byId = new Map(customers.map((customer) => [customer.customerId, customer]));

  return Object.freeze(
    transactions.map((transaction) => {
      const customer = byId.get(transaction.customerId);
      return Object.freeze({
        ...transaction,
        region: customer?.region ?? null,
        signupDate: customer?.signupDate ?? null,
        segment: customer?.segment ?? null,
      });
    })
  );
};

export const createSnapshot = (tables: DatasetTables): DatasetSnapshot => {
  const transactions = Object.freeze(tables.transactions.map((row) => Object.freeze({ ...row })));
  const customers = Object.freeze(tables.customers.map((row) => Object.freeze({ ...row })));

  let mergedRows: readonly MergedTransaction[] | null = null;

  return {
    transactionCount: transactions.length,
    customerCount: customers.length,
    transactions: () => transactions.map((row) => ({ ...row })),
    customers: () => customers.map((row) => ({ ...row })),
    merged: () => {
      mergedRows ??= joinCustomers(transactions, customers);
      return mergedRows.map((row) => ({ ...row }));
    },
  };
};
