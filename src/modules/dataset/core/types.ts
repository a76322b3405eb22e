import type { IsoDate } from './dates.js';
import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Closed Vocabularies
// ─────────────────────────────────────────────────────────────────────────────
// Process-wide constants, listed in sorted order. They describe the known
// domain vocabulary, not the values observed in a particular file.

export const CATEGORIES = ['clothing', 'electronics', 'grocery', 'home', 'sports'] as const;
export type Category = (typeof CATEGORIES)[number];

export const REGIONS = ['east', 'north', 'south', 'west'] as const;
export type Region = (typeof REGIONS)[number];

export const SEGMENTS = ['new', 'regular', 'vip'] as const;
export type Segment = (typeof SEGMENTS)[number];

export const PAYMENT_METHODS = ['apple_pay', 'credit_card', 'debit_card', 'paypal'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/**
 * Narrows a string to a member of a closed vocabulary.
 */
export const isMember = <T extends string>(values: readonly T[], value: string): value is T =>
  values.some((candidate) => candidate === value);

// ─────────────────────────────────────────────────────────────────────────────
// Rows
// ─────────────────────────────────────────────────────────────────────────────

export interface Transaction {
  readonly transactionId: string;
  readonly customerId: string;
  readonly transactionDate: IsoDate;
  readonly category: Category;
  readonly productName: string;
  /** Non-negative, exact decimal */
  readonly amount: Decimal;
  /** Integer >= 1 */
  readonly quantity: number;
  readonly paymentMethod: PaymentMethod;
  readonly isReturned: boolean;
}

export interface Customer {
  readonly customerId: string;
  readonly region: Region;
  readonly signupDate: IsoDate;
  readonly segment: Segment;
}

/**
 * Transaction left-joined with its customer.
 * Customer attributes are null when the reference has no match.
 */
export interface MergedTransaction extends Transaction {
  readonly region: Region | null;
  readonly signupDate: IsoDate | null;
  readonly segment: Segment | null;
}

export interface DatasetTables {
  readonly transactions: readonly Transaction[];
  readonly customers: readonly Customer[];
}

export type TableName = 'transactions' | 'customers';
