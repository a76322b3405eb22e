/**
 * A small dataset whose aggregates are easy to follow by hand.
 *
 * Customers: C1 north/vip, C2 south/regular, C3 north/new.
 * C9 is referenced by T6 but has no customer row.
 *
 * Non-returned revenue: electronics 500, clothing 130, home 120, grocery 30 (780).
 * Returned: T3 electronics 300, T7 home 20 (320 lost).
 * Anchor: 2024-01-10 to 2024-03-15; current month 2024-03-01..15, previous February.
 */

import { makeContext, type CustomerSeed, type TransactionSeed } from './builders.js';

import type { InsightsContext } from '@/modules/dataset/core/context.js';

export const SAMPLE_CUSTOMERS: CustomerSeed[] = [
  { id: 'C1', region: 'north', segment: 'vip', signupDate: '2023-02-01' },
  { id: 'C2', region: 'south', segment: 'regular', signupDate: '2023-04-12' },
  { id: 'C3', region: 'north', segment: 'new', signupDate: '2023-12-20' },
];

export const SAMPLE_TRANSACTIONS: TransactionSeed[] = [
  { id: 'T1', customerId: 'C1', date: '2024-01-10', category: 'electronics', amount: '500.00', paymentMethod: 'credit_card' },
  { id: 'T2', customerId: 'C2', date: '2024-01-20', category: 'clothing', amount: '50.00', paymentMethod: 'paypal' },
  { id: 'T3', customerId: 'C1', date: '2024-02-05', category: 'electronics', amount: '300.00', paymentMethod: 'credit_card', returned: true },
  { id: 'T4', customerId: 'C3', date: '2024-02-14', category: 'home', amount: '120.00', paymentMethod: 'debit_card' },
  { id: 'T5', customerId: 'C2', date: '2024-03-03', category: 'clothing', amount: '80.00', paymentMethod: 'paypal' },
  { id: 'T6', customerId: 'C9', date: '2024-03-09', category: 'grocery', amount: '30.00', paymentMethod: 'apple_pay' },
  { id: 'T7', customerId: 'C3', date: '2024-03-15', category: 'home', amount: '20.00', paymentMethod: 'credit_card', returned: true },
];

export const makeSampleContext = (): InsightsContext =>
  makeContext(SAMPLE_TRANSACTIONS, SAMPLE_CUSTOMERS);

/** Metadata every unfiltered operation over the sample reports */
export const sampleMetadata = (recordCount: number, filters: Record<string, unknown> = {}) => ({
  date_range_start: '2024-01-10',
  date_range_end: '2024-03-15',
  filters_applied: filters,
  record_count: recordCount,
  data_as_of: '2024-03-15',
});
