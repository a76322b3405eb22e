import { describe, it, expect } from 'vitest';

import { getRevenueByCategory } from '@/modules/insights/core/usecases/get-revenue-by-category.js';

import { makeContext } from '../../fixtures/builders.js';
import { makeSampleContext, sampleMetadata } from '../../fixtures/dataset.js';

describe('getRevenueByCategory', () => {
  const context = makeSampleContext();

  it('ranks categories by non-returned revenue', () => {
    const result = getRevenueByCategory(context, {})._unsafeUnwrap();

    expect(result.payload).toEqual({
      data: [
        {
          category: 'electronics',
          total_revenue: 500,
          transaction_count: 1,
          avg_transaction_value: 500,
          percentage_of_total: 64.1,
        },
        {
          category: 'clothing',
          total_revenue: 130,
          transaction_count: 2,
          avg_transaction_value: 65,
          percentage_of_total: 16.7,
        },
        {
          category: 'home',
          total_revenue: 120,
          transaction_count: 1,
          avg_transaction_value: 120,
          percentage_of_total: 15.4,
        },
        {
          category: 'grocery',
          total_revenue: 30,
          transaction_count: 1,
          avg_transaction_value: 30,
          percentage_of_total: 3.8,
        },
      ],
      total_revenue: 780,
      top_category: 'electronics',
    });
    expect(result.summary).toBe(
      'Total revenue of $780.00 across 4 categories. Electronics is the top performer with $500.00 (64.1% of total).'
    );
    expect(result.metadata).toEqual(sampleMetadata(5));
  });

  it('applies the date range and category allow-list', () => {
    const result = getRevenueByCategory(context, {
      start_date: '2024-02-01',
      categories: ['clothing', 'home', 'clothing'],
    })._unsafeUnwrap();

    expect(result.payload.data.map((row) => [row.category, row.total_revenue, row.percentage_of_total])).toEqual([
      ['home', 120, 60],
      ['clothing', 80, 40],
    ]);
    expect(result.payload.total_revenue).toBe(200);
    expect(result.metadata).toEqual({
      date_range_start: '2024-02-01',
      date_range_end: '2024-03-15',
      filters_applied: { categories: ['clothing', 'home'] },
      record_count: 2,
      data_as_of: '2024-03-15',
    });
  });

  it('includes both ends of the range', () => {
    const result = getRevenueByCategory(context, {
      start_date: '2024-01-10',
      end_date: '2024-01-10',
    })._unsafeUnwrap();

    expect(result.payload.total_revenue).toBe(500);
  });

  it('uses the singular form for one category', () => {
    const result = getRevenueByCategory(context, { categories: ['grocery'] })._unsafeUnwrap();

    expect(result.summary).toBe(
      'Total revenue of $30.00 across 1 category. Grocery is the top performer with $30.00 (100.0% of total).'
    );
  });

  it('breaks revenue ties alphabetically', () => {
    const tied = makeContext([
      { category: 'sports', amount: '10.00' },
      { category: 'home', amount: '10.00' },
    ]);

    const result = getRevenueByCategory(tied, {})._unsafeUnwrap();

    expect(result.payload.data.map((row) => row.category)).toEqual(['home', 'sports']);
    expect(result.payload.top_category).toBe('home');
  });

  it('rejects malformed dates', () => {
    expect(getRevenueByCategory(context, { start_date: '2024/01/01' })._unsafeUnwrapErr()).toEqual({
      kind: 'invalid_input',
      message: 'Invalid start_date format: 2024/01/01. Use YYYY-MM-DD.',
      suggestions: ["Use format like '2024-01-01'"],
    });
  });

  it('rejects a start after the end', () => {
    const error = getRevenueByCategory(context, {
      start_date: '2024-03-01',
      end_date: '2024-02-01',
    })._unsafeUnwrapErr();

    expect(error.kind).toBe('invalid_input');
    expect(error.message).toBe('start_date 2024-03-01 is after end_date 2024-02-01');
  });

  it('names unknown categories', () => {
    const error = getRevenueByCategory(context, { categories: ['toys', 'home'] })._unsafeUnwrapErr();

    expect(error.message).toBe('Invalid category: toys');
    expect(error.suggestions).toEqual([
      'Valid categories are: clothing, electronics, grocery, home, sports',
    ]);
  });

  it('reports no data outside the dataset span', () => {
    expect(getRevenueByCategory(context, { start_date: '2025-01-01' })._unsafeUnwrapErr()).toEqual({
      kind: 'no_data',
      message: 'No transactions found matching the specified filters.',
      suggestions: [
        'Try a broader date range',
        'Check category spelling',
        'Use explain_capabilities to see valid options',
      ],
    });
  });

  it('splits revenue between two categories', () => {
    const twoCategories = makeContext([
      { category: 'electronics', amount: '10000.00' },
      { category: 'clothing', amount: '5000.00' },
    ]);

    const result = getRevenueByCategory(twoCategories, {})._unsafeUnwrap();

    expect(result.payload.total_revenue).toBe(15000);
    expect(result.payload.top_category).toBe('electronics');
    expect(result.payload.data.map((row) => [row.category, row.percentage_of_total])).toEqual([
      ['electronics', 66.7],
      ['clothing', 33.3],
    ]);
  });
});
