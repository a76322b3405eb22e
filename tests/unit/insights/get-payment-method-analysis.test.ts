import { describe, it, expect } from 'vitest';

import { getPaymentMethodAnalysis } from '@/modules/insights/core/usecases/get-payment-method-analysis.js';

import { makeSampleContext, sampleMetadata } from '../../fixtures/dataset.js';

describe('getPaymentMethodAnalysis', () => {
  const context = makeSampleContext();

  it('ranks methods by usage, counting returns', () => {
    const result = getPaymentMethodAnalysis(context, {})._unsafeUnwrap();

    expect(result.payload).toEqual({
      data: [
        {
          payment_method: 'credit_card',
          transaction_count: 3,
          returned_count: 2,
          total_revenue: 500,
          avg_transaction_value: 500,
          percentage_of_transactions: 42.9,
          return_rate_percent: 66.7,
        },
        {
          payment_method: 'paypal',
          transaction_count: 2,
          returned_count: 0,
          total_revenue: 130,
          avg_transaction_value: 65,
          percentage_of_transactions: 28.6,
          return_rate_percent: 0,
        },
        {
          payment_method: 'apple_pay',
          transaction_count: 1,
          returned_count: 0,
          total_revenue: 30,
          avg_transaction_value: 30,
          percentage_of_transactions: 14.3,
          return_rate_percent: 0,
        },
        {
          payment_method: 'debit_card',
          transaction_count: 1,
          returned_count: 0,
          total_revenue: 120,
          avg_transaction_value: 120,
          percentage_of_transactions: 14.3,
          return_rate_percent: 0,
        },
      ],
      total_revenue: 780,
      most_popular_method: 'credit_card',
      highest_avg_value_method: 'credit_card',
    });
    expect(result.summary).toBe(
      'Most popular payment method is credit card with 42.9% of transactions. Highest average order value: credit card ($500.00). Total revenue: $780.00.'
    );
    expect(result.metadata).toEqual(sampleMetadata(7));
  });

  it('filters by region through the customer join', () => {
    const result = getPaymentMethodAnalysis(context, { region: 'south' })._unsafeUnwrap();

    expect(result.payload.data).toEqual([
      {
        payment_method: 'paypal',
        transaction_count: 2,
        returned_count: 0,
        total_revenue: 130,
        avg_transaction_value: 65,
        percentage_of_transactions: 100,
        return_rate_percent: 0,
      },
    ]);
    expect(result.metadata.filters_applied).toEqual({ region: 'south' });
  });

  it('combines category and region filters', () => {
    const result = getPaymentMethodAnalysis(context, {
      category: 'home',
      region: 'north',
    })._unsafeUnwrap();

    expect(result.payload.data.map((row) => row.payment_method)).toEqual(['credit_card', 'debit_card']);
    expect(result.payload.total_revenue).toBe(120);
    expect(result.payload.highest_avg_value_method).toBe('debit_card');
  });

  it('reports no data when the filters match nothing', () => {
    expect(getPaymentMethodAnalysis(context, { category: 'sports' })._unsafeUnwrapErr()).toEqual({
      kind: 'no_data',
      message: 'No transactions found matching the specified filters.',
      suggestions: ['Try removing filters'],
    });
  });
});
