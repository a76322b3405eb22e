import { describe, it, expect } from 'vitest';

import { makeDatasetHealthChecker } from '@/modules/health/shell/checkers/dataset-checker.js';

import { makeSampleContext } from '../../fixtures/dataset.js';
import { makeFailingContextProvider, makeFakeContextProvider } from '../../fixtures/fakes.js';

describe('makeDatasetHealthChecker', () => {
  it('reports healthy once the dataset is loaded', async () => {
    const checker = makeDatasetHealthChecker(makeFakeContextProvider(makeSampleContext()));

    const result = await checker();

    expect(result.name).toBe('dataset');
    expect(result.status).toBe('healthy');
    expect(result.critical).toBe(true);
    expect(result.message).toBe('7 transactions through 2024-03-15');
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('reports the load error as a critical failure', async () => {
    const checker = makeDatasetHealthChecker(makeFailingContextProvider(), { name: 'csv' });

    const result = await checker();

    expect(result.name).toBe('csv');
    expect(result.status).toBe('unhealthy');
    expect(result.critical).toBe(true);
    expect(result.message).toBe('Required data file not found at /missing/transactions.csv');
  });
});
