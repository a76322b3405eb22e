import { describe, it, expect } from 'vitest';

import {
  compareIsoDates,
  endOfPreviousMonth,
  isWithin,
  monthKey,
  parseIsoDate,
  startOfMonth,
  startOfPreviousMonth,
} from '@/modules/dataset/core/dates.js';

import { isoDate } from '../../fixtures/builders.js';

describe('parseIsoDate', () => {
  it('accepts real calendar days', () => {
    expect(parseIsoDate('2024-01-31')).toBe('2024-01-31');
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29');
  });

  it('rejects impossible days', () => {
    expect(parseIsoDate('2024-02-30')).toBeNull();
    expect(parseIsoDate('2023-02-29')).toBeNull();
    expect(parseIsoDate('2024-13-01')).toBeNull();
    expect(parseIsoDate('2024-00-10')).toBeNull();
  });

  it('rejects other layouts', () => {
    expect(parseIsoDate('2024-1-5')).toBeNull();
    expect(parseIsoDate('05/01/2024')).toBeNull();
    expect(parseIsoDate('2024-01-05T00:00:00Z')).toBeNull();
    expect(parseIsoDate('')).toBeNull();
  });
});

describe('month helpers', () => {
  it('derives month boundaries', () => {
    const date = isoDate('2024-03-17');

    expect(monthKey(date)).toBe('2024-03');
    expect(startOfMonth(date)).toBe('2024-03-01');
    expect(startOfPreviousMonth(date)).toBe('2024-02-01');
    expect(endOfPreviousMonth(date)).toBe('2024-02-29');
  });

  it('crosses the year boundary', () => {
    const date = isoDate('2024-01-09');

    expect(startOfPreviousMonth(date)).toBe('2023-12-01');
    expect(endOfPreviousMonth(date)).toBe('2023-12-31');
  });
});

describe('compareIsoDates / isWithin', () => {
  it('orders dates', () => {
    expect(compareIsoDates(isoDate('2024-01-01'), isoDate('2024-01-02'))).toBe(-1);
    expect(compareIsoDates(isoDate('2024-01-02'), isoDate('2024-01-01'))).toBe(1);
    expect(compareIsoDates(isoDate('2024-01-01'), isoDate('2024-01-01'))).toBe(0);
  });

  it('includes both window ends', () => {
    const window = { start: isoDate('2024-02-01'), end: isoDate('2024-02-29') };

    expect(isWithin(isoDate('2024-02-01'), window)).toBe(true);
    expect(isWithin(isoDate('2024-02-29'), window)).toBe(true);
    expect(isWithin(isoDate('2024-03-01'), window)).toBe(false);
    expect(isWithin(isoDate('2024-01-31'), window)).toBe(false);
  });
});
