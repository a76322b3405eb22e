import { describe, it, expect } from 'vitest';

import {
  CATEGORY_VOCABULARY,
  REGION_VOCABULARY,
  SEGMENT_VOCABULARY,
  validateDateOrder,
  validateIntegerRange,
  validateOptionalDate,
  validateOptionalMember,
  validateOptionalMembers,
} from '@/modules/insights/core/validation.js';

import { isoDate } from '../../fixtures/builders.js';

describe('validateOptionalMember', () => {
  it('treats blank values as absent', () => {
    expect(validateOptionalMember(undefined, REGION_VOCABULARY)._unsafeUnwrap()).toBeUndefined();
    expect(validateOptionalMember('   ', REGION_VOCABULARY)._unsafeUnwrap()).toBeUndefined();
  });

  it('trims surrounding whitespace', () => {
    expect(validateOptionalMember(' east ', REGION_VOCABULARY)._unsafeUnwrap()).toBe('east');
  });

  it('is case-sensitive and lists valid values', () => {
    expect(validateOptionalMember('North', REGION_VOCABULARY)._unsafeUnwrapErr()).toEqual({
      kind: 'invalid_input',
      message: 'Invalid region: North',
      suggestions: ['Valid regions are: east, north, south, west'],
    });
  });

  it('uses the vocabulary labels', () => {
    expect(
      validateOptionalMember('gold', SEGMENT_VOCABULARY)._unsafeUnwrapErr().message
    ).toBe('Invalid segment: gold');
  });
});

describe('validateOptionalMembers', () => {
  it('dedupes valid entries in first-seen order', () => {
    expect(
      validateOptionalMembers(['home', 'clothing', 'home'], CATEGORY_VOCABULARY)._unsafeUnwrap()
    ).toEqual(['home', 'clothing']);
  });

  it('treats an empty or blank list as absent', () => {
    expect(validateOptionalMembers([], CATEGORY_VOCABULARY)._unsafeUnwrap()).toBeUndefined();
    expect(validateOptionalMembers(['', ' '], CATEGORY_VOCABULARY)._unsafeUnwrap()).toBeUndefined();
  });

  it('names every invalid entry', () => {
    expect(
      validateOptionalMembers(['toys', 'home', 'games'], CATEGORY_VOCABULARY)._unsafeUnwrapErr()
    ).toEqual({
      kind: 'invalid_input',
      message: 'Invalid categories: toys, games',
      suggestions: ['Valid categories are: clothing, electronics, grocery, home, sports'],
    });
  });
});

describe('validateOptionalDate', () => {
  it('accepts strict ISO dates', () => {
    expect(validateOptionalDate('2024-02-29', 'start_date', '2024-01-01')._unsafeUnwrap()).toBe(
      '2024-02-29'
    );
  });

  it('rejects anything else with the parameter name', () => {
    expect(
      validateOptionalDate('01/02/2024', 'end_date', '2024-12-31')._unsafeUnwrapErr()
    ).toEqual({
      kind: 'invalid_input',
      message: 'Invalid end_date format: 01/02/2024. Use YYYY-MM-DD.',
      suggestions: ["Use format like '2024-12-31'"],
    });
  });
});

describe('validateDateOrder', () => {
  it('allows equal dates', () => {
    expect(validateDateOrder(isoDate('2024-01-01'), isoDate('2024-01-01')).isOk()).toBe(true);
  });

  it('rejects a start after the end', () => {
    expect(
      validateDateOrder(isoDate('2024-03-01'), isoDate('2024-02-01'))._unsafeUnwrapErr().message
    ).toBe('start_date 2024-03-01 is after end_date 2024-02-01');
  });
});

describe('validateIntegerRange', () => {
  it('accepts both bounds', () => {
    expect(validateIntegerRange(1, 'top_n', 1, 50)._unsafeUnwrap()).toBe(1);
    expect(validateIntegerRange(50, 'top_n', 1, 50)._unsafeUnwrap()).toBe(50);
  });

  it('rejects values outside the range', () => {
    expect(validateIntegerRange(51, 'top_n', 1, 50)._unsafeUnwrapErr()).toEqual({
      kind: 'invalid_input',
      message: 'top_n must be an integer between 1 and 50, got 51',
      suggestions: ['Use a value like 10 or 20'],
    });
  });
});
