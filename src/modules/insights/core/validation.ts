import { err, ok, type Result } from 'neverthrow';

import { invalidDateError, invalidInputError, invalidValuesError, type InsightsError } from './errors.js';
import {
  CATEGORIES,
  REGIONS,
  SEGMENTS,
  isMember,
  parseIsoDate,
  type Category,
  type IsoDate,
  type Region,
  type Segment,
} from '../../dataset/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Vocabularies
// ─────────────────────────────────────────────────────────────────────────────

export interface Vocabulary<T extends string> {
  readonly values: readonly T[];
  readonly singular: string;
  readonly plural: string;
}

export const CATEGORY_VOCABULARY: Vocabulary<Category> = {
  values: CATEGORIES,
  singular: 'category',
  plural: 'categories',
};

export const REGION_VOCABULARY: Vocabulary<Region> = {
  values: REGIONS,
  singular: 'region',
  plural: 'regions',
};

export const SEGMENT_VOCABULARY: Vocabulary<Segment> = {
  values: SEGMENTS,
  singular: 'segment',
  plural: 'segments',
};

// ─────────────────────────────────────────────────────────────────────────────
// Parameter Validators
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Empty or whitespace-only strings count as absent.
 */
export const optionalText = (value: string | undefined): string | undefined => {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
};

/**
 * Validates one optional value against a closed vocabulary.
 */
export const validateOptionalMember = <T extends string>(
  value: string | undefined,
  vocabulary: Vocabulary<T>
): Result<T | undefined, InsightsError> => {
  const text = optionalText(value);
  if (text === undefined) return ok(undefined);
  const { values, singular, plural } = vocabulary;
  return isMember(values, text)
    ? ok(text)
    : err(invalidValuesError(singular, plural, [text], values));
};

/**
 * Validates an optional allow-list. Blank entries are dropped; a list with
 * nothing left counts as absent. Every invalid entry is named in the error.
 */
export const validateOptionalMembers = <T extends string>(
  list: readonly string[] | undefined,
  vocabulary: Vocabulary<T>
): Result<T[] | undefined, InsightsError> => {
  const { values, singular, plural } = vocabulary;
  if (list === undefined) return ok(undefined);

  const entries = list
    .map((entry) => optionalText(entry))
    .filter((entry): entry is string => entry !== undefined);
  if (entries.length === 0) return ok(undefined);

  const valid: T[] = [];
  const invalid: string[] = [];
  for (const entry of entries) {
    if (isMember(values, entry)) {
      if (!valid.includes(entry)) valid.push(entry);
    } else if (!invalid.includes(entry)) {
      invalid.push(entry);
    }
  }

  return invalid.length > 0 ? err(invalidValuesError(singular, plural, invalid, values)) : ok(valid);
};

export const validateOptionalDate = (
  value: string | undefined,
  param: string,
  example: string
): Result<IsoDate | undefined, InsightsError> => {
  const text = optionalText(value);
  if (text === undefined) return ok(undefined);
  const date = parseIsoDate(text);
  return date === null ? err(invalidDateError(param, text, example)) : ok(date);
};

export const validateDateOrder = (
  start: IsoDate | undefined,
  end: IsoDate | undefined
): Result<void, InsightsError> => {
  if (start !== undefined && end !== undefined && start > end) {
    return err(
      invalidInputError(`start_date ${start} is after end_date ${end}`, [
        'Swap the dates or choose a start_date on or before end_date',
      ])
    );
  }
  return ok(undefined);
};

export const validateIntegerRange = (
  value: number,
  param: string,
  min: number,
  max: number
): Result<number, InsightsError> => {
  if (!Number.isInteger(value) || value < min || value > max) {
    return err(
      invalidInputError(
        `${param} must be an integer between ${String(min)} and ${String(max)}, got ${String(value)}`,
        ['Use a value like 10 or 20']
      )
    );
  }
  return ok(value);
};
