/**
 * Insights Module - Error Definitions
 *
 * Operation errors carry a kind, a message for the end user and at least one
 * remediation hint for `invalid_input`.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interface
// ─────────────────────────────────────────────────────────────────────────────

export const INSIGHTS_ERROR_KINDS = {
  INVALID_INPUT: 'invalid_input',
  NO_DATA: 'no_data',
  COMPUTATION_ERROR: 'computation_error',
} as const;

export type InsightsErrorKind = (typeof INSIGHTS_ERROR_KINDS)[keyof typeof INSIGHTS_ERROR_KINDS];

export interface InsightsError {
  readonly kind: InsightsErrorKind;
  readonly message: string;
  readonly suggestions: readonly string[];
}

/** At least one entry */
export type Suggestions = readonly [string, ...string[]];

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

const createInsightsError = (
  kind: InsightsErrorKind,
  message: string,
  suggestions: readonly string[]
): InsightsError => ({ kind, message, suggestions });

export const invalidInputError = (message: string, suggestions: Suggestions): InsightsError =>
  createInsightsError(INSIGHTS_ERROR_KINDS.INVALID_INPUT, message, suggestions);

export const noDataError = (
  message: string,
  suggestions: readonly string[] = ['Try removing filters']
): InsightsError => createInsightsError(INSIGHTS_ERROR_KINDS.NO_DATA, message, suggestions);

export const computationError = (message: string): InsightsError =>
  createInsightsError(INSIGHTS_ERROR_KINDS.COMPUTATION_ERROR, message, [
    'Retry the request; if it keeps failing the dataset may contain unexpected values',
  ]);

// Specific constructors for common cases

/**
 * Unknown values for a closed vocabulary, e.g.
 * `invalidValuesError('category', 'categories', ['toys'], CATEGORIES)`.
 */
export const invalidValuesError = (
  singular: string,
  plural: string,
  invalid: readonly string[],
  valid: readonly string[]
): InsightsError =>
  invalidInputError(`Invalid ${invalid.length === 1 ? singular : plural}: ${invalid.join(', ')}`, [
    `Valid ${plural} are: ${valid.join(', ')}`,
  ]);

export const invalidDateError = (param: string, value: string, example: string): InsightsError =>
  invalidInputError(`Invalid ${param} format: ${value}. Use YYYY-MM-DD.`, [
    `Use format like '${example}'`,
  ]);

export const emptyGroupError = (operation: string): InsightsError =>
  computationError(`${operation} produced no groups for a non-empty working set`);
