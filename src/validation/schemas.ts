import { z } from 'zod';

import { isDateKey } from '../utils/dateUtilities';
import { ValidationError } from '../utils/errors';

import type { DashboardView, HealthSubmission } from '../types';

// Shortcuts sends numbers as text, sometimes with a decimal comma ("72,5")
const NUMERIC_TEXT = /^-?\d+(?:[.,]\d+)?$/;

function coerceNumericText(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (NUMERIC_TEXT.test(trimmed)) {
      return Number(trimmed.replace(',', '.'));
    }
  }
  return value;
}

function requiredNumber(field: string) {
  return z.preprocess(
    coerceNumericText,
    z
      .number({
        invalid_type_error: `${field} must be a number`,
        required_error: `${field} is required`,
      })
      .finite()
      .nonnegative(),
  );
}

function requiredCount(field: string) {
  return requiredNumber(field).transform((value) => Math.trunc(value));
}

const isBlank = (value: unknown): boolean =>
  value === null || (typeof value === 'string' && value.trim() === '');

// null and "" mean "not sent"
const FlightsClimbedSchema = z.preprocess(
  (value) => (isBlank(value) ? undefined : coerceNumericText(value)),
  z
    .number({ invalid_type_error: 'flights_climbed must be a number' })
    .finite()
    .nonnegative()
    .transform((value) => Math.trunc(value))
    .optional(),
);

// null, "" and any zero ("0", "0.0", "0,0") mean "not weighed today"
const WeightSchema = z.preprocess(
  (value) => {
    if (isBlank(value)) return undefined;
    const weight = coerceNumericText(value);
    return weight === 0 ? undefined : weight;
  },
  z.number({ invalid_type_error: 'weight must be a number' }).finite().positive().optional(),
);

export const SubmissionSchema = z.object({
  steps: requiredCount('steps'),
  kcals: requiredNumber('kcals'),
  km: requiredNumber('km'),
  flights_climbed: FlightsClimbedSchema,
  weight: WeightSchema,
});

const DateKeySchema = z.string().refine(isDateKey, { message: 'Expected an existing YYYY-MM-DD date' });

export const HealthDataQuerySchema = z.object({
  date: z
    .string()
    .refine((value) => value.toLowerCase() === 'today' || isDateKey(value), {
      message: "Expected 'today' or a YYYY-MM-DD date",
    })
    .optional(),
  date_start: DateKeySchema.optional(),
  date_end: DateKeySchema.optional(),
});

export const SummaryQuerySchema = z.object({
  period: z.enum(['week', 'month', 'year', 'all']).default('month'),
  group_by: z.enum(['day', 'week', 'month']).optional(),
  sort: z.enum(['date', 'steps', 'kcals', 'km', 'flights_climbed', 'weight']).default('date'),
  direction: z.enum(['asc', 'desc']).default('desc'),
  start: DateKeySchema.optional(),
  end: DateKeySchema.optional(),
});

export type HealthDataQuery = z.infer<typeof HealthDataQuerySchema>;

function describeIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate a raw submission body.
 *
 * @throws ValidationError listing every rejected field
 */
export function parseSubmission(body: unknown): HealthSubmission {
  const result = SubmissionSchema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(
      `Invalid submission: ${describeIssues(result.error.issues)}`,
      result.error.issues,
    );
  }

  const { flights_climbed, kcals, km, steps, weight } = result.data;
  return { flightsClimbed: flights_climbed, kcals, km, steps, weight };
}

/**
 * @throws ValidationError on malformed or nonexistent dates
 */
export function parseHealthDataQuery(query: unknown): HealthDataQuery {
  const result = HealthDataQuerySchema.safeParse(query);
  if (!result.success) {
    throw new ValidationError(
      `Invalid query: ${describeIssues(result.error.issues)}`,
      result.error.issues,
    );
  }
  return result.data;
}

/**
 * Translate summary query parameters into a partial dashboard view.
 *
 * @throws ValidationError on unknown options or malformed dates
 */
export function parseSummaryQuery(
  query: unknown,
): Omit<DashboardView, 'groupBy'> & { groupBy?: DashboardView['groupBy'] } {
  const result = SummaryQuerySchema.safeParse(query);
  if (!result.success) {
    throw new ValidationError(
      `Invalid query: ${describeIssues(result.error.issues)}`,
      result.error.issues,
    );
  }

  const { direction, end, group_by, period, sort, start } = result.data;
  return {
    groupBy: group_by,
    period,
    selection: start && end ? { end, start } : null,
    sort: { column: sort, direction },
  };
}
