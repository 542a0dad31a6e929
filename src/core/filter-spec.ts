/**
 * FilterSpec validation and slot matching
 *
 * Raw preferences (from stored user settings or commands) are validated with
 * Zod into a FilterSpec. The date horizon depends on "today", so the schema is
 * built per call.
 */

import { z } from 'zod';
import type { AppointmentSlot, FilterSpec, UserSettings } from '../types/index.js';
import { addDays, isCalendarDate, isTimeOfDay, toIsoDate } from '../utils/dates.js';
import { FilterValidationError } from '../utils/errors.js';

export const DEFAULT_DATE_HORIZON_DAYS = 180;

/**
 * Named time windows, inclusive start and end hour
 */
export const TIME_WINDOWS = {
  morning: { fromHour: 9, toHour: 12 },
  afternoon: { fromHour: 13, toHour: 16 },
  evening: { fromHour: 17, toHour: 19 },
} as const;

type TimeWindow = keyof typeof TIME_WINDOWS;

function isTimeWindow(token: string): token is TimeWindow {
  return Object.prototype.hasOwnProperty.call(TIME_WINDOWS, token);
}

const CENTER_PATTERN = /^[a-z0-9_-]+$/;

/**
 * Centre ids are lowercase letters, digits, `-` and `_`
 */
export function isCenterId(value: string): boolean {
  return CENTER_PATTERN.test(value);
}

const dateSchema = z.string().refine(isCalendarDate, { message: 'Must be a calendar date (YYYY-MM-DD)' });

const timeTokenSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((token) => token === 'any' || isTimeWindow(token) || isTimeOfDay(token), {
    message: 'Must be morning, afternoon, evening, any or HH:MM',
  });

export interface FilterSpecOptions {
  /** `YYYY-MM-DD`; defaults to the current UTC date */
  today?: string;
  horizonDays?: number;
}

function horizonEnd(options: FilterSpecOptions): string {
  const today = options.today ?? toIsoDate(new Date());
  return addDays(today, options.horizonDays ?? DEFAULT_DATE_HORIZON_DAYS);
}

/**
 * Start strictly before end, end no later than the horizon.
 */
export function createDateRangeSchema(options: FilterSpecOptions = {}) {
  const lastDate = horizonEnd(options);
  return z
    .object({ start: dateSchema, end: dateSchema })
    .superRefine((range, ctx) => {
      if (range.start >= range.end) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Start date must be before end date' });
      }
      if (range.end > lastDate) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `End date must be on or before ${lastDate}`,
        });
      }
    });
}

export function createFilterSpecSchema(options: FilterSpecOptions = {}) {
  return z.object({
    centers: z
      .array(
        z
          .string()
          .trim()
          .toLowerCase()
          .regex(CENTER_PATTERN, { message: 'Centre ids are letters, digits, - and _' })
      )
      .min(1, { message: 'At least one centre is required' })
      .transform((centers) => [...new Set(centers)]),
    dateRange: createDateRangeSchema(options).optional(),
    timePreferences: z.array(timeTokenSchema).default([]),
  });
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export type FilterValidation =
  | { valid: true; spec: FilterSpec }
  | { valid: false; issues: string[] };

export function validateFilterSpec(input: unknown, options: FilterSpecOptions = {}): FilterValidation {
  const result = createFilterSpecSchema(options).safeParse(input);
  if (!result.success) {
    return { valid: false, issues: formatIssues(result.error) };
  }
  return { valid: true, spec: result.data };
}

/**
 * @throws FilterValidationError listing every rejected field
 */
export function parseFilterSpec(input: unknown, options: FilterSpecOptions = {}): FilterSpec {
  const result = validateFilterSpec(input, options);
  if (!result.valid) {
    throw new FilterValidationError(result.issues);
  }
  return result.spec;
}

/**
 * Build a FilterSpec from stored user settings.
 *
 * @throws FilterValidationError
 */
export function filterSpecFromSettings(settings: UserSettings, options: FilterSpecOptions = {}): FilterSpec {
  return parseFilterSpec(
    {
      centers: settings.centers ?? [],
      dateRange: settings.dateRange,
      timePreferences: settings.timePreferences ?? [],
    },
    options
  );
}

/**
 * Parse a comma-separated preference string. Unknown tokens are dropped.
 *
 * @example parseTimePreferences('Morning, 14:30, noon') // ['morning', '14:30']
 */
export function parseTimePreferences(text: string): string[] {
  return text
    .split(',')
    .map((token) => token.trim().toLowerCase())
    .filter((token) => timeTokenSchema.safeParse(token).success);
}

export function matchesTimePreferences(time: string, preferences: readonly string[]): boolean {
  if (preferences.length === 0 || preferences.includes('any')) {
    return true;
  }
  const hour = Number(time.slice(0, 2));
  return preferences.some((token) => {
    if (isTimeWindow(token)) {
      const window = TIME_WINDOWS[token];
      return hour >= window.fromHour && hour <= window.toHour;
    }
    return token === time;
  });
}

/**
 * Whether a parsed slot satisfies the filter. Date bounds are inclusive.
 */
export function slotMatchesFilter(slot: AppointmentSlot, spec: FilterSpec): boolean {
  if (!spec.centers.includes(slot.center.toLowerCase())) {
    return false;
  }
  if (spec.dateRange && (slot.date < spec.dateRange.start || slot.date > spec.dateRange.end)) {
    return false;
  }
  return matchesTimePreferences(slot.time, spec.timePreferences);
}
