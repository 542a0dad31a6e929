/**
 * Calendar-date helpers. Dates are `YYYY-MM-DD` strings in UTC, which
 * compare correctly as plain strings.
 */

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

const DAY_MS = 24 * 60 * 60 * 1000;

export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function isTimeOfDay(value: string): boolean {
  return TIME_PATTERN.test(value);
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
  const base = new Date(`${isoDate}T00:00:00Z`).getTime();
  return toIsoDate(new Date(base + days * DAY_MS));
}

/**
 * Start of the UTC day containing `timestamp`, in epoch milliseconds
 */
export function startOfUtcDay(timestamp: number): number {
  return timestamp - (timestamp % DAY_MS);
}

export { DAY_MS };
