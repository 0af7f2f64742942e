/**
 * Calendar-day helpers. Loan dates are ISO dates (YYYY-MM-DD) in UTC, so
 * they compare correctly as plain strings.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}
