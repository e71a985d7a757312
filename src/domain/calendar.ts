const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAY_MS = 24 * 60 * 60 * 1000;

export function isCalendarDate(value: string): boolean {
  const match = value.match(CALENDAR_DATE);
  if (!match) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

/** UTC calendar date of an instant, as YYYY-MM-DD. */
export function toCalendarDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  const start = new Date(`${date}T00:00:00Z`).getTime();
  return toCalendarDate(new Date(start + days * DAY_MS));
}
