/**
 * Calendar-day helpers. Dates are ISO days (YYYY-MM-DD) interpreted in UTC.
 */

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function addDays(date: string, days: number): string {
  const time = new Date(`${date}T00:00:00.000Z`).getTime() + days * DAY_MS;
  return new Date(time).toISOString().slice(0, 10);
}

export function isWeekday(date: string): boolean {
  const day = new Date(`${date}T00:00:00.000Z`).getUTCDay();
  return day !== 0 && day !== 6;
}

/**
 * Reduce a timestamp ("2025-03-31", "2025-03-31 16:00:00",
 * "2025-03-31T00:00:00.000Z") to its calendar day, or undefined if unparsable
 */
export function toIsoDate(timestamp: string): string | undefined {
  const day = timestamp.slice(0, 10);
  return isIsoDate(day) ? day : undefined;
}

/**
 * The `count` most recent days ending at `endDate`, oldest first.
 * With `weekdaysOnly`, weekends are skipped and still `count` days are returned.
 */
export function trailingDates(endDate: string, count: number, weekdaysOnly: boolean): string[] {
  const dates: string[] = [];
  let cursor = endDate;
  while (dates.length < count) {
    if (!weekdaysOnly || isWeekday(cursor)) {
      dates.push(cursor);
    }
    cursor = addDays(cursor, -1);
  }
  return dates.reverse();
}
