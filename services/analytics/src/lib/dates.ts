// Calendar dates travel as ISO strings (YYYY-MM-DD), the shape drizzle
// returns for `date` columns in string mode. All arithmetic is in UTC.

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DateWindow {
  startDate: string;
  endDate: string;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function parseIsoDate(isoDate: string): number {
  return Date.parse(`${isoDate}T00:00:00.000Z`);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(parseIsoDate(isoDate) + days * DAY_MS));
}

/** ISO weekday: 1 = Monday … 7 = Sunday. */
export function isoWeekday(isoDate: string): number {
  const day = new Date(parseIsoDate(isoDate)).getUTCDay();
  return day === 0 ? 7 : day;
}

/** Inclusive window ending today and starting `days` before it. */
export function windowEndingAt(now: Date, days: number): DateWindow {
  const endDate = toIsoDate(now);
  return { startDate: addDays(endDate, -days), endDate };
}

export function eachDate(window: DateWindow): string[] {
  const dates: string[] = [];
  for (let d = window.startDate; d <= window.endDate; d = addDays(d, 1)) {
    dates.push(d);
  }
  return dates;
}
