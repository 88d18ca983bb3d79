const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function partsIn(at: Date, timeZone: string, options: Intl.DateTimeFormatOptions): Intl.DateTimeFormatPart[] {
  return new Intl.DateTimeFormat('en-CA', { timeZone, ...options }).formatToParts(at);
}

function pick(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
  return parts.find(p => p.type === type)?.value ?? '';
}

/** Calendar day (`YYYY-MM-DD`) of an instant as seen from `timeZone`. */
export function calendarDate(at: Date, timeZone: string): string {
  const parts = partsIn(at, timeZone, { year: 'numeric', month: '2-digit', day: '2-digit' });
  return `${pick(parts, 'year')}-${pick(parts, 'month')}-${pick(parts, 'day')}`;
}

/** Hour of day (0-23) of an instant in `timeZone`. */
export function hourOfDay(at: Date, timeZone: string): number {
  const parts = partsIn(at, timeZone, { hour: '2-digit', hourCycle: 'h23' });
  return Number(pick(parts, 'hour'));
}

export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return date.toISOString().slice(0, 10) === value;
}

export function shiftCalendarDate(date: string, days: number): string {
  const [y, m, d] = date.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d) + days * DAY_MS).toISOString().slice(0, 10);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
