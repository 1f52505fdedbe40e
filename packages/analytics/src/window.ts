export const TIME_WINDOWS = ['today', 'this-week', 'this-month', 'all-time'] as const;
export type TimeWindow = (typeof TIME_WINDOWS)[number];

const WINDOW_ALIASES: Record<string, TimeWindow> = {
  today: 'today',
  day: 'today',
  thisweek: 'this-week',
  week: 'this-week',
  thismonth: 'this-month',
  month: 'this-month',
  alltime: 'all-time',
  all: 'all-time',
};

/** Map user input (`Today`, `This Week`, `this_month`, ...) to a window; unknown values mean all-time */
export function resolveWindow(value: string | null | undefined): TimeWindow {
  const key = (value ?? '').toLowerCase().replace(/[\s_-]+/g, '');
  return WINDOW_ALIASES[key] ?? 'all-time';
}

/** Local start of the window containing `now`, or null for all-time. Weeks start on Monday. */
export function windowStart(window: TimeWindow, now: Date = new Date()): Date | null {
  const y = now.getFullYear();
  const m = now.getMonth();
  const d = now.getDate();

  switch (window) {
    case 'today':
      return new Date(y, m, d);
    case 'this-week':
      return new Date(y, m, d - ((now.getDay() + 6) % 7));
    case 'this-month':
      return new Date(y, m, 1);
    default:
      return null;
  }
}

const LOCAL_ISO = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([ap]m)?)?$/i;
const EPOCH = /^\d{9,13}(?:\.\d+)?$/;

const localDate = (y: number, mo: number, d: number, h = 0, mi = 0, s = 0): Date | null => {
  const date = new Date(y, mo - 1, d, h, mi, s);
  // reject rollovers such as 2024-02-31
  if (date.getFullYear() !== y || date.getMonth() !== mo - 1 || date.getDate() !== d) return null;
  if (h > 23 || mi > 59 || s > 59) return null;
  return date;
};

const fromEpoch = (n: number): Date | null => {
  const date = new Date(n >= 1e12 ? n : n * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
};

/**
 * Parse a call date. Zone-less forms (`2024-05-01 14:30`, `05/01/2024 2:30 PM`)
 * are read as local time; strings with an offset or `Z` keep their zone;
 * 9-13 digit numbers are epoch seconds or milliseconds.
 */
export function parseCallDate(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'number') return Number.isFinite(value) ? fromEpoch(value) : null;
  if (typeof value !== 'string') return null;

  const raw = value.trim();
  if (!raw) return null;

  if (EPOCH.test(raw)) return fromEpoch(Number(raw));

  const iso = LOCAL_ISO.exec(raw);
  if (iso) {
    const [, y, mo, d, h, mi, s] = iso;
    return localDate(Number(y), Number(mo), Number(d), Number(h ?? 0), Number(mi ?? 0), Number(s ?? 0));
  }

  const us = US_DATE.exec(raw);
  if (us) {
    const [, mo, d, y, h, mi, s, meridiem] = us;
    let hour = Number(h ?? 0);
    if (meridiem) {
      if (hour < 1 || hour > 12) return null;
      hour = (hour % 12) + (meridiem.toLowerCase() === 'pm' ? 12 : 0);
    }
    return localDate(Number(y), Number(mo), Number(d), hour, Number(mi ?? 0), Number(s ?? 0));
  }

  const parsed = Date.parse(raw);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

/**
 * Keep the records dated on or after the start of `window`.
 *
 * Records with unparseable dates only appear under all-time. If no record in
 * a non-empty set has a usable date, the set is returned unfiltered.
 */
export function filterByWindow<T extends { date: unknown }>(
  records: readonly T[],
  window: TimeWindow | string,
  now: Date = new Date(),
): T[] {
  const start = windowStart(resolveWindow(window), now);
  if (start === null) return [...records];

  const dated = records.map((record) => ({ record, at: parseCallDate(record.date) }));
  if (dated.length > 0 && dated.every((d) => d.at === null)) return [...records];

  return dated
    .filter((d) => d.at !== null && d.at.getTime() >= start.getTime())
    .map((d) => d.record);
}
