const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

function parts(date: string): [number, number, number] {
  const [y, m, d] = date.split('-').map(Number);
  return [y, m, d];
}

// setUTCFullYear, unlike Date.UTC, does not map years 0-99 onto 1900-1999
function utcDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

function lastDayOf(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return utcDate(year, month, 0).getUTCDate();
}

function format(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const [y, m, d] = parts(value);
  return m >= 1 && m <= 12 && d >= 1 && d <= lastDayOf(y, m);
}

export function daysInMonth(date: string): number {
  const [y, m] = parts(date);
  return lastDayOf(y, m);
}

/**
 * Moves a date by whole calendar months. When the source day does not exist
 * in the target month it is clamped to that month's last day, so
 * 2024-01-31 + 1 month is 2024-02-29 and 2023-01-31 + 1 month is 2023-02-28.
 */
export function addMonths(date: string, months: number): string {
  const [y, m, d] = parts(date);
  const monthIndex = m - 1 + months;
  const year = y + Math.floor(monthIndex / 12);
  const month = (((monthIndex % 12) + 12) % 12) + 1;
  return format(year, month, Math.min(d, lastDayOf(year, month)));
}

export function addDays(date: string, days: number): string {
  const [y, m, d] = parts(date);
  const next = utcDate(y, m - 1, d + days);
  return format(next.getUTCFullYear(), next.getUTCMonth() + 1, next.getUTCDate());
}

/** e.g. `2024-01-15` -> `January 2024` */
export function monthLabel(date: string): string {
  const [y, m] = parts(date);
  return `${MONTH_NAMES[m - 1]} ${y}`;
}
