const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

/**
 * Parse a strict YYYY-MM-DD string into its parts.
 * Returns null for any other shape and for dates that do not exist
 * on the calendar (2023-02-29, 2024-13-01, 0000-01-01).
 */
export function parseIsoDate(value: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  if (year < 1) {
    return null;
  }

  // setUTCFullYear keeps years below 100 as-is, Date.UTC would shift them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Day of the anniversary in a given year. Feb 29 falls on Feb 28 when the
 * year has no leap day.
 */
function anniversaryUtc(year: number, month: number, day: number): number {
  const resolvedDay = month === 2 && day === 29 && !isLeapYear(year) ? 28 : day;
  return Date.UTC(year, month - 1, resolvedDay);
}

/**
 * Whole calendar days from `today` (local date) to the next anniversary of
 * month/day, 0 when the anniversary is today.
 */
export function daysUntilAnniversary(month: number, day: number, today: Date): number {
  const start = Date.UTC(today.getFullYear(), today.getMonth(), today.getDate());

  let next = anniversaryUtc(today.getFullYear(), month, day);
  if (start > next) {
    next = anniversaryUtc(today.getFullYear() + 1, month, day);
  }

  return Math.round((next - start) / MS_PER_DAY);
}
