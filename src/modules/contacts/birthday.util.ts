/**
 * Calendar-date arithmetic for birthdays.
 *
 * Dates are plain year/month/day triples with no time zone; month is 1-based.
 * Day arithmetic goes through UTC so DST never shifts a date.
 */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

/** Parses 'YYYY-MM-DD'; `null` for anything that is not a real calendar date. */
export const parseCalendarDate = (value: string): CalendarDate | null => {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  return { year, month, day };
};

export const formatCalendarDate = ({ year, month, day }: CalendarDate): string =>
  `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;

export const compareCalendarDates = (a: CalendarDate, b: CalendarDate): number =>
  a.year - b.year || a.month - b.month || a.day - b.day;

export const addDays = (date: CalendarDate, days: number): CalendarDate => {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
};

/** Today in the server's local time zone. */
export const today = (now: Date = new Date()): CalendarDate => ({
  year: now.getFullYear(),
  month: now.getMonth() + 1,
  day: now.getDate(),
});

const anniversaryIn = (birthday: CalendarDate, year: number): CalendarDate =>
  birthday.month === 2 && birthday.day === 29 && !isLeapYear(year)
    ? { year, month: 2, day: 28 }
    : { year, month: birthday.month, day: birthday.day };

/**
 * First anniversary of `birthday` on or after `reference`.
 * Feb 29 birthdays fall on Feb 28 in common years.
 */
export const nextOccurrence = (
  birthday: CalendarDate,
  reference: CalendarDate,
): CalendarDate => {
  const thisYear = anniversaryIn(birthday, reference.year);
  return compareCalendarDates(thisYear, reference) >= 0
    ? thisYear
    : anniversaryIn(birthday, reference.year + 1);
};

/**
 * Items whose next birthday falls within `[reference, reference + windowDays]`,
 * ordered by that date. Items sharing a date keep their input order.
 */
export const upcomingBirthdays = <T>(
  items: readonly T[],
  birthdayOf: (item: T) => CalendarDate,
  reference: CalendarDate,
  windowDays: number,
): T[] => {
  const end = addDays(reference, windowDays);

  return items
    .map((item) => ({ item, next: nextOccurrence(birthdayOf(item), reference) }))
    .filter(({ next }) => compareCalendarDates(next, end) <= 0)
    .sort((a, b) => compareCalendarDates(a.next, b.next))
    .map(({ item }) => item);
};
