/**
 * Upcoming-birthday window: month/day matching that ignores the birth year.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * `MM-DD` keys for every calendar day in [today, today + days] (UTC).
 * When Feb 28 of a non-leap year is in the window, Feb 29 birthdays match too.
 */
export function upcomingMonthDays(today: Date, days: number): string[] {
  const start = Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate());
  const keys = new Set<string>();

  for (let offset = 0; offset <= days; offset++) {
    const day = new Date(start + offset * MS_PER_DAY);
    const month = day.getUTCMonth() + 1;
    const date = day.getUTCDate();
    keys.add(`${pad(month)}-${pad(date)}`);

    if (month === 2 && date === 28 && !isLeapYear(day.getUTCFullYear())) {
      keys.add('02-29');
    }
  }

  return [...keys];
}

/** `YYYY-MM-DD` → `MM-DD` */
export function monthDayOf(birthday: string): string {
  return birthday.slice(5, 10);
}

/** Today's date as `YYYY-MM-DD` (UTC) */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
