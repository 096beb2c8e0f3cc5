// Calendar helpers on local time. All return midnight of the resulting day.

export function dateOnly(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

export function addDays(d: Date, days: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + days);
}

/** Days since Monday, 0 for Monday ... 6 for Sunday. */
export function weekdayIndex(d: Date): number {
  return (d.getDay() + 6) % 7;
}

export function mondayOf(d: Date): Date {
  return addDays(d, -weekdayIndex(d));
}

export function daysInMonth(year: number, monthIndex: number): number {
  return new Date(year, monthIndex + 1, 0).getDate();
}

/** Steps back whole months, keeping the day where the target month has it. */
export function monthsBack(d: Date, months: number): Date {
  let year = d.getFullYear();
  let month = d.getMonth();
  for (let i = 0; i < months; i++) {
    if (month === 0) {
      month = 11;
      year -= 1;
    } else {
      month -= 1;
    }
  }
  return new Date(year, month, Math.min(d.getDate(), daysInMonth(year, month)));
}

export function startOfMonth(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), 1);
}

/** Midnight of the given day; years below 100 are taken literally. */
export function calendarDate(year: number, monthIndex: number, day: number): Date {
  const d = new Date(0);
  d.setFullYear(year, monthIndex, day);
  d.setHours(0, 0, 0, 0);
  return d;
}

/** 0001-01-01, earlier than any snapshot. */
export function minDate(): Date {
  return calendarDate(1, 0, 1);
}
