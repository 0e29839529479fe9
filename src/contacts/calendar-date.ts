/**
 * Timezone-free calendar dates.
 * Birthdays are days, not instants; Date objects only appear for day
 * arithmetic in UTC and for reading the local clock.
 */

export interface CalendarDate {
  year: number
  /** 1-12 */
  month: number
  /** 1-31 */
  day: number
}

const DATE_PATTERN = /^(\d{2})\.(\d{2})\.(\d{4})$/

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0

export const daysInMonth = (year: number, month: number): number => {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31
}

/**
 * Parses `DD.MM.YYYY`. Returns null when the text does not match the pattern
 * or names a day that does not exist (31.04, 29.02 outside leap years).
 */
export const parseCalendarDate = (raw: string): CalendarDate | null => {
  const match = DATE_PATTERN.exec(raw)
  if (!match) {
    return null
  }

  const day = Number(match[1])
  const month = Number(match[2])
  const year = Number(match[3])

  if (year < 1 || month < 1 || month > 12) {
    return null
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return null
  }

  return { year, month, day }
}

const pad = (value: number, width: number): string =>
  String(value).padStart(width, '0')

export const formatCalendarDate = (date: CalendarDate): string =>
  `${pad(date.day, 2)}.${pad(date.month, 2)}.${pad(date.year, 4)}`

/** Negative when a is earlier, zero when equal, positive when later */
export const compareCalendarDates = (
  a: CalendarDate,
  b: CalendarDate,
): number => a.year - b.year || a.month - b.month || a.day - b.day

export const addDays = (date: CalendarDate, days: number): CalendarDate => {
  // setUTCFullYear, unlike Date.UTC, keeps years below 100 as written
  const shifted = new Date(0)
  shifted.setUTCFullYear(date.year, date.month - 1, date.day + days)
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  }
}

/**
 * Moves a date's month and day onto another year.
 * 29 February lands on 28 February when the target year is not a leap year.
 */
export const onYear = (date: CalendarDate, year: number): CalendarDate => {
  const day = Math.min(date.day, daysInMonth(year, date.month))
  return { year, month: date.month, day }
}

/** The local calendar day of the given instant */
export const todayCalendarDate = (now: Date = new Date()): CalendarDate => ({
  year: now.getFullYear(),
  month: now.getMonth() + 1,
  day: now.getDate(),
})
