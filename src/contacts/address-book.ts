import {
  addDays,
  type CalendarDate,
  compareCalendarDates,
  onYear,
} from './calendar-date.ts'
import type { ContactRecord } from './contact-record.ts'
import { NotFoundError } from './errors.ts'
import type { Birthday } from './fields.ts'

export const DEFAULT_BIRTHDAY_WINDOW_DAYS = 7

export type RecordLookup =
  | { found: true; record: ContactRecord }
  | { found: false }

export interface UpcomingBirthday {
  name: string
  /** The day to congratulate on, in the reference year or the one after */
  date: CalendarDate
}

/**
 * The first occurrence of a birthday on or after the reference day.
 * A 29 February birthday falls on 28 February in non-leap years.
 */
export const nextBirthday = (
  birthday: Birthday,
  referenceDate: CalendarDate,
): CalendarDate => {
  const thisYear = onYear(birthday.value, referenceDate.year)
  if (compareCalendarDates(thisYear, referenceDate) >= 0) {
    return thisYear
  }
  return onYear(birthday.value, referenceDate.year + 1)
}

export class AddressBook {
  private readonly entries = new Map<string, ContactRecord>()

  get size(): number {
    return this.entries.size
  }

  /** Replaces any record already stored under the same name */
  addRecord(record: ContactRecord): void {
    this.entries.set(record.name, record)
  }

  find(name: string): RecordLookup {
    const record = this.entries.get(name)
    return record ? { found: true, record } : { found: false }
  }

  delete(name: string): void {
    if (!this.entries.delete(name)) {
      throw new NotFoundError(`Contact '${name}' not found.`, 'contact')
    }
  }

  names(): string[] {
    return [...this.entries.keys()]
  }

  records(): ContactRecord[] {
    return [...this.entries.values()]
  }

  /**
   * Contacts whose next birthday falls within `windowDays` days starting at
   * the reference day (both ends included), in insertion order.
   */
  getUpcomingBirthdays(
    referenceDate: CalendarDate,
    windowDays: number = DEFAULT_BIRTHDAY_WINDOW_DAYS,
  ): UpcomingBirthday[] {
    const lastDay = addDays(referenceDate, windowDays - 1)
    const upcoming: UpcomingBirthday[] = []

    for (const record of this.entries.values()) {
      if (!record.birthday) {
        continue
      }

      const date = nextBirthday(record.birthday, referenceDate)
      if (compareCalendarDates(date, lastDay) <= 0) {
        upcoming.push({ name: record.name, date })
      }
    }

    return upcoming
  }
}
