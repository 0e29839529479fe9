import {
  type CalendarDate,
  compareCalendarDates,
  formatCalendarDate,
  parseCalendarDate,
  todayCalendarDate,
} from './calendar-date.ts'
import { FormatError } from './errors.ts'

const PHONE_PATTERN = /^\d{10}$/

export class Name {
  readonly value: string

  constructor(raw: string) {
    const value = raw.trim()
    if (value.length === 0) {
      throw new FormatError('Name can not be empty!', 'name')
    }
    this.value = value
  }

  toString(): string {
    return this.value
  }
}

export class Phone {
  private current: string

  constructor(raw: string) {
    this.current = Phone.normalize(raw)
  }

  static isValid(raw: string): boolean {
    return PHONE_PATTERN.test(raw.trim())
  }

  private static normalize(raw: string): string {
    if (!Phone.isValid(raw)) {
      throw new FormatError('Phone number must contain 10 digits', 'phone')
    }
    return raw.trim()
  }

  get value(): string {
    return this.current
  }

  /** Exact string comparison; 0501234567 and 501234567 are different phones */
  equals(other: Phone): boolean {
    return this.current === other.current
  }

  /** Replaces the number in place; on a FormatError the old number stays */
  edit(raw: string): void {
    this.current = Phone.normalize(raw)
  }

  toString(): string {
    return this.current
  }
}

export class Birthday {
  readonly value: CalendarDate

  /**
   * @param today - the day a birthday may not be later than; the local
   * current day unless given
   */
  constructor(raw: string, today: CalendarDate = todayCalendarDate()) {
    const date = parseCalendarDate(raw.trim())
    if (!date) {
      throw new FormatError('Invalid date format. Use DD.MM.YYYY', 'birthday')
    }
    if (compareCalendarDates(date, today) > 0) {
      throw new FormatError('Birthday from the future is not allowed!', 'birthday')
    }
    this.value = date
  }

  toString(): string {
    return formatCalendarDate(this.value)
  }
}
