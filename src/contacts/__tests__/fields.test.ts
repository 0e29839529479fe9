import { describe, expect, it } from 'vitest'
import { FormatError } from '../errors.ts'
import { Birthday, Name, Phone } from '../fields.ts'

const today = { year: 2024, month: 6, day: 10 }

describe('Name', () => {
  it('should store the trimmed name', () => {
    expect(new Name('  John Smith ').value).toBe('John Smith')
    expect(String(new Name('Jane'))).toBe('Jane')
  })

  it('should reject blank names', () => {
    expect(() => new Name('')).toThrow(FormatError)
    expect(() => new Name('   ')).toThrow('Name can not be empty!')
  })
})

describe('Phone', () => {
  it('should accept exactly ten digits', () => {
    for (const raw of ['0501234567', '1234567890', '0000000000']) {
      const phone = new Phone(raw)
      expect(phone.value).toBe(raw)
      expect(phone.toString()).toBe(raw)
    }
  })

  it('should trim surrounding whitespace', () => {
    expect(new Phone(' 0501234567 ').value).toBe('0501234567')
  })

  it('should reject anything that is not ten digits', () => {
    const invalid = [
      '',
      '050123456',
      '05012345678',
      '050-123-4567',
      '+380501234',
      '050123456a',
      '050 1234567',
    ]
    for (const raw of invalid) {
      expect(() => new Phone(raw)).toThrow(FormatError)
    }
    expect(() => new Phone('123')).toThrow('Phone number must contain 10 digits')
  })

  it('should report validity without constructing', () => {
    expect(Phone.isValid('0501234567')).toBe(true)
    expect(Phone.isValid('050123456')).toBe(false)
  })

  it('should compare by exact string value', () => {
    expect(new Phone('0501234567').equals(new Phone('0501234567'))).toBe(true)
    expect(new Phone('0501234567').equals(new Phone('0501234568'))).toBe(false)
  })

  it('should edit in place', () => {
    const phone = new Phone('0501234567')
    phone.edit('0931112233')
    expect(phone.value).toBe('0931112233')
  })

  it('should keep the old value when an edit is invalid', () => {
    const phone = new Phone('0501234567')
    expect(() => phone.edit('12345')).toThrow(FormatError)
    expect(phone.value).toBe('0501234567')
  })
})

describe('Birthday', () => {
  it('should parse and render DD.MM.YYYY', () => {
    const birthday = new Birthday('15.06.1990', today)
    expect(birthday.value).toEqual({ year: 1990, month: 6, day: 15 })
    expect(birthday.toString()).toBe('15.06.1990')
  })

  it('should round-trip valid past dates', () => {
    for (const raw of ['01.01.2000', '29.02.2020', '31.12.1999', '10.06.2024']) {
      expect(new Birthday(raw, today).toString()).toBe(raw)
    }
  })

  it('should trim before parsing', () => {
    expect(new Birthday(' 15.06.1990 ', today).toString()).toBe('15.06.1990')
  })

  it('should reject other formats', () => {
    for (const raw of ['1990-06-15', '15/06/1990', '15.6.1990', '31.02.2000', 'soon']) {
      expect(() => new Birthday(raw, today)).toThrow(
        'Invalid date format. Use DD.MM.YYYY',
      )
    }
  })

  it('should reject dates after today', () => {
    expect(() => new Birthday('11.06.2024', today)).toThrow(
      'Birthday from the future is not allowed!',
    )
    const error = (() => {
      try {
        new Birthday('01.01.2030', today)
      } catch (caught) {
        return caught
      }
    })()
    expect(error).toBeInstanceOf(FormatError)
    expect(error).toMatchObject({ field: 'birthday', code: 'FORMAT_INVALID' })
  })

  it('should check against the current day by default', () => {
    expect(() => new Birthday('01.01.9999')).toThrow(FormatError)
    expect(new Birthday('01.01.1970').toString()).toBe('01.01.1970')
  })
})
