import type { AddressBook } from '../contacts/address-book.ts'
import {
  type CalendarDate,
  formatCalendarDate,
} from '../contacts/calendar-date.ts'
import { ContactRecord } from '../contacts/contact-record.ts'
import { NotFoundError } from '../contacts/errors.ts'
import { logBookEvent } from '../plumbing/book-log.ts'
import { UsageError } from './errors.ts'

export interface AssistantContext {
  book: AddressBook
  /** Reference day for the birthdays command */
  today: () => CalendarDate
  birthdayWindowDays: number
}

export type CommandHandler = (args: string[], context: AssistantContext) => string

/** Name words come first; the last `trailing` arguments are values */
const splitNameAndValues = (
  command: string,
  args: string[],
  trailing: number,
): { name: string; values: string[] } => {
  if (args.length < trailing + 1) {
    throw new UsageError(command)
  }
  return {
    name: args.slice(0, args.length - trailing).join(' ').trim(),
    values: args.slice(args.length - trailing),
  }
}

const requireRecord = (book: AddressBook, name: string): ContactRecord => {
  const lookup = book.find(name)
  if (!lookup.found) {
    throw new NotFoundError(`Contact '${name}' not found.`, 'contact')
  }
  return lookup.record
}

/**
 * Returns the named record, or builds a new one with `fill` applied and adds
 * it. The book only sees the new record once `fill` succeeded.
 */
const upsertRecord = (
  book: AddressBook,
  name: string,
  fill: (record: ContactRecord) => void,
): void => {
  const lookup = book.find(name)
  if (lookup.found) {
    fill(lookup.record)
    return
  }

  const record = new ContactRecord(name)
  fill(record)
  book.addRecord(record)
  logBookEvent({ event: 'contact_created', name: record.name })
}

export const addContact: CommandHandler = (args, { book }) => {
  const { name, values } = splitNameAndValues('add', args, 1)
  const [phone] = values
  upsertRecord(book, name, (record) => record.addPhone(phone))
  return `Contact '${name}' added with phone number ${phone}.`
}

export const changeContact: CommandHandler = (args, { book }) => {
  const { name, values } = splitNameAndValues('change', args, 2)
  const [oldPhone, newPhone] = values
  requireRecord(book, name).editPhone(oldPhone, newPhone)
  return `Contact '${name}' updated to phone number ${newPhone}.`
}

export const showPhone: CommandHandler = (args, { book }) => {
  const { name } = splitNameAndValues('phone', args, 0)
  const { phones } = requireRecord(book, name)
  if (phones.length === 0) {
    return `${name} has no phone numbers recorded.`
  }
  return `${name}'s phone number is ${phones.join('; ')}.`
}

export const removePhone: CommandHandler = (args, { book }) => {
  const { name, values } = splitNameAndValues('remove-phone', args, 1)
  const [phone] = values
  requireRecord(book, name).removePhone(phone)
  return `Phone number ${phone} removed from '${name}'.`
}

export const deleteContact: CommandHandler = (args, { book }) => {
  const { name } = splitNameAndValues('delete', args, 0)
  book.delete(name)
  logBookEvent({ event: 'contact_deleted', name })
  return `Contact '${name}' deleted.`
}

export const showAll: CommandHandler = (_args, { book }) => {
  if (book.size === 0) {
    return 'No contacts found.'
  }
  return ['All contacts:', ...book.records().map(String)].join('\n')
}

export const addBirthday: CommandHandler = (args, { book }) => {
  const { name, values } = splitNameAndValues('add-birthday', args, 1)
  const [birthday] = values
  upsertRecord(book, name, (record) => record.addBirthday(birthday))
  return `Added birthday ${birthday} for ${name}.`
}

export const showBirthday: CommandHandler = (args, { book }) => {
  const { name } = splitNameAndValues('show-birthday', args, 0)
  const { birthday } = requireRecord(book, name)
  if (!birthday) {
    return `${name} does not have a birthday recorded.`
  }
  return `${name}'s birthday is on ${birthday}.`
}

const describeWindow = (days: number): string =>
  days === 7 ? 'the next week' : `the next ${days} days`

export const upcomingBirthdays: CommandHandler = (
  _args,
  { book, today, birthdayWindowDays },
) => {
  const upcoming = book.getUpcomingBirthdays(today(), birthdayWindowDays)
  if (upcoming.length === 0) {
    return `No upcoming birthdays within ${describeWindow(birthdayWindowDays)}.`
  }
  return upcoming
    .map(({ name, date }) => `${name} - ${formatCalendarDate(date)}`)
    .join('\n')
}

export const HELP_TEXT = [
  'Available commands:',
  '- hello: Greet the bot.',
  '- add <name> <phone>: Add a contact, or another phone to an existing one.',
  "- change <name> <old_phone> <new_phone>: Change a contact's phone number.",
  '- phone <name>: Show the phone numbers of a contact.',
  '- remove-phone <name> <phone>: Remove a phone number from a contact.',
  '- delete <name>: Delete a contact.',
  '- all: Show all contacts.',
  '- add-birthday <name> <DD.MM.YYYY>: Add birthday for a contact.',
  '- show-birthday <name>: Show birthday of a contact.',
  '- birthdays: Show contacts with upcoming birthdays.',
  '- close or exit: Save and exit.',
  '- help: Show this help message.',
].join('\n')
