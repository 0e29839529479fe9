import { AddressBook } from '../contacts/address-book.ts'
import { ContactRecord } from '../contacts/contact-record.ts'
import { StorageError } from './errors.ts'
import {
  type AddressBookSnapshot,
  AddressBookSnapshotSchema,
  SNAPSHOT_VERSION,
} from './types/address-book-snapshot.ts'

export const toSnapshot = (book: AddressBook): AddressBookSnapshot => ({
  version: SNAPSHOT_VERSION,
  contacts: book.records().map((record) => ({
    name: record.name,
    phones: record.phones.map((phone) => phone.value),
    birthday: record.birthday ? record.birthday.toString() : null,
  })),
})

/**
 * Rebuilds a book from parsed JSON. Every field goes back through its
 * validating constructor, so a hand-edited file with a bad phone or a
 * repeated name is rejected here rather than stored.
 */
export const fromSnapshot = (data: unknown): AddressBook => {
  const parsed = AddressBookSnapshotSchema.safeParse(data)
  if (!parsed.success) {
    throw new StorageError('Saved address book has an unexpected shape', undefined, {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    })
  }

  const book = new AddressBook()
  for (const contact of parsed.data.contacts) {
    let record: ContactRecord
    try {
      record = new ContactRecord(contact.name)
      for (const phone of contact.phones) {
        record.addPhone(phone)
      }
      if (contact.birthday !== null) {
        record.addBirthday(contact.birthday)
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new StorageError(
        `Saved contact '${contact.name}' is invalid: ${reason}`,
      )
    }

    // names are compared after trimming, as the book keys them
    if (book.find(record.name).found) {
      throw new StorageError(
        `Saved contact '${record.name}' appears more than once`,
      )
    }
    book.addRecord(record)
  }

  return book
}
