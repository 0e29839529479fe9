import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { AddressBook } from '../contacts/address-book.ts'
import { logBookEvent } from '../plumbing/book-log.ts'
import { StorageError } from './errors.ts'
import { fromSnapshot, toSnapshot } from './snapshot.ts'

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

/**
 * Load the book saved at filePath.
 * A missing file starts an empty book; an unreadable one is a StorageError.
 */
export const loadAddressBook = async (
  filePath: string,
): Promise<AddressBook> => {
  let contents: string
  try {
    contents = await readFile(filePath, 'utf-8')
  } catch (error) {
    if (isMissingFileError(error)) {
      logBookEvent({
        event: 'book_loaded',
        file: filePath,
        contacts: 0,
        restored: false,
      })
      return new AddressBook()
    }
    throw error
  }

  let data: unknown
  try {
    data = JSON.parse(contents)
  } catch {
    throw new StorageError('Saved address book is not valid JSON', filePath)
  }

  let book: AddressBook
  try {
    book = fromSnapshot(data)
  } catch (error) {
    if (error instanceof StorageError) {
      throw new StorageError(error.message, filePath, error.details)
    }
    throw error
  }

  logBookEvent({
    event: 'book_loaded',
    file: filePath,
    contacts: book.size,
    restored: true,
  })

  return book
}

export const saveAddressBook = async (
  book: AddressBook,
  filePath: string,
): Promise<void> => {
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(
    filePath,
    `${JSON.stringify(toSnapshot(book), null, 2)}\n`,
    'utf-8',
  )

  logBookEvent({ event: 'book_saved', file: filePath, contacts: book.size })
}
