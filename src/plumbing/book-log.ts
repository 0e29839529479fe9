/**
 * Address book audit logging.
 * Records what happened to the book, never phone numbers or birthdays.
 */

import { log } from './logger.ts'

export interface BookLoadedEvent {
  event: 'book_loaded'
  file: string
  contacts: number
  /** False when no file existed and an empty book was started */
  restored: boolean
}

export interface BookSavedEvent {
  event: 'book_saved'
  file: string
  contacts: number
}

export interface ContactCreatedEvent {
  event: 'contact_created'
  name: string
}

export interface ContactDeletedEvent {
  event: 'contact_deleted'
  name: string
}

export type BookEvent =
  | BookLoadedEvent
  | BookSavedEvent
  | ContactCreatedEvent
  | ContactDeletedEvent

export const logBookEvent = (event: BookEvent): void => {
  log({
    message: 'Address book event',
    book_event: event,
  })
}
