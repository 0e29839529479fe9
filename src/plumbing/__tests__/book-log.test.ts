import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { logBookEvent } from '../book-log.ts'
import { log } from '../logger.ts'

const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
const originalEnv = process.env

beforeEach(() => {
  errorSpy.mockClear()
  process.env = { ...originalEnv, ADDRESS_BOOK_LOG_ENABLED: 'true' }
})

afterEach(() => {
  process.env = originalEnv
})

describe('log', () => {
  it('writes structured messages with app name and version to stderr', () => {
    log('hello')
    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy.mock.calls[0][0]).toEqual({
      message: 'hello',
      app: 'contact-assistant',
      version: '1.0.0',
    })
  })

  it('stays silent unless enabled', () => {
    process.env.ADDRESS_BOOK_LOG_ENABLED = 'false'
    log('hidden')
    delete process.env.ADDRESS_BOOK_LOG_ENABLED
    log('hidden too')
    expect(errorSpy).not.toHaveBeenCalled()
  })
})

describe('logBookEvent', () => {
  it('logs book_saved event', () => {
    logBookEvent({ event: 'book_saved', file: '/tmp/book.json', contacts: 3 })
    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy.mock.calls[0][0]).toMatchObject({
      message: 'Address book event',
      book_event: { event: 'book_saved', file: '/tmp/book.json', contacts: 3 },
    })
  })

  it('logs contact_deleted event', () => {
    logBookEvent({ event: 'contact_deleted', name: 'John' })
    expect(errorSpy.mock.calls[0][0].book_event).toEqual({
      event: 'contact_deleted',
      name: 'John',
    })
  })
})
