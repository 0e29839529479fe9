import { FormatError, NotFoundError } from '../contacts/errors.ts'
import { log } from '../plumbing/logger.ts'
import { UsageError } from './errors.ts'

/**
 * Wraps a command so that anything the user can fix by retyping
 * (bad format, unknown contact or phone, missing arguments) becomes the
 * reply. Other errors propagate.
 */
export const withInputErrors =
  <A extends unknown[]>(
    command: string,
    handler: (...args: A) => string,
  ): ((...args: A) => string) =>
  (...args) => {
    try {
      return handler(...args)
    } catch (error) {
      if (
        error instanceof FormatError ||
        error instanceof NotFoundError ||
        error instanceof UsageError
      ) {
        log({ message: 'Command rejected', command, error: error.code })
        return error.message
      }
      throw error
    }
  }
