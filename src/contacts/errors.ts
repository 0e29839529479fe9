/**
 * FormatError
 * Thrown when a name, phone number, or birthday fails its format rule
 */
export class FormatError extends Error {
  readonly code = 'FORMAT_INVALID'

  constructor(
    message: string,
    readonly field: 'name' | 'phone' | 'birthday',
  ) {
    super(message)
    Object.setPrototypeOf(this, FormatError.prototype)
    this.name = 'FormatError'
  }
}

/**
 * NotFoundError
 * Thrown when an operation needs a phone or contact that is not there.
 * A plain lookup reports absence through its result instead.
 */
export class NotFoundError extends Error {
  readonly code = 'NOT_FOUND'

  constructor(
    message: string,
    readonly resource: 'phone' | 'contact',
  ) {
    super(message)
    Object.setPrototypeOf(this, NotFoundError.prototype)
    this.name = 'NotFoundError'
  }
}
