/**
 * UsageError
 * Thrown when a command is given fewer arguments than it needs
 */
export class UsageError extends Error {
  readonly code = 'USAGE_INVALID'

  constructor(
    readonly command: string,
    message = 'Not enough arguments provided.',
  ) {
    super(message)
    Object.setPrototypeOf(this, UsageError.prototype)
    this.name = 'UsageError'
  }
}
