/**
 * StorageError
 * Thrown when the saved address book cannot be read back
 */
export class StorageError extends Error {
  readonly code = 'STORAGE_UNREADABLE'

  constructor(
    message: string,
    readonly file?: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message)
    Object.setPrototypeOf(this, StorageError.prototype)
    this.name = 'StorageError'
  }
}
