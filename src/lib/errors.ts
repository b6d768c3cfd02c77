export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** The database could not be reached or stopped answering while importing a file. */
export class StorageError extends Error {
  readonly filename: string

  constructor(filename: string, cause: unknown) {
    super(`Storage unavailable while importing ${filename}: ${errorMessage(cause)}`, { cause })
    this.name = 'StorageError'
    this.filename = filename
  }
}

// SQLSTATE classes 08 (connection exception), 53 (insufficient resources),
// 57P (operator intervention) and socket-level failures.
const STORAGE_CODES = /^(08|53|57P)|^(ECONNREFUSED|ECONNRESET|ETIMEDOUT|EPIPE|ENOTFOUND)$/

function codeOf(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return null
}

/** True when the error means the store itself is unavailable, not that one row was rejected. */
export function isStorageFailure(err: unknown): boolean {
  const code = codeOf(err)
  if (code !== null && STORAGE_CODES.test(code)) return true
  if (err instanceof Error && err.cause !== undefined && err.cause !== err) {
    return isStorageFailure(err.cause)
  }
  if (err instanceof Error && /Connection terminated|connection is closed/i.test(err.message)) {
    return true
  }
  return false
}
