import { ErrorCode, OperationError } from './types.js'

export class FileOpError extends Error {
  readonly code: ErrorCode
  readonly path?: string

  constructor(code: ErrorCode, message: string, path?: string) {
    super(message)
    this.name = 'FileOpError'
    this.code = code
    this.path = path
  }

  toJSON(): OperationError {
    return this.path === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, path: this.path }
  }
}

const ERRNO_CODES: Record<string, ErrorCode> = {
  ENOENT: 'NotFound',
  ENOTDIR: 'NotFound',
  EACCES: 'PermissionDenied',
  EPERM: 'PermissionDenied',
  EROFS: 'PermissionDenied',
  EEXIST: 'NameConflict',
  ENOTEMPTY: 'NameConflict',
  EBUSY: 'InUse',
  ETXTBSY: 'InUse',
  EXDEV: 'CrossDeviceError',
}

function errnoOf(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return e.code
  }
  return undefined
}

export function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

/**
 * Map whatever fs-extra / node:fs threw onto the engine's taxonomy.
 * fs-extra reports some conditions only through the message text.
 */
export function toFileOpError(e: unknown, path?: string): FileOpError {
  if (e instanceof FileOpError) {
    return e.path === undefined && path !== undefined ? new FileOpError(e.code, e.message, path) : e
  }
  const msg = messageOf(e)
  const errno = errnoOf(e)
  if (errno && ERRNO_CODES[errno]) {
    return new FileOpError(ERRNO_CODES[errno], msg, path)
  }
  if (/already exists/i.test(msg)) return new FileOpError('NameConflict', msg, path)
  if (/subdirectory of itself|into itself/i.test(msg)) return new FileOpError('InvalidTarget', msg, path)
  return new FileOpError('IOError', msg, path)
}

export function cancelledError(path?: string): FileOpError {
  return new FileOpError('Cancelled', 'Operation cancelled', path)
}
