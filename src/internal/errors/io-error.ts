/**
 * Classification of an {@link IoError}, mirroring the kinds a byte source can fail with.
 */
export enum IoErrorKind {
  InvalidData = 'InvalidData',
  InvalidInput = 'InvalidInput',
  UnexpectedEof = 'UnexpectedEof',
  Other = 'Other',
}

/**
 * Generic I/O failure raised by readers and read loops.
 * When built from another error, that error is kept as `cause` for programmatic inspection.
 */
export class IoError extends Error {
  readonly kind: IoErrorKind
  override readonly cause?: unknown

  constructor(kind: IoErrorKind, error: Error | string) {
    const message = typeof error === 'string' ? error : error.message
    super(message, typeof error === 'string' ? undefined : { cause: error })
    this.name = 'IoError'
    this.kind = kind
    if (typeof error !== 'string') this.cause = error
    Object.setPrototypeOf(this, IoError.prototype)
  }
}

/**
 * Marker raised when a length-limited read meets or exceeds its limit.
 *
 * Carries no byte count or position: the caller already knows the limit it configured.
 */
export class LengthLimitExceeded extends Error {
  constructor() {
    super('Length limit exceeded')
    this.name = 'LengthLimitExceeded'
    Object.setPrototypeOf(this, LengthLimitExceeded.prototype)
  }

  toIoError(): IoError {
    return new IoError(IoErrorKind.InvalidData, this)
  }
}

export function isIoError(error: unknown): error is IoError {
  return error instanceof IoError
}

/**
 * Determines if an error is a length-limit violation,
 * either the bare marker or an I/O error wrapping it
 * @param error
 */
export function isLengthLimitExceeded(error: unknown): boolean {
  if (error instanceof LengthLimitExceeded) {
    return true
  }
  return isIoError(error) && error.cause instanceof LengthLimitExceeded
}
