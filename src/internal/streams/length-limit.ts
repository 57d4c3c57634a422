import { IoError, IoErrorKind, LengthLimitExceeded } from '@internal/errors'
import { AsyncRead, isPromiseLike, MaybePromise } from './types'

/**
 * Length limiter for any {@link AsyncRead}.
 *
 * The number of bytes read will never be more than the provided limit. If the limit is
 * exactly the length of the wrapped source it is still considered an error: the read that
 * would report end of stream fails instead.
 *
 * Errors from the wrapped source are rethrown untouched. A limit violation is reported as an
 * {@link IoError} of kind `InvalidData` whose cause is {@link LengthLimitExceeded}.
 *
 * The limit check runs before the source is touched, so a read on an exhausted limiter throws
 * synchronously even when the wrapped source is asynchronous. Call `read` inside an async
 * function (or a `try` block), not only through `.then()`/`.catch()`.
 */
export class LengthLimit<T extends AsyncRead> implements AsyncRead {
  private remaining: number
  private released = false

  constructor(private readonly reader: T, maxBytes: number) {
    assertByteCount(maxBytes)
    this.remaining = maxBytes
  }

  /**
   * Number of additional bytes that may be read before the limit is reached
   */
  get bytesRemaining(): number {
    return this.remaining
  }

  getInner(): T {
    return this.reader
  }

  /**
   * Gives the wrapped source back where its cursor currently sits.
   * The remaining budget is forfeited and this limiter can no longer be read.
   */
  intoInner(): T {
    this.released = true
    return this.reader
  }

  read(buf: Uint8Array): MaybePromise<number> {
    if (this.released) {
      throw new IoError(IoErrorKind.Other, 'length limited reader was released')
    }

    const remaining = this.remaining
    if (remaining === 0) {
      throw new LengthLimitExceeded().toIoError()
    }

    const target = buf.length > remaining ? buf.subarray(0, remaining) : buf
    const result = this.reader.read(target)

    if (isPromiseLike(result)) {
      return result.then((read) => this.consume(remaining, target.length, read))
    }
    return this.consume(remaining, target.length, result)
  }

  private consume(remaining: number, requested: number, read: unknown): number {
    if (typeof read !== 'number' || !Number.isInteger(read) || read < 0 || read > requested) {
      throw new IoError(IoErrorKind.InvalidData, `source reported an invalid byte count: ${read}`)
    }
    this.remaining = remaining - read
    return read
  }
}

export function assertByteCount(bytes: number): void {
  if (!Number.isSafeInteger(bytes) || bytes < 0) {
    throw new IoError(
      IoErrorKind.InvalidInput,
      `byte limit must be a non-negative safe integer, got ${bytes}`
    )
  }
}
