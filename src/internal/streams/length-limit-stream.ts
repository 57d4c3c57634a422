import { Transform, TransformCallback } from 'stream'
import { LengthLimitExceeded } from '@internal/errors'
import { assertByteCount } from './length-limit'

/**
 * Transform form of the length limiter for pipeline() users.
 *
 * Passes through at most `maxBytes` bytes. Like the reader, the bound is exclusive:
 * a stream whose length equals the limit fails when it ends.
 */
export class LengthLimitTransformStream extends Transform {
  private remaining: number

  constructor(maxBytes: number) {
    super()
    assertByteCount(maxBytes)
    this.remaining = maxBytes
  }

  get bytesRemaining(): number {
    return this.remaining
  }

  _transform(chunk: Buffer, encoding: BufferEncoding, callback: TransformCallback) {
    if (this.remaining === 0) {
      callback(new LengthLimitExceeded().toIoError())
      return
    }

    if (chunk.length <= this.remaining) {
      this.remaining -= chunk.length
      callback(null, chunk)
      return
    }

    this.push(chunk.subarray(0, this.remaining))
    this.remaining = 0
    callback(new LengthLimitExceeded().toIoError())
  }

  _flush(callback: TransformCallback) {
    if (this.remaining === 0) {
      callback(new LengthLimitExceeded().toIoError())
      return
    }
    callback()
  }
}
