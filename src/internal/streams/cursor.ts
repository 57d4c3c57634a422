import { AsyncRead } from './types'

/**
 * In-memory source over a byte array, answering every read synchronously
 */
export class Cursor implements AsyncRead {
  private readonly data: Uint8Array
  private pos = 0

  constructor(data: Uint8Array | string) {
    this.data = typeof data === 'string' ? Buffer.from(data) : data
  }

  get position(): number {
    return this.pos
  }

  get length(): number {
    return this.data.length
  }

  read(buf: Uint8Array): number {
    const take = Math.min(buf.length, this.data.length - this.pos)
    if (take <= 0) {
      return 0
    }
    buf.set(this.data.subarray(this.pos, this.pos + take))
    this.pos += take
    return take
  }
}
