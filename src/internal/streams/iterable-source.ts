import { AsyncRead } from './types'

type Chunk = Uint8Array | string

/**
 * Adapts an async iterable of chunks (a Node Readable, an IncomingMessage) into an AsyncRead.
 * Bytes of a chunk that do not fit in the caller's buffer are served on the next read.
 */
export class IterableSource implements AsyncRead {
  private readonly iterator: AsyncIterator<Chunk>
  private pending: Uint8Array = new Uint8Array(0)
  private done = false

  constructor(iterable: AsyncIterable<Chunk>) {
    this.iterator = iterable[Symbol.asyncIterator]()
  }

  async read(buf: Uint8Array): Promise<number> {
    if (buf.length === 0) {
      return 0
    }

    while (this.pending.length === 0) {
      if (this.done) {
        return 0
      }
      const next = await this.iterator.next()
      if (next.done) {
        this.done = true
        return 0
      }
      this.pending = typeof next.value === 'string' ? Buffer.from(next.value) : next.value
    }

    const take = Math.min(buf.length, this.pending.length)
    buf.set(this.pending.subarray(0, take))
    this.pending = this.pending.subarray(take)
    return take
  }

  /**
   * Stops iterating: buffered bytes are dropped and the iterator's `return()` runs.
   * Later reads report end of stream.
   */
  async close(): Promise<void> {
    if (this.done) {
      return
    }
    this.done = true
    this.pending = new Uint8Array(0)
    await this.iterator.return?.()
  }
}
