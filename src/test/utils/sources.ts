import { AsyncRead } from '@internal/streams'

// repeating affine byte pattern, period 256
export function randBuf(size: number): Buffer {
  const b = Buffer.allocUnsafe(size)
  for (let i = 0; i < size; i++) b[i] = (i * 131 + 17) & 0xff
  return b
}

/**
 * Seeded mulberry32 generator so randomized cases repeat across runs
 */
export function seededRandom(seed: number) {
  let state = seed >>> 0
  const next = () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  return {
    next,
    /** integer in [min, max] */
    int(min: number, max: number) {
      return min + Math.floor(next() * (max - min + 1))
    },
    bytes(size: number) {
      const b = Buffer.allocUnsafe(size)
      for (let i = 0; i < size; i++) b[i] = Math.floor(next() * 256)
      return b
    },
  }
}

/**
 * Asynchronous source that hands out at most `maxChunk` bytes per read
 * and records the size of every buffer it was asked to fill
 */
export class ChunkedSource implements AsyncRead {
  readonly requested: number[] = []
  private pos = 0

  constructor(private readonly data: Uint8Array, private readonly maxChunk = 7) {}

  get position() {
    return this.pos
  }

  async read(buf: Uint8Array): Promise<number> {
    this.requested.push(buf.length)
    await new Promise((resolve) => setImmediate(resolve))

    const take = Math.min(buf.length, this.maxChunk, this.data.length - this.pos)
    buf.set(this.data.subarray(this.pos, this.pos + take))
    this.pos += take
    return take
  }
}

export class FailingSource implements AsyncRead {
  calls = 0

  constructor(private readonly error: Error, private readonly sync = false) {}

  read(): Promise<number> | number {
    this.calls++
    if (this.sync) {
      throw this.error
    }
    return Promise.reject(this.error)
  }
}
