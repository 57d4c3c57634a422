import { Readable } from 'node:stream'
import {
  AsyncRead,
  Cursor,
  IoError,
  IoErrorKind,
  IterableSource,
  limitBytes,
  pump,
  readToEnd,
} from '../index'

describe('pump', () => {
  test('reads in chunks of at most chunkSize until end of stream', async () => {
    const sizes: number[] = []

    const total = await pump(
      new Cursor('0123456789'),
      (chunk) => {
        sizes.push(chunk.length)
      },
      { chunkSize: 4 }
    )

    expect(total).toBe(10)
    expect(sizes).toEqual([4, 4, 2])
  })

  test('awaits asynchronous chunk handlers in order', async () => {
    const seen: string[] = []

    await pump(
      new Cursor('abcdef'),
      async (chunk) => {
        const text = Buffer.from(chunk).toString()
        await new Promise((resolve) => setImmediate(resolve))
        seen.push(text)
      },
      { chunkSize: 2 }
    )

    expect(seen).toEqual(['ab', 'cd', 'ef'])
  })

  test('rejects a chunk size below one', async () => {
    await expect(pump(new Cursor('abc'), () => undefined, { chunkSize: 0 })).rejects.toMatchObject({
      kind: IoErrorKind.InvalidInput,
    })
  })

  test('rejects a source reporting an impossible byte count', async () => {
    const source: AsyncRead = { read: () => -1 }

    await expect(pump(source, () => undefined)).rejects.toMatchObject({
      kind: IoErrorKind.InvalidData,
      message: 'source reported an invalid byte count: -1',
    })
  })

  test('stops when the signal is aborted', async () => {
    const controller = new AbortController()
    const reason = new Error('client went away')
    const output: Uint8Array[] = []

    const result = readToEnd(new Cursor('abcdef'), output, {
      chunkSize: 2,
      signal: controller.signal,
    })
    controller.abort(reason)

    const error = await result.catch((e: unknown) => e)
    expect(error).toBeInstanceOf(IoError)
    expect(error).toMatchObject({ kind: IoErrorKind.Other, cause: reason })
    expect(Buffer.concat(output).toString()).toBe('ab')
  })
})

describe('readToEnd', () => {
  test('keeps a copy of every chunk', async () => {
    const output: Uint8Array[] = []

    await readToEnd(new Cursor('abcdefgh'), output, { chunkSize: 3 })

    expect(output.map((c) => Buffer.from(c).toString())).toEqual(['abc', 'def', 'gh'])
  })

  test('keeps partial output when the limit is hit', async () => {
    const output: Uint8Array[] = []

    await expect(
      readToEnd(limitBytes(new Cursor('abcdefgh'), 5), output, { chunkSize: 3 })
    ).rejects.toBeInstanceOf(IoError)
    expect(output.map((c) => Buffer.from(c).toString())).toEqual(['abc', 'de'])
  })
})

describe('IterableSource', () => {
  test('serves the leftover of a large chunk on the next read', async () => {
    const source = new IterableSource(Readable.from([Buffer.from('hello'), Buffer.from('world')]))
    const buf = new Uint8Array(3)
    const reads: string[] = []

    for (;;) {
      const read = await source.read(buf)
      if (read === 0) break
      reads.push(Buffer.from(buf.subarray(0, read)).toString())
    }

    expect(reads).toEqual(['hel', 'lo', 'wor', 'ld'])
  })

  test('accepts string chunks', async () => {
    const output: Uint8Array[] = []

    await readToEnd(new IterableSource(Readable.from(['ab', 'cd'])), output)

    expect(Buffer.concat(output).toString()).toBe('abcd')
  })

  test('skips empty chunks', async () => {
    async function* chunks() {
      yield new Uint8Array(0)
      yield Buffer.from('x')
    }
    const output: Uint8Array[] = []

    await readToEnd(new IterableSource(chunks()), output)

    expect(Buffer.concat(output).toString()).toBe('x')
  })

  test('an empty buffer does not pull from the iterable', async () => {
    let pulled = 0
    async function* chunks() {
      pulled++
      yield Buffer.from('x')
    }

    await expect(new IterableSource(chunks()).read(new Uint8Array(0))).resolves.toBe(0)
    expect(pulled).toBe(0)
  })

  test('forwards errors from the iterable', async () => {
    const error = new Error('socket hang up')
    async function* chunks(): AsyncGenerator<Uint8Array> {
      yield Buffer.from('a')
      throw error
    }
    const output: Uint8Array[] = []

    await expect(readToEnd(new IterableSource(chunks()), output)).rejects.toBe(error)
    expect(Buffer.concat(output).toString()).toBe('a')
  })

  test('is limited like any other source', async () => {
    const output: Uint8Array[] = []
    const reader = limitBytes(new IterableSource(Readable.from(['abc', 'def'])), 6)

    await expect(readToEnd(reader, output)).rejects.toBeInstanceOf(IoError)
    expect(Buffer.concat(output).toString()).toBe('abcdef')
  })

  test('close stops the iterable and ends the stream', async () => {
    let finished = false
    async function* chunks() {
      try {
        yield Buffer.from('abc')
        yield Buffer.from('def')
      } finally {
        finished = true
      }
    }
    const source = new IterableSource(chunks())
    const buf = new Uint8Array(2)

    await expect(source.read(buf)).resolves.toBe(2)
    await source.close()

    expect(finished).toBe(true)
    await expect(source.read(buf)).resolves.toBe(0)
  })
})
