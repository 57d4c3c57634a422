import { IoError, IoErrorKind } from '@internal/errors'
import { AsyncRead } from './types'

export const DEFAULT_CHUNK_SIZE = 64 * 1024

export interface PumpOptions {
  chunkSize?: number
  signal?: AbortSignal
}

/**
 * Reads from `reader` until it reports end of stream, handing every produced slice to `onChunk`.
 * The slice is a view over a reused scratch buffer, valid only until `onChunk` returns.
 * Resolves with the total number of bytes read.
 */
export async function pump(
  reader: AsyncRead,
  onChunk: (chunk: Uint8Array) => void | Promise<void>,
  options: PumpOptions = {}
): Promise<number> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
  if (!Number.isSafeInteger(chunkSize) || chunkSize < 1) {
    throw new IoError(
      IoErrorKind.InvalidInput,
      `chunk size must be a positive integer, got ${chunkSize}`
    )
  }

  const scratch = new Uint8Array(chunkSize)
  let total = 0

  for (;;) {
    throwIfAborted(options.signal)

    const read = await reader.read(scratch)
    if (!Number.isInteger(read) || read < 0 || read > scratch.length) {
      throw new IoError(IoErrorKind.InvalidData, `source reported an invalid byte count: ${read}`)
    }
    if (read === 0) {
      return total
    }

    total += read
    await onChunk(scratch.subarray(0, read))
  }
}

/**
 * Appends copies of every chunk read from `reader` to `output`.
 * On failure `output` keeps the bytes read before the error.
 */
export function readToEnd(
  reader: AsyncRead,
  output: Uint8Array[],
  options?: PumpOptions
): Promise<number> {
  return pump(
    reader,
    (chunk) => {
      output.push(chunk.slice())
    },
    options
  )
}

function throwIfAborted(signal?: AbortSignal) {
  if (!signal?.aborted) {
    return
  }
  const reason: unknown = signal.reason
  throw new IoError(IoErrorKind.Other, reason instanceof Error ? reason : 'read aborted')
}
