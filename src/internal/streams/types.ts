export type MaybePromise<T> = T | Promise<T>

/**
 * A byte source that fills a caller-supplied buffer.
 *
 * `read` writes at most `buf.length` bytes into `buf` and reports how many it wrote.
 * A count of `0` means end of stream. Implementations may answer synchronously or
 * suspend and resolve later, and fail by throwing or rejecting.
 */
export interface AsyncRead {
  read(buf: Uint8Array): MaybePromise<number>
}

export function isPromiseLike<T>(value: MaybePromise<T>): value is Promise<T> {
  return typeof value === 'object' && value !== null && 'then' in value
}
