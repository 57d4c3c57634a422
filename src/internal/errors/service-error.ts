import { ErrorCode, ERRORS } from './codes'
import { isLengthLimitExceeded } from './io-error'
import { RenderableError, ServiceErrorOptions } from './renderable'

/**
 * A generic error that should be always thrown for generic exceptions
 */
export class ServiceError extends Error implements RenderableError {
  httpStatusCode: number
  originalError: unknown
  userStatusCode: number
  code: ErrorCode
  error?: string

  constructor(options: ServiceErrorOptions) {
    super(options.message)
    this.code = options.code
    this.httpStatusCode = options.httpStatusCode
    this.userStatusCode = options.httpStatusCode
    this.message = options.message
    this.originalError = options.originalError
    this.error = options.error
    Object.setPrototypeOf(this, ServiceError.prototype)
  }

  /**
   * Maps a thrown value to a renderable error: limit violations become 413,
   * anything unknown a generic 500 that keeps the original for logging
   */
  static fromError(error?: unknown): ServiceError {
    if (error instanceof ServiceError) {
      return error
    }

    if (isLengthLimitExceeded(error)) {
      return ERRORS.EntityTooLarge(error instanceof Error ? error : undefined)
    }

    return new ServiceError({
      error: 'Internal',
      code: ErrorCode.InternalError,
      httpStatusCode: 500,
      message: 'Internal Server Error',
      originalError: error,
    })
  }

  render() {
    return {
      statusCode: this.httpStatusCode.toString(),
      code: this.code,
      error: this.code,
      message: this.message,
    }
  }

  getOriginalError() {
    return this.originalError
  }
}

/**
 * Determines if an error is a renderable error
 * @param error
 */
export function isRenderableError(error: unknown): error is RenderableError {
  return !!error && typeof error === 'object' && 'render' in error
}
