import { ErrorCode } from './codes'

export interface ServiceErrorOptions {
  code: ErrorCode
  httpStatusCode: number
  message: string
  originalError?: unknown
  error?: string
}

export type RenderedError = {
  statusCode: string
  code: ErrorCode
  error: string
  message: string
}

/**
 * A renderable error is a handled error
 *  that we want to display to our users
 */
export interface RenderableError {
  error?: string
  userStatusCode: number
  render(): RenderedError
  getOriginalError(): unknown
}
