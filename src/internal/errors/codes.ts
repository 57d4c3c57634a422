import { ServiceError } from './service-error'

export enum ErrorCode {
  InvalidRequest = 'InvalidRequest',
  EntityTooLarge = 'EntityTooLarge',
  InternalError = 'InternalError',
}

export const ERRORS = {
  EntityTooLarge: (e?: Error, entity = 'upload') =>
    new ServiceError({
      error: 'Payload too large',
      code: ErrorCode.EntityTooLarge,
      httpStatusCode: 413,
      message: `The ${entity} exceeded the maximum allowed size`,
      originalError: e,
    }),
}

export function isServiceError(errorType: ErrorCode, error: unknown): error is ServiceError {
  return error instanceof ServiceError && error.code === errorType
}

export function normalizeRawError(error: unknown) {
  if (error instanceof Error) {
    return {
      raw: JSON.stringify(error),
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  try {
    return {
      raw: JSON.stringify(error),
    }
  } catch (e) {
    return {
      raw: 'Failed to stringify error',
    }
  }
}
