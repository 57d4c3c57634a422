import { FastifyError, FastifyInstance } from 'fastify'
import { ErrorCode, isRenderableError, ServiceError } from '@internal/errors'

function isFastifyError(error: unknown): error is FastifyError {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number'
}

/**
 * The global error handler for all the uncaught exceptions within a request.
 * We try our best to display meaningful information to our users
 * and log any error that occurs
 * @param app
 */
export const setErrorHandler = (app: FastifyInstance) => {
  app.setErrorHandler<FastifyError | Error>(function (error, request, reply) {
    // it will be logged in the request log plugin
    request.executionError = error

    if (isFastifyError(error) && !isRenderableError(error)) {
      return reply.status(error.statusCode ?? 500).send({
        statusCode: `${error.statusCode}`,
        error: error.name,
        code: ErrorCode.InvalidRequest,
        message: error.message,
      })
    }

    // limit violations escaping a route render as 413, anything unknown as 500
    const renderable = isRenderableError(error) ? error : ServiceError.fromError(error)
    const renderedError = renderable.render()

    return reply.status(renderable.userStatusCode).send({
      ...renderedError,
      error: renderable.error || renderedError.code,
    })
  })
}
