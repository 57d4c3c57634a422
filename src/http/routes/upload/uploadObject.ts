import { createHash } from 'node:crypto'
import { FastifyInstance } from 'fastify'
import { ERRORS, isLengthLimitExceeded } from '@internal/errors'
import { logSchema } from '@internal/monitoring'
import { IterableSource, limitBytes, pump, toBytes } from '@internal/streams'
import { getConfig } from '../../../config'
import { ROUTE_OPERATIONS } from '../operations'

export interface UploadRouteOptions {
  /**
   * Exclusive upload limit in bytes, defaults to the configured limit
   */
  uploadSizeLimit?: number
  readChunkSize?: number
}

const successResponseSchema = {
  type: 'object',
  properties: {
    size: { type: 'number' },
    sha256: { type: 'string' },
  },
  required: ['size', 'sha256'],
} as const

export default async function routes(fastify: FastifyInstance, options: UploadRouteOptions) {
  const { uploadSizeLimit, uploadSizeLimitUnit, uploadReadChunkSize } = getConfig()

  const maxBytes = options.uploadSizeLimit ?? toBytes(uploadSizeLimit, uploadSizeLimitUnit)
  const chunkSize = options.readChunkSize ?? uploadReadChunkSize

  // the built-in parsers would consume these bodies before the guard sees them
  fastify.addContentTypeParser(
    ['application/json', 'text/plain'],
    function (request, payload, done) {
      done(null)
    }
  )

  fastify.post(
    '/',
    {
      schema: {
        response: {
          200: { description: 'Successful response', ...successResponseSchema },
          '4xx': { description: 'Error response', $ref: 'errorSchema#' },
        },
      },
      config: {
        operation: { type: ROUTE_OPERATIONS.UPLOAD },
      },
    },
    async (request, response) => {
      const hash = createHash('sha256')
      const source = new IterableSource(request.raw.iterator({ destroyOnReturn: false }))
      const reader = limitBytes(source, maxBytes)

      try {
        request.bytesRead = await pump(
          reader,
          (chunk) => {
            hash.update(chunk)
          },
          { chunkSize }
        )
      } catch (e) {
        await source.close()

        if (isLengthLimitExceeded(e)) {
          request.bytesRead = maxBytes - reader.bytesRemaining
          logSchema.warning(request.log, 'Upload rejected: length limit exceeded', {
            type: 'uploadLimit',
            bytesRead: request.bytesRead,
            limit: maxBytes,
          })
          response.header('Connection', 'close')
          throw ERRORS.EntityTooLarge(e instanceof Error ? e : undefined)
        }
        throw e
      }

      return response.status(200).send({
        size: request.bytesRead,
        sha256: hash.digest('hex'),
      })
    }
  )
}
