import { FastifyInstance } from 'fastify'
import uploadObject, { UploadRouteOptions } from './uploadObject'

export default async function routes(fastify: FastifyInstance, options: UploadRouteOptions) {
  fastify.register(uploadObject, {
    uploadSizeLimit: options.uploadSizeLimit,
    readChunkSize: options.readChunkSize,
  })
}

export type { UploadRouteOptions }
