import fastify, { FastifyInstance, FastifyServerOptions } from 'fastify'
import { routes, schemas, plugins, setErrorHandler } from './http'
import { getConfig } from './config'

interface buildOpts extends FastifyServerOptions {
  /**
   * Exclusive upload limit in bytes, overrides the configured limit
   */
  uploadSizeLimit?: number
  readChunkSize?: number
}

const build = (opts: buildOpts = {}): FastifyInstance => {
  const { uploadSizeLimit, readChunkSize, ...serverOpts } = opts
  const { version } = getConfig()

  const app = fastify(serverOpts)

  // bodies are read by the routes themselves, through the length guard
  app.addContentTypeParser('*', function (request, payload, done) {
    done(null)
  })

  app.addSchema(schemas.errorSchema)

  app.register(plugins.logRequest({ excludeUrls: ['/status', '/health'] }))
  app.register(routes.upload, { prefix: 'upload', uploadSizeLimit, readChunkSize })
  app.register(routes.healthcheck, { prefix: 'health' })

  setErrorHandler(app)

  app.get('/version', (_, reply) => {
    reply.send(version)
  })
  app.get('/status', async (request, response) => response.status(200).send())

  return app
}

export default build
