import build from '../app'
import { getConfig } from '../config'
import { logger, logSchema } from '@internal/monitoring'
import { bindShutdownSignals } from './shutdown'

const shutdownController = new AbortController()

bindShutdownSignals(shutdownController)

main()
  .then(() => {
    logSchema.info(logger, '[Server] Started Successfully', {
      type: 'server',
    })
  })
  .catch((e) => {
    logSchema.error(logger, 'Server not started with error', {
      type: 'startupError',
      error: e,
    })
    process.exit(1)
  })

/**
 * Starts the upload guard HTTP server
 */
async function main() {
  const { requestTraceHeader, port, host } = getConfig()

  const app = build({
    logger,
    disableRequestLogging: true,
    requestIdHeader: requestTraceHeader,
  })

  app.server.once('close', () => {
    logSchema.info(logger, '[Server] Exited', {
      type: 'server',
    })
  })

  try {
    await app.listen({ port, host, signal: shutdownController.signal })
  } catch (err) {
    logSchema.error(logger, `Server failed to start`, {
      type: 'serverStartError',
      error: err,
    })
    throw err
  }
}
