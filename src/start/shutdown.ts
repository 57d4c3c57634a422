import { logger, logSchema } from '@internal/monitoring'

/**
 * Binds shutdown handlers to the process
 * @param serverController aborted to stop the http server
 */
export function bindShutdownSignals(serverController: AbortController) {
  process.on('uncaughtException', (e) => {
    logSchema.error(logger, 'uncaught exception', {
      type: 'uncaughtException',
      error: e,
    })
    process.exit(1)
  })

  const onSignal = (signal: NodeJS.Signals) => {
    logSchema.info(logger, `[Server] Received ${signal}, shutting down`, {
      type: 'shutdown',
    })
    serverController.abort()
  }

  process.once('SIGTERM', onSignal)
  process.once('SIGINT', onSignal)
}
