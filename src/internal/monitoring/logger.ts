import pino, { BaseLogger } from 'pino'
import { FastifyReply, FastifyRequest } from 'fastify'
import { URL } from 'node:url'
import { normalizeRawError } from '@internal/errors'
import { getConfig } from '../../config'

const { logLevel } = getConfig()

export const baseLogger = pino({
  serializers: {
    error(error: unknown) {
      return normalizeRawError(error)
    },
    res(reply: FastifyReply) {
      return {
        statusCode: reply.statusCode,
        headers: whitelistHeaders(reply.getHeaders()),
      }
    },
    req(request: FastifyRequest) {
      return {
        traceId: request.id,
        method: request.method,
        url: redactQueryParamFromRequest(request, ['token']),
        headers: whitelistHeaders(request.headers),
        hostname: request.hostname,
        remoteAddress: request.ip,
        remotePort: request.socket?.remotePort,
      }
    },
  },
  level: logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
})

export const logger = baseLogger.child({ service: 'upload-guard' })

export interface RequestLog {
  type: 'request'
  req: FastifyRequest
  res?: FastifyReply
  responseTime: number
  error?: Error | unknown
  operation?: string
  bytesRead?: number
}

interface ErrorLog {
  type: string
  error?: Error | unknown
}

interface InfoLog {
  type: string
  bytesRead?: number
  limit?: number
}

export const logSchema = {
  info: (logger: BaseLogger, message: string, log: InfoLog) => logger.info(log, message),
  warning: (logger: BaseLogger, message: string, log: InfoLog | ErrorLog) =>
    logger.warn(log, message),
  request: (logger: BaseLogger, message: string, log: RequestLog) => {
    if (!log.res) {
      logger.warn(log, message)
      return
    }

    const is4xxResponse = statusOfType(log.res.statusCode, 400)
    const is5xxResponse = statusOfType(log.res.statusCode, 500)

    const logLevel = is4xxResponse ? 'warn' : is5xxResponse ? 'error' : 'info'
    logger[logLevel](log, message)
  },
  error: (logger: BaseLogger, message: string, log: ErrorLog) => logger.error(log, message),
}

const whitelistHeaders = (headers: Record<string, unknown>) => {
  const responseMetadata: Record<string, unknown> = {}
  const allowlistedRequestHeaders = [
    'accept',
    'host',
    'user-agent',
    'x-forwarded-proto',
    'x-forwarded-host',
    'x-real-ip',
    'referer',
    'content-length',
    'content-type',
    'transfer-encoding',
  ]
  const allowlistedResponseHeaders = ['content-type', 'content-length', 'date', 'connection']
  Object.keys(headers)
    .filter(
      (header) =>
        allowlistedRequestHeaders.includes(header) || allowlistedResponseHeaders.includes(header)
    )
    .forEach((header) => {
      responseMetadata[header.replace(/-/g, '_')] = `${headers[header]}`
    })

  return responseMetadata
}

export function redactQueryParamFromRequest(req: FastifyRequest, params: string[]) {
  const lUrl = new URL(req.url, `${req.protocol}://${req.hostname}`)

  params.forEach((param) => {
    if (lUrl.searchParams.has(param)) {
      lUrl.searchParams.set(param, 'redacted')
    }
  })
  return `${lUrl.pathname}${lUrl.search}`
}

function statusOfType(statusCode: number, ofType: number) {
  return statusCode >= ofType && statusCode < ofType + 100
}
