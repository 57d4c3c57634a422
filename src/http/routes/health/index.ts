import { FastifyInstance } from 'fastify'
import healthcheck from './healthcheck'

export default async function routes(fastify: FastifyInstance) {
  fastify.register(healthcheck)
}
