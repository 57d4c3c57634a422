import { FastifyInstance } from 'fastify'
import { ROUTE_OPERATIONS } from '../operations'

export default async function routes(fastify: FastifyInstance) {
  fastify.get(
    '/',
    {
      config: {
        operation: { type: ROUTE_OPERATIONS.HEALTH },
      },
    },
    async (req, res) => {
      res.send({ healthy: true })
    }
  )
}
