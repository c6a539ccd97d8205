import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/** GET /health — liveness probe. */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'healthy' });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
