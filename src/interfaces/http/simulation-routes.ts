import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { EVENT_TYPES } from '../../domain/index.js';
import { InvalidQueryError } from '../../application/errors.js';
import { DEFAULT_CAUSALITY_DEPTH } from '../../application/event-service.js';

const MAX_CAUSALITY_DEPTH = 20;

type RawQuery = Record<string, string | string[] | undefined>;

/**
 * `?x=a&x=b` and `?x=a,b` both read as `['a', 'b']`.
 */
function listParam<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess((value) => {
    if (value === undefined) return undefined;
    const parts = Array.isArray(value) ? value : [value];
    return parts
      .flatMap((part) => String(part).split(','))
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
  }, z.array(item).optional());
}

// `?turn_start=` reads as absent rather than coercing to 0.
const blankAsAbsent = (value: unknown): unknown => (value === '' ? undefined : value);

const turnParam = z.preprocess(blankAsAbsent, z.coerce.number().int().min(0).optional());
const intParam = z.preprocess(blankAsAbsent, z.coerce.number().int().optional());
const timestampParam = z.preprocess(
  blankAsAbsent,
  z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }).optional(),
);

const eventsQuerySchema = z.object({
  event_types: listParam(z.enum(EVENT_TYPES)),
  agent_ids: listParam(z.string()),
  turn_start: turnParam,
  turn_end: turnParam,
  start_timestamp: timestampParam,
  end_timestamp: timestampParam,
  limit: intParam,
  offset: intParam,
});

const causalityQuerySchema = z.object({
  depth: z.preprocess(
    blankAsAbsent,
    z.coerce.number().int().min(1).max(MAX_CAUSALITY_DEPTH).default(DEFAULT_CAUSALITY_DEPTH),
  ),
});

/** `?event_types[]=ACTION` is read as `?event_types=ACTION`; both spellings may be mixed. */
function withoutArraySuffix(query: RawQuery): RawQuery {
  const normalized: RawQuery = {};
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    const name = key.endsWith('[]') ? key.slice(0, -2) : key;
    const existing = normalized[name];
    normalized[name] = existing === undefined ? value : [existing, value].flat();
  }
  return normalized;
}

type SimulationParams = { simulation_id: string };
type EventParams = { simulation_id: string; event_id: string };

function sendInvalid(reply: FastifyReply, error: z.ZodError | InvalidQueryError): FastifyReply {
  return reply.status(400).send({ error: 'Invalid query parameters', issues: error.issues });
}

/**
 * Read-only simulation event routes.
 *
 * GET /api/v1/simulations
 * GET /api/v1/simulations/:simulation_id/events
 * GET /api/v1/simulations/:simulation_id/events/:event_id
 * GET /api/v1/simulations/:simulation_id/causality/:event_id
 * GET /api/v1/simulations/:simulation_id/integrity
 */
async function simulationRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /api/v1/simulations ──────────────────────────────
  fastify.get('/api/v1/simulations', async (_request: FastifyRequest, reply: FastifyReply) => {
    const simulations = await fastify.eventService.listSimulations();
    return reply.status(200).send({ simulations });
  });

  // ── GET /api/v1/simulations/:simulation_id/events ────────
  fastify.get(
    '/api/v1/simulations/:simulation_id/events',
    async (
      request: FastifyRequest<{ Params: SimulationParams; Querystring: RawQuery }>,
      reply: FastifyReply,
    ) => {
      const parsed = eventsQuerySchema.safeParse(withoutArraySuffix(request.query));
      if (!parsed.success) return sendInvalid(reply, parsed.error);

      try {
        const page = await fastify.eventService.getFilteredEvents(
          request.params.simulation_id,
          parsed.data,
        );
        return reply.status(200).send(page);
      } catch (err: unknown) {
        if (err instanceof InvalidQueryError) return sendInvalid(reply, err);
        throw err;
      }
    },
  );

  // ── GET /api/v1/simulations/:simulation_id/events/:event_id
  fastify.get(
    '/api/v1/simulations/:simulation_id/events/:event_id',
    async (request: FastifyRequest<{ Params: EventParams }>, reply: FastifyReply) => {
      const { simulation_id, event_id } = request.params;
      const event = await fastify.eventService.getEventById(simulation_id, event_id);

      if (event === null) {
        return reply
          .status(404)
          .send({ error: `Event ${event_id} not found in simulation ${simulation_id}` });
      }
      return reply.status(200).send(event);
    },
  );

  // ── GET /api/v1/simulations/:simulation_id/causality/:event_id
  fastify.get(
    '/api/v1/simulations/:simulation_id/causality/:event_id',
    async (
      request: FastifyRequest<{ Params: EventParams; Querystring: RawQuery }>,
      reply: FastifyReply,
    ) => {
      const parsed = causalityQuerySchema.safeParse(request.query);
      if (!parsed.success) return sendInvalid(reply, parsed.error);

      const { simulation_id, event_id } = request.params;
      const chain = await fastify.eventService.getCausalityChain(
        simulation_id,
        event_id,
        parsed.data.depth,
      );

      if (chain === null) {
        return reply
          .status(404)
          .send({ error: `Event ${event_id} not found in simulation ${simulation_id}` });
      }
      return reply.status(200).send(chain);
    },
  );

  // ── GET /api/v1/simulations/:simulation_id/integrity ─────
  fastify.get(
    '/api/v1/simulations/:simulation_id/integrity',
    async (request: FastifyRequest<{ Params: SimulationParams }>, reply: FastifyReply) => {
      const report = await fastify.eventService.verifyCausality(request.params.simulation_id);
      return reply.status(200).send(report);
    },
  );
}

export default fp(simulationRoutes, {
  name: 'simulation-routes',
  dependencies: ['event-service'],
  fastify: '5.x',
});
