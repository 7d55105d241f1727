// POST /mcp/invoke — verb-dispatch bridge for agents that speak HTTP rather
// than MCP stdio. Verbs: getStatus, isAllowedProvider, verifyEntity, scoreTrust.

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseOrThrow } from '@halyard/core';
import type { HalyardEngine, ProviderRegistry } from '@halyard/core';

const invokeSchema = z.object(
  {
    verb: z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }),
    args: z.record(z.unknown(), { invalid_type_error: 'must be an object' }).default({}),
  },
  { required_error: 'is required', invalid_type_error: 'must be an object' },
);

const ok = (data: unknown) => ({ success: true, data, error: null });
const failure = (error: string) => ({ success: false, data: null, error });

export async function registerMcpRoutes(
  server: FastifyInstance,
  engine: HalyardEngine,
  registry: ProviderRegistry,
): Promise<void> {
  server.post('/mcp/invoke', async (request, reply) => {
    const { verb, args } = parseOrThrow(invokeSchema, request.body, 'body');

    switch (verb) {
      case 'getStatus':
        return ok({ ok: true, agent: 'halyard', explainer: engine.explainerName });

      case 'isAllowedProvider': {
        const providerId = args['provider_id'];
        if (typeof providerId !== 'string' || !providerId.trim()) {
          return reply.code(400).send(failure('provider_id parameter is required'));
        }
        return ok(registry.check(providerId));
      }

      case 'verifyEntity': {
        const payload = args['payload'];
        if (payload === undefined) {
          return reply.code(400).send(failure('payload parameter is required'));
        }
        return ok(await engine.verifyEntity(payload));
      }

      case 'scoreTrust': {
        const context = args['context'];
        if (context === undefined) {
          return reply.code(400).send(failure('context parameter is required'));
        }
        return ok(await engine.scoreTrust(context, args['rail_weights']));
      }

      default:
        return reply.code(400).send(failure(`Unknown verb: ${verb}`));
    }
  });
}
