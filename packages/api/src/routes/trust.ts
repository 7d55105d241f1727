// POST /v1/trust/signal — score a transaction context and adjust rail weights

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseOrThrow } from '@halyard/core';
import type { HalyardEngine } from '@halyard/core';

const signalBodySchema = z.object(
  {
    context: z.unknown(),
    rail_weights: z.unknown().optional(),
    emit_audit: z.boolean({ invalid_type_error: 'must be a boolean' }).optional(),
    trace_id: z.string({ invalid_type_error: 'must be a string' }).min(1, 'must not be empty').optional(),
    seed: z.number({ invalid_type_error: 'must be a number' }).int('must be an integer').optional(),
    merchant_context: z.record(z.unknown(), { invalid_type_error: 'must be an object' }).optional(),
    cart_summary: z.record(z.unknown(), { invalid_type_error: 'must be an object' }).optional(),
  },
  { required_error: 'is required', invalid_type_error: 'must be an object' },
);

export async function registerTrustRoutes(
  server: FastifyInstance,
  engine: HalyardEngine,
): Promise<void> {
  server.post('/v1/trust/signal', async (request) => {
    const body = parseOrThrow(signalBodySchema, request.body, 'body');
    return engine.scoreTrust(body.context, body.rail_weights, {
      emitAudit: body.emit_audit,
      traceId: body.trace_id,
      seed: body.seed,
      merchantContext: body.merchant_context,
      cartSummary: body.cart_summary,
    });
  });
}
