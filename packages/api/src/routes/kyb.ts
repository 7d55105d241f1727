// POST /v1/kyb/verify  — run the five KYB rules and return the explained verdict
// POST /v1/kyb/summary — same evaluation, reported as text + status tally

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseOrThrow } from '@halyard/core';
import type { HalyardEngine } from '@halyard/core';

const verifyOptionsSchema = z.object(
  {
    emit_audit: z.boolean({ invalid_type_error: 'must be a boolean' }).optional(),
    trace_id: z.string({ invalid_type_error: 'must be a string' }).min(1, 'must not be empty').optional(),
  },
  { required_error: 'is required', invalid_type_error: 'must be an object' },
);

export async function registerKybRoutes(
  server: FastifyInstance,
  engine: HalyardEngine,
): Promise<void> {
  server.post('/v1/kyb/verify', async (request) => {
    const options = parseOrThrow(verifyOptionsSchema, request.body, 'body');
    return engine.verifyEntity(request.body, {
      emitAudit: options.emit_audit,
      traceId: options.trace_id,
    });
  });

  server.post('/v1/kyb/summary', async (request) => engine.summarizeEntity(request.body));
}
