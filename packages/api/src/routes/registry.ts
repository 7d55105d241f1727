// GET /trust/providers            — allowlist contents + stats
// GET /trust/allowed/:providerId  — single allowlist lookup

import type { FastifyInstance } from 'fastify';
import type { ProviderRegistry } from '@halyard/core';

export async function registerRegistryRoutes(
  server: FastifyInstance,
  registry: ProviderRegistry,
): Promise<void> {
  server.get('/trust/providers', async () => {
    const providers = registry.listProviders();
    return { providers, count: providers.length, stats: registry.stats() };
  });

  server.get<{ Params: { providerId: string } }>(
    '/trust/allowed/:providerId',
    async (request) => registry.check(request.params.providerId),
  );
}
