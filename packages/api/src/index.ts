// Halyard HTTP API — process entry point

import { loadApiConfig } from './config.js';
import { buildServer } from './server.js';

async function main(): Promise<void> {
  const config = loadApiConfig();
  const { server, engine, registry } = await buildServer({ config });

  await server.listen({ port: config.port, host: config.host });
  console.log(`
⛵ Halyard API v0.1.0
  → Explainer:  ${engine.explainerName}
  → Providers:  ${registry.stats().total_providers} (${registry.stats().source})
  → Listening on http://${config.host}:${config.port}
`);
}

main().catch((err: unknown) => {
  console.error('[halyard] failed to start API:', err);
  process.exit(1);
});
