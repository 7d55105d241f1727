// Halyard HTTP API — Fastify adapter over HalyardEngine + ProviderRegistry.
// Built by a factory so tests can drive it with `inject` without listening.

import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import {
  HalyardEngine,
  InternalError,
  ProviderRegistry,
  ValidationError,
  createOpenAIExplainer,
} from '@halyard/core';
import type { ApiConfig, Env } from './config.js';
import { registerKybRoutes } from './routes/kyb.js';
import { registerMcpRoutes } from './routes/mcp.js';
import { registerRegistryRoutes } from './routes/registry.js';
import { registerTrustRoutes } from './routes/trust.js';

export const API_VERSION = '0.1.0';

export interface BuildServerOptions {
  config: ApiConfig;
  /** Defaults to an engine with the env-configured explainer and the server's logger */
  engine?: HalyardEngine;
  /** Defaults to a registry loaded from `config.registryConfigPath` */
  registry?: ProviderRegistry;
  env?: Env;
}

export interface HalyardServer {
  server: FastifyInstance;
  engine: HalyardEngine;
  registry: ProviderRegistry;
}

export async function buildServer(options: BuildServerOptions): Promise<HalyardServer> {
  const { config } = options;
  const env = options.env ?? process.env;

  // trustProxy: false — rate limiting keys on the raw socket IP
  const server = Fastify({
    logger: env['NODE_ENV'] !== 'test',
    trustProxy: false,
  });

  const engine =
    options.engine ??
    new HalyardEngine({ explainer: createOpenAIExplainer(env), logger: server.log });
  const registry =
    options.registry ??
    new ProviderRegistry({ configPath: config.registryConfigPath, logger: server.log });

  // ── Rate limiting ───────────────────────────────────────────────────────────
  await server.register(rateLimit, {
    global: true,
    max: config.rateLimitMax,
    timeWindow: '1 minute',
    errorResponseBuilder: (_req, context) => ({
      statusCode: 429,
      error: 'rate_limit_exceeded',
      message: `Rate limit exceeded, retry in ${Math.ceil(context.ttl / 1000)}s`,
      limit: context.max,
      retry_after_seconds: Math.ceil(context.ttl / 1000),
    }),
  });

  // ── Security headers ────────────────────────────────────────────────────────
  server.addHook('onSend', (_req, reply, _payload, done) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    reply.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    reply.header('Referrer-Policy', 'no-referrer');
    done();
  });

  // ── CORS ────────────────────────────────────────────────────────────────────
  await server.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  // ── Errors ──────────────────────────────────────────────────────────────────
  server.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.code(400).send({
        error: error.code,
        field: error.field,
        message: error.message,
      });
    }
    if (error instanceof InternalError) {
      request.log.error({ err: error }, 'internal error');
      return reply.code(500).send({ error: error.code, message: error.message });
    }
    // The rate limiter throws its builder's plain object, so the status has to
    // be set here rather than left to the default handler.
    return reply.code(typeof error.statusCode === 'number' ? error.statusCode : 500).send(error);
  });

  // ── Routes ──────────────────────────────────────────────────────────────────
  server.get('/health', async () => ({
    status: 'ok',
    version: API_VERSION,
    explainer: engine.explainerName,
    providers: registry.stats().total_providers,
    uptime_seconds: process.uptime(),
  }));

  await registerKybRoutes(server, engine);
  await registerTrustRoutes(server, engine);
  await registerRegistryRoutes(server, registry);
  await registerMcpRoutes(server, engine, registry);

  return { server, engine, registry };
}
