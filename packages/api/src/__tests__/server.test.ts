import { afterEach, describe, it, expect, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { HalyardEngine, ProviderRegistry } from '@halyard/core';
import type { ExplainedVerdict, Logger, ProviderDecision, ScoreTrustResult, VerdictSummary } from '@halyard/core';
import { buildServer } from '../server.js';
import { loadApiConfig } from '../config.js';

// ── Helpers ───────────────────────────────────────────────────────────────────
const ENTITY = {
  entity_id: 'ent-1',
  business_name: 'Acme Corporation',
  jurisdiction: 'US',
  entity_age_days: 900,
  registration_status: 'active',
};
const HIGH_RISK = { device_reputation: 0.2, velocity: 8, ip_risk: 0.9, history_len: 2 };

interface ErrorBody {
  error: string;
  field?: string;
  message: string;
}

interface InvokeBody {
  success: boolean;
  data: unknown;
  error: string | null;
}

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

let server: FastifyInstance | undefined;

async function build(env: Record<string, string> = {}): Promise<FastifyInstance> {
  const built = await buildServer({
    config: loadApiConfig(env),
    env: { NODE_ENV: 'test' },
    engine: new HalyardEngine({ logger: silentLogger() }),
    registry: new ProviderRegistry({ providers: ['trusted_bank_001', 'licensed_lender_005'] }),
  });
  server = built.server;
  return built.server;
}

afterEach(async () => {
  await server?.close();
  server = undefined;
});

// ── Health ────────────────────────────────────────────────────────────────────
describe('GET /health', () => {
  it('reports status, explainer and registry size', async () => {
    const app = await build();
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', version: '0.1.0', explainer: 'template', providers: 2 });
  });

  it('sets security headers', async () => {
    const app = await build();
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.headers['x-content-type-options']).toBe('nosniff');
    expect(res.headers['x-frame-options']).toBe('DENY');
    expect(res.headers['referrer-policy']).toBe('no-referrer');
  });
});

// ── KYB ───────────────────────────────────────────────────────────────────────
describe('POST /v1/kyb/verify', () => {
  it('returns the explained verdict', async () => {
    const app = await build();
    const res = await app.inject({ method: 'POST', url: '/v1/kyb/verify', payload: ENTITY });
    expect(res.statusCode).toBe(200);
    const body = res.json<ExplainedVerdict>();
    expect(body.status).toBe('verified');
    expect(body.checks).toHaveLength(5);
    expect(body.explanation).toBe('KYB verification verified: All verification checks passed successfully.');
    expect(body.audit_event).toBeUndefined();
  });

  it('attaches an audit event when asked', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/v1/kyb/verify',
      payload: { ...ENTITY, emit_audit: true, trace_id: 'trace-http' },
    });
    const body = res.json<ExplainedVerdict>();
    expect(body.audit_event?.type).toBe('halyard.kyb.verified.v1');
    expect(body.audit_event?.subject).toBe('trace-http');
  });

  it('maps validation errors to 400', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/v1/kyb/verify',
      payload: { ...ENTITY, entity_age_days: 'old' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorBody>()).toEqual({
      error: 'validation_error',
      field: 'entity_age_days',
      message: 'entity_age_days: must be a number',
    });
  });

  it('rejects a malformed emit_audit flag', async () => {
    const app = await build();
    const res = await app.inject({ method: 'POST', url: '/v1/kyb/verify', payload: { ...ENTITY, emit_audit: 'yes' } });
    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorBody>().field).toBe('emit_audit');
  });
});

describe('POST /v1/kyb/summary', () => {
  it('returns text and tally', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/v1/kyb/summary',
      payload: { ...ENTITY, entity_age_days: 30 },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json<VerdictSummary>();
    expect(body.summary_text.split('\n')[0]).toBe('KYB Verification Result: REVIEW');
    expect(body.summary.check_results).toEqual({ verified: 4, review: 1, fail: 0 });
  });
});

// ── Trust ─────────────────────────────────────────────────────────────────────
describe('POST /v1/trust/signal', () => {
  it('scores a high-risk context and down-weights rails', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/v1/trust/signal',
      payload: { context: HIGH_RISK, trace_id: 'trace-risk', seed: 7 },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json<ScoreTrustResult>();
    expect(body.trace_id).toBe('trace-risk');
    expect(body.risk_level).toBe('high');
    expect(body.metadata.seed).toBe(7);
    expect(body.rail_adjustments.map((a) => a.adjustment_factor)).toEqual([0.3, 0.7, 1]);
  });

  it('honours custom rail weights and audit context', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/v1/trust/signal',
      payload: {
        context: HIGH_RISK,
        rail_weights: { wire: 0.5, ACH: 0.5 },
        emit_audit: true,
        cart_summary: { items: 2 },
      },
    });
    const body = res.json<ScoreTrustResult>();
    expect(body.rail_adjustments.map((a) => a.rail_type)).toEqual(['wire', 'ACH']);
    expect(body.audit_event?.data.cart_summary).toEqual({ items: 2 });
  });

  it('requires a context', async () => {
    const app = await build();
    const res = await app.inject({ method: 'POST', url: '/v1/trust/signal', payload: {} });
    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorBody>()).toEqual({
      error: 'validation_error',
      field: 'context',
      message: 'context: is required',
    });
  });

  it('names the out-of-range rail weight', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/v1/trust/signal',
      payload: { context: HIGH_RISK, rail_weights: { ACH: 2 } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json<ErrorBody>().field).toBe('rail_weights.ACH');
  });
});

// ── Registry ──────────────────────────────────────────────────────────────────
describe('provider registry routes', () => {
  it('lists providers', async () => {
    const app = await build();
    const res = await app.inject({ method: 'GET', url: '/trust/providers' });
    expect(res.json()).toMatchObject({
      providers: ['licensed_lender_005', 'trusted_bank_001'],
      count: 2,
      stats: { total_providers: 2, source: 'explicit' },
    });
  });

  it('checks a provider, trimming the id', async () => {
    const app = await build();
    const res = await app.inject({ method: 'GET', url: '/trust/allowed/%20trusted_bank_001%20' });
    expect(res.json<ProviderDecision>()).toEqual({
      provider_id: 'trusted_bank_001',
      allowed: true,
      reason: 'Provider is in trust registry',
    });
  });

  it('is case-sensitive', async () => {
    const app = await build();
    const res = await app.inject({ method: 'GET', url: '/trust/allowed/TRUSTED_BANK_001' });
    expect(res.json<ProviderDecision>().allowed).toBe(false);
  });
});

// ── MCP invoke bridge ─────────────────────────────────────────────────────────
describe('POST /mcp/invoke', () => {
  it('getStatus', async () => {
    const app = await build();
    const res = await app.inject({ method: 'POST', url: '/mcp/invoke', payload: { verb: 'getStatus' } });
    expect(res.json<InvokeBody>()).toEqual({
      success: true,
      data: { ok: true, agent: 'halyard', explainer: 'template' },
      error: null,
    });
  });

  it('isAllowedProvider', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/mcp/invoke',
      payload: { verb: 'isAllowedProvider', args: { provider_id: 'blocked_merchant_456' } },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json<InvokeBody>().data).toEqual({
      provider_id: 'blocked_merchant_456',
      allowed: false,
      reason: 'Provider not found in trust registry',
    });
  });

  it('isAllowedProvider without provider_id is a 400', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/mcp/invoke',
      payload: { verb: 'isAllowedProvider', args: {} },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json<InvokeBody>()).toEqual({
      success: false,
      data: null,
      error: 'provider_id parameter is required',
    });
  });

  it('verifyEntity and scoreTrust delegate to the engine', async () => {
    const app = await build();
    const kyb = await app.inject({
      method: 'POST',
      url: '/mcp/invoke',
      payload: { verb: 'verifyEntity', args: { payload: { ...ENTITY, jurisdiction: 'XX' } } },
    });
    expect(kyb.json<{ data: ExplainedVerdict }>().data.status).toBe('fail');

    const trust = await app.inject({
      method: 'POST',
      url: '/mcp/invoke',
      payload: { verb: 'scoreTrust', args: { context: HIGH_RISK } },
    });
    expect(trust.json<{ data: ScoreTrustResult }>().data.risk_level).toBe('high');
  });

  it('unknown verbs are a 400', async () => {
    const app = await build();
    const res = await app.inject({ method: 'POST', url: '/mcp/invoke', payload: { verb: 'launchRockets' } });
    expect(res.statusCode).toBe(400);
    expect(res.json<InvokeBody>().error).toBe('Unknown verb: launchRockets');
  });
});

// ── Rate limiting ─────────────────────────────────────────────────────────────
describe('rate limiting', () => {
  it('rejects requests over RATE_LIMIT_MAX', async () => {
    const app = await build({ RATE_LIMIT_MAX: '2' });
    const codes: number[] = [];
    for (let i = 0; i < 3; i++) {
      codes.push((await app.inject({ method: 'GET', url: '/health' })).statusCode);
    }
    expect(codes).toEqual([200, 200, 429]);
  });

  it('answers 429 with the limiter body on POST routes too', async () => {
    const app = await build({ RATE_LIMIT_MAX: '1' });
    const first = await app.inject({ method: 'POST', url: '/v1/kyb/summary', payload: ENTITY });
    const second = await app.inject({ method: 'POST', url: '/v1/kyb/summary', payload: ENTITY });
    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(429);
    expect(second.json<{ statusCode: number; error: string; limit: number }>()).toMatchObject({
      statusCode: 429,
      error: 'rate_limit_exceeded',
      limit: 1,
    });
  });

  it('keeps the 400 for malformed JSON bodies', async () => {
    const app = await build();
    const res = await app.inject({
      method: 'POST',
      url: '/v1/kyb/verify',
      headers: { 'content-type': 'application/json' },
      payload: '{"business_name":',
    });
    expect(res.statusCode).toBe(400);
  });
});
