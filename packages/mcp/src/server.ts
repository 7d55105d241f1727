// Halyard MCP server — KYB verification and trust scoring as MCP tools.
//
// Tools:
//   verify_entity       — run the five KYB rules against a business entity
//   score_trust         — score a transaction context and adjust rail weights
//   is_allowed_provider — allowlist lookup in the provider registry
//   get_status          — liveness + configuration summary

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ValidationError } from '@halyard/core';
import type { HalyardEngine, ProviderRegistry } from '@halyard/core';
import { formatProviderDecision, formatSignalReport, formatVerdictReport } from './format.js';

export const MCP_SERVER_VERSION = '0.1.0';

function text(body: string): CallToolResult {
  return { content: [{ type: 'text', text: body }] };
}

/** Input problems go back to the caller as a tool error; anything else propagates. */
async function guarded(run: () => Promise<CallToolResult>): Promise<CallToolResult> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof ValidationError) {
      return { isError: true, content: [{ type: 'text', text: `Invalid input — ${err.message}` }] };
    }
    throw err;
  }
}

export function createMcpServer(engine: HalyardEngine, registry: ProviderRegistry): McpServer {
  const server = new McpServer(
    { name: 'halyard', version: MCP_SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  // ── Tool 1: verify_entity ───────────────────────────────────────────────────

  server.registerTool(
    'verify_entity',
    {
      title: 'Halyard KYB Verification',
      description:
        'Verify a business entity against KYB rules: jurisdiction whitelist, minimum entity age, ' +
        'sanctions flags, business name format and registration status. ' +
        'Returns verified, review or fail with the reason for each check.',
      inputSchema: {
        business_name: z.string().describe('Registered business name'),
        jurisdiction: z.string().describe('ISO 3166-1 alpha-2 country code, e.g. "US", "GB"'),
        entity_age_days: z.number().int().describe('Days since incorporation'),
        entity_id: z.string().optional().describe('Caller-side identifier, echoed in the verdict'),
        registration_status: z
          .string()
          .optional()
          .describe('e.g. "active", "registered", "incorporated", "good_standing"'),
        sanctions_flags: z.array(z.string()).optional().describe('Flags raised by upstream screening'),
        business_type: z.string().optional(),
        registration_number: z.string().optional(),
      },
    },
    async (args) => guarded(async () => text(formatVerdictReport(await engine.verifyEntity(args)))),
  );

  // ── Tool 2: score_trust ─────────────────────────────────────────────────────

  server.registerTool(
    'score_trust',
    {
      title: 'Halyard Trust Signal',
      description:
        'Score a transaction context (device reputation, velocity, IP risk, history length) ' +
        'and return the trust score, risk level and adjusted payment-rail weights.',
      inputSchema: {
        device_reputation: z.number().describe('Device reputation, 0–1 (1 = most trusted)'),
        velocity: z.number().describe('Transactions per hour, ≥ 0'),
        ip_risk: z.number().describe('IP risk, 0–1 (1 = riskiest)'),
        history_len: z.number().int().describe('Prior transactions on record, ≥ 0'),
        channel: z.string().optional().describe('Transaction channel. Default: "online"'),
        rail_weights: z
          .record(z.number())
          .optional()
          .describe('Rail type → weight. Default: { ACH: 0.4, debit: 0.3, credit: 0.3 }'),
      },
    },
    async ({ rail_weights, ...context }) =>
      guarded(async () => text(formatSignalReport(await engine.scoreTrust(context, rail_weights)))),
  );

  // ── Tool 3: is_allowed_provider ─────────────────────────────────────────────

  server.registerTool(
    'is_allowed_provider',
    {
      title: 'Halyard Provider Allowlist',
      description: 'Check whether a credential provider is in the trust registry allowlist.',
      inputSchema: {
        provider_id: z.string().min(1).describe('Provider identifier (case-sensitive)'),
      },
    },
    async ({ provider_id }) => text(formatProviderDecision(registry.check(provider_id))),
  );

  // ── Tool 4: get_status ──────────────────────────────────────────────────────

  server.registerTool(
    'get_status',
    {
      title: 'Halyard Status',
      description: 'Report server liveness, the explanation source and the registry size.',
    },
    async () => {
      const stats = registry.stats();
      return text(
        [
          `**Status:** ✅ ok`,
          `**Version:** ${MCP_SERVER_VERSION}`,
          `**Explainer:** ${engine.explainerName}`,
          `**Providers:** ${stats.total_providers} (${stats.source})`,
        ].join('\n'),
      );
    },
  );

  return server;
}
