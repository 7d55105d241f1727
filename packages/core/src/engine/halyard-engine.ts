// HalyardEngine — the embeddable decision engine the HTTP and MCP layers hold.
//
//   import { HalyardEngine, createOpenAIExplainer } from '@halyard/core';
//   const engine = new HalyardEngine({ explainer: createOpenAIExplainer(process.env) });
//   const verdict = await engine.verifyEntity({ business_name: 'Acme Ltd', jurisdiction: 'GB', entity_age_days: 900 });
//
// The pure pipelines in kyb/ and engine/ do the deciding; the engine only
// layers the optional external explainer and audit packaging on top.

import { randomUUID } from 'node:crypto';
import { EXPLAIN } from '../constants.js';
import { packageKybVerifiedEvent, packageTrustSignalEvent } from '../events/envelope.js';
import { evaluateEntity } from '../kyb/verify.js';
import { formatVerdictSummary, tallyVerdict, type VerdictTally } from '../kyb/summary.js';
import { normalizeEntityPayload } from '../kyb/validate.js';
import { defaultLogger } from '../logger.js';
import type {
  Explainer,
  ExplanationSource,
  HalyardConfig,
  Logger,
  ScoreTrustOptions,
  ScoreTrustResult,
  TrustSignal,
  VerificationVerdict,
  VerifyEntityOptions,
  VerifyEntityResult,
} from '../types/index.js';
import { explainWithFallback, type Explanation } from './explain.js';
import { computeTrustSignal } from './trust-signal.js';
import { normalizeRailWeights, normalizeTrustContext } from './validate.js';

export type ExplainedVerdict = VerifyEntityResult & {
  explanation: string;
  explanation_source: ExplanationSource;
};

export interface VerdictSummary {
  summary_text: string;
  summary: VerdictTally;
}

export class HalyardEngine {
  private readonly explainer: Explainer | null;
  private readonly explainTimeoutMs: number;
  private readonly logger: Logger;

  constructor(config: HalyardConfig = {}) {
    this.explainer = config.explainer ?? null;
    this.explainTimeoutMs = config.explainTimeoutMs ?? EXPLAIN.TIMEOUT_MS;
    this.logger = config.logger ?? defaultLogger;
  }

  /** `template` when no external explainer is configured. */
  get explainerName(): string {
    return this.explainer?.name ?? 'template';
  }

  // ── KYB ────────────────────────────────────────────────────────────────────

  async verifyEntity(raw: unknown, options: VerifyEntityOptions = {}): Promise<ExplainedVerdict> {
    const entity = normalizeEntityPayload(raw);
    const now = options.now ?? new Date();
    const verdict = evaluateEntity(entity, now);
    const explanation = await this.explainVerdict(verdict);

    this.logger.info(
      `kyb ${entity.entity_id || '(no entity_id)'} → ${verdict.status} (${verdict.checks.length} checks)`,
    );

    const result: ExplainedVerdict = {
      ...verdict,
      explanation: explanation.text,
      explanation_source: explanation.source,
    };
    if (!options.emitAudit) return result;

    return {
      ...result,
      audit_event: packageKybVerifiedEvent(verdict, entity, {
        traceId: options.traceId ?? randomUUID(),
        time: now,
      }),
    };
  }

  summarizeEntity(raw: unknown, now: Date = new Date()): VerdictSummary {
    const verdict = evaluateEntity(normalizeEntityPayload(raw), now);
    return { summary_text: formatVerdictSummary(verdict), summary: tallyVerdict(verdict) };
  }

  // ── Trust signals ──────────────────────────────────────────────────────────

  async scoreTrust(
    rawContext: unknown,
    rawWeights?: unknown,
    options: ScoreTrustOptions = {},
  ): Promise<ScoreTrustResult> {
    const context = normalizeTrustContext(rawContext);
    const weights = normalizeRailWeights(rawWeights);
    const now = options.now ?? new Date();

    const base = computeTrustSignal(context, weights, { ...options, now });
    const explanation = await this.explainSignal(base);
    const signal: TrustSignal = {
      ...base,
      explanation: explanation.text,
      explanation_source: explanation.source,
    };

    this.logger.info(
      `trust ${signal.trace_id} → ${signal.risk_level} (score ${signal.trust_score.toFixed(3)})`,
    );

    if (!options.emitAudit) return signal;
    return {
      ...signal,
      audit_event: packageTrustSignalEvent(signal, context, {
        merchantContext: options.merchantContext,
        cartSummary: options.cartSummary,
        time: now,
      }),
    };
  }

  // ── Explanations ───────────────────────────────────────────────────────────

  explainVerdict(verdict: VerificationVerdict): Promise<Explanation> {
    return explainWithFallback({ kind: 'verdict', verdict }, this.explainer, this.logger, this.explainTimeoutMs);
  }

  explainSignal(signal: TrustSignal): Promise<Explanation> {
    return explainWithFallback({ kind: 'signal', signal }, this.explainer, this.logger, this.explainTimeoutMs);
  }
}
