// Trust signal pipeline: validate → score → classify → adjust rails → explain.

import { randomUUID } from 'node:crypto';
import { SCORING } from '../constants.js';
import { packageTrustSignalEvent } from '../events/envelope.js';
import type {
  RailWeights,
  ScoreTrustOptions,
  ScoreTrustResult,
  TrustContext,
  TrustSignal,
} from '../types/index.js';
import { explainSignalTemplate, type SignalCore } from './explain.js';
import { adjustRails } from './rails.js';
import { mapRiskLevel, scoreFeatures } from './scoring.js';
import { normalizeRailWeights, normalizeTrustContext } from './validate.js';

/**
 * Build a signal from already-validated inputs. The explanation is the
 * deterministic template.
 */
export function computeTrustSignal(
  context: TrustContext,
  weights: RailWeights,
  options: Pick<ScoreTrustOptions, 'traceId' | 'seed' | 'now'> = {},
): TrustSignal {
  const score = scoreFeatures(context);
  const riskLevel = mapRiskLevel(score.trust_score);

  const core: SignalCore = {
    trust_score: score.trust_score,
    risk_level: riskLevel,
    feature_contributions: score.feature_contributions,
    rail_adjustments: adjustRails(score.trust_score, riskLevel, weights),
    metadata: {
      model_version: SCORING.MODEL_VERSION,
      context_features: { ...context },
      original_weights: { ...weights },
      seed: options.seed ?? null,
    },
  };

  return {
    ...core,
    trace_id: options.traceId ?? randomUUID(),
    confidence: score.confidence,
    model_type: SCORING.MODEL_TYPE,
    explanation: explainSignalTemplate(core),
    explanation_source: 'template',
    generated_at: (options.now ?? new Date()).toISOString(),
  };
}

/**
 * Score a raw trust context. Throws `ValidationError` for out-of-domain
 * features or weights; `InternalError` if the scorer misbehaves.
 */
export function scoreTrust(
  rawContext: unknown,
  rawWeights?: unknown,
  options: ScoreTrustOptions = {},
): ScoreTrustResult {
  const context = normalizeTrustContext(rawContext);
  const weights = normalizeRailWeights(rawWeights);
  const now = options.now ?? new Date();
  const signal = computeTrustSignal(context, weights, { ...options, now });

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
