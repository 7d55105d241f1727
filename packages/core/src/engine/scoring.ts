// Feature scorer — fixed-weight linear model over four normalized features.
// Deterministic: no noise, no seed, no training. The score is always the
// exact sum of its per-feature contributions.

import { FEATURE_ORDER, FEATURE_WEIGHTS, RISK, SCORING } from '../constants.js';
import { InternalError } from '../errors.js';
import type {
  FeatureContributions,
  FeatureName,
  FeatureScore,
  RiskLevel,
  TrustContext,
} from '../types/index.js';

export function clamp(value: number, min = 0, max = 1): number {
  return Math.min(Math.max(value, min), max);
}

// ─── Normalization ────────────────────────────────────────────────────────────

/**
 * Map each raw feature into [0, 1] where 1 is most trustworthy.
 * Velocity and IP risk are inverted; velocity and history saturate at their caps.
 */
export function normalizeFeatures(
  context: Pick<TrustContext, FeatureName>,
): FeatureContributions {
  return {
    device_reputation: clamp(context.device_reputation),
    velocity: 1 - Math.min(1, Math.max(context.velocity, 0) / SCORING.VELOCITY_CAP),
    ip_risk: 1 - clamp(context.ip_risk),
    history_len: Math.min(1, Math.max(context.history_len, 0) / SCORING.HISTORY_CAP),
  };
}

// ─── Confidence ───────────────────────────────────────────────────────────────

/**
 * Agreement between features: 1 − population std-dev, floored at 0.5.
 */
export function computeConfidence(normalized: FeatureContributions): number {
  const values = FEATURE_ORDER.map((f) => normalized[f]);
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
  return clamp(Math.max(SCORING.MIN_CONFIDENCE, 1 - Math.sqrt(variance)));
}

// ─── Score ────────────────────────────────────────────────────────────────────

/**
 * Weighted sum over FEATURE_ORDER. Contributions are built and summed in the
 * same order, so `trust_score === Object.values(feature_contributions)` summed
 * left to right.
 */
export function scoreFeatures(context: Pick<TrustContext, FeatureName>): FeatureScore {
  const normalized = normalizeFeatures(context);

  const contributions: FeatureContributions = {
    device_reputation: 0,
    velocity: 0,
    ip_risk: 0,
    history_len: 0,
  };
  let sum = 0;
  for (const feature of FEATURE_ORDER) {
    const contribution = normalized[feature] * FEATURE_WEIGHTS[feature];
    contributions[feature] = contribution;
    sum += contribution;
  }

  if (!Number.isFinite(sum)) {
    throw new InternalError(`Feature scorer produced a non-finite score (${sum})`);
  }

  return {
    trust_score: clamp(sum),
    confidence: computeConfidence(normalized),
    normalized_features: normalized,
    feature_contributions: contributions,
  };
}

// ─── Risk Level Mapping ───────────────────────────────────────────────────────

/** High score = low risk. Bands: [0.7, 1] low, [0.4, 0.7) medium, [0, 0.4) high. */
export function mapRiskLevel(score: number): RiskLevel {
  if (score >= RISK.LOW)    return 'low';
  if (score >= RISK.MEDIUM) return 'medium';
  return 'high';
}
