// Explanation generator — deterministic templates, with an optional external
// explainer layered on top.

import { EXPLAIN, FEATURE_LABELS, FEATURE_ORDER, RISK_FACTORS } from '../constants.js';
import type {
  Explainer,
  ExplanationInput,
  ExplanationSource,
  FeatureContributions,
  FeatureName,
  Logger,
  TrustContext,
  TrustSignal,
  VerificationVerdict,
} from '../types/index.js';

export interface RankedContribution {
  feature: FeatureName;
  contribution: number;
}

/** By |contribution| descending; ties keep feature declaration order. */
export function rankContributions(contributions: Readonly<FeatureContributions>): RankedContribution[] {
  return FEATURE_ORDER
    .map((feature) => ({ feature, contribution: contributions[feature] }))
    .sort((a, b) => Math.abs(b.contribution) - Math.abs(a.contribution));
}

/** Raw-feature call-outs, in a fixed order. */
export function riskFactors(context: Pick<TrustContext, FeatureName>): string[] {
  const factors: string[] = [];
  if (context.device_reputation < RISK_FACTORS.LOW_DEVICE_REPUTATION) factors.push('device reputation');
  if (context.velocity > RISK_FACTORS.HIGH_VELOCITY)                  factors.push('high velocity');
  if (context.ip_risk > RISK_FACTORS.HIGH_IP_RISK)                    factors.push('IP risk');
  if (context.history_len < RISK_FACTORS.SHORT_HISTORY)               factors.push('limited history');
  return factors;
}

/** Everything the trust template reads. */
export type SignalCore = Pick<
  TrustSignal,
  'trust_score' | 'risk_level' | 'feature_contributions' | 'rail_adjustments' | 'metadata'
>;

export function explainSignalTemplate(signal: SignalCore): string {
  const level = signal.risk_level.charAt(0).toUpperCase() + signal.risk_level.slice(1);
  let text = `${level} risk detected (score: ${signal.trust_score.toFixed(2)})`;

  const factors = riskFactors(signal.metadata.context_features);
  if (factors.length > 0) text += ` due to ${factors.join(', ')}`;

  const top = rankContributions(signal.feature_contributions)
    .slice(0, EXPLAIN.TOP_FACTORS)
    .map((r) => `${FEATURE_LABELS[r.feature]} (${r.contribution.toFixed(3)})`);
  text += `. Top factors: ${top.join(', ')}`;

  const downWeighted = signal.rail_adjustments
    .filter((a) => a.adjustment_factor < 1)
    .map((a) => `${a.rail_type} (x${a.adjustment_factor.toFixed(2)})`);
  text += downWeighted.length > 0
    ? `. Down-weighted rails: ${downWeighted.join(', ')}`
    : '. No rail adjustments applied';

  return text;
}

export function explainVerdictTemplate(verdict: VerificationVerdict): string {
  let text = `KYB verification ${verdict.status}: ${verdict.reason}.`;
  if (verdict.status === 'verified') return text;

  for (const status of ['fail', 'review'] as const) {
    for (const check of verdict.checks) {
      if (check.status === status) text += ` ${check.check_name}: ${check.reason}.`;
    }
  }
  return text;
}

export function explainTemplate(input: ExplanationInput): string {
  return input.kind === 'verdict'
    ? explainVerdictTemplate(input.verdict)
    : explainSignalTemplate(input.signal);
}

export interface Explanation {
  text: string;
  source: ExplanationSource;
}

const TIMED_OUT = Symbol('explainer timed out');

/**
 * Ask the external explainer first; fall back to the template when there is
 * none, when it throws, when it returns blank text, or when it has not
 * answered within `timeoutMs`.
 */
export async function explainWithFallback(
  input: ExplanationInput,
  explainer: Explainer | null | undefined,
  logger: Logger,
  timeoutMs: number = EXPLAIN.TIMEOUT_MS,
): Promise<Explanation> {
  const template = explainTemplate(input);
  if (!explainer) return { text: template, source: 'template' };

  const { name } = explainer;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  try {
    const pending = explainer.explain(input);
    const outcome = await Promise.race([pending, deadline]);
    if (outcome === TIMED_OUT) {
      logger.warn(`explainer ${name} timed out after ${timeoutMs}ms, using template`);
      // A late rejection must not surface as an unhandled one
      void pending.catch((err: unknown) => {
        const msg = err instanceof Error ? err.message : String(err);
        logger.debug(`explainer ${name} failed after timing out (${msg})`);
      });
      return { text: template, source: 'template' };
    }
    const text = outcome.trim();
    if (text) return { text, source: 'llm' };
    logger.warn(`explainer ${name} returned empty text, using template`);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.warn(`explainer ${name} failed (${msg}), using template`);
  } finally {
    clearTimeout(timer);
  }
  return { text: template, source: 'template' };
}
