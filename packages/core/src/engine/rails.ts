// Rail adjuster — multiplicative weight adjustments looked up from RAIL_POLICY.

import { RAIL_FACTOR, RAIL_POLICY } from '../constants.js';
import type { RailAdjustment, RailWeights, RiskLevel } from '../types/index.js';

export function clampFactor(factor: number): number {
  return Math.min(Math.max(factor, RAIL_FACTOR.MIN), RAIL_FACTOR.MAX);
}

/**
 * Policy factor for a (risk level, rail) pair. Total over every pair: rail
 * types the table does not list pass through at 1.0.
 */
export function policyFactor(riskLevel: RiskLevel, railType: string): number {
  const table = RAIL_POLICY[riskLevel];
  const factor = Object.hasOwn(table, railType) ? table[railType] : undefined;
  return clampFactor(factor ?? RAIL_FACTOR.PASSTHROUGH);
}

function describe(factor: number, railType: string): string {
  if (factor === 1) return `leaves ${railType} weight unchanged`;
  const verb = factor < 1 ? 'reduces' : 'increases';
  return `${verb} ${railType} weight by factor ${factor.toFixed(2)}`;
}

/** One adjustment per input rail, in the caller's order. Weights are not renormalized. */
export function adjustRails(
  trustScore: number,
  riskLevel: RiskLevel,
  originalWeights: RailWeights,
): RailAdjustment[] {
  return Object.entries(originalWeights).map(([railType, originalWeight]) => {
    const factor = policyFactor(riskLevel, railType);
    return {
      rail_type: railType,
      original_weight: originalWeight,
      adjusted_weight: originalWeight * factor,
      adjustment_factor: factor,
      reason: `Trust score ${trustScore.toFixed(2)} (${riskLevel} risk) ${describe(factor, railType)}`,
    };
  });
}

export function adjustedWeightMap(adjustments: readonly RailAdjustment[]): RailWeights {
  const weights: RailWeights = {};
  for (const adj of adjustments) weights[adj.rail_type] = adj.adjusted_weight;
  return weights;
}
