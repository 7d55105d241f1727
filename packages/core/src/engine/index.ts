export { HalyardEngine } from './halyard-engine.js';
export type { ExplainedVerdict, VerdictSummary } from './halyard-engine.js';
export { computeTrustSignal, scoreTrust } from './trust-signal.js';
export {
  clamp,
  computeConfidence,
  mapRiskLevel,
  normalizeFeatures,
  scoreFeatures,
} from './scoring.js';
export { adjustRails, adjustedWeightMap, clampFactor, policyFactor } from './rails.js';
export {
  explainSignalTemplate,
  explainTemplate,
  explainVerdictTemplate,
  explainWithFallback,
  rankContributions,
  riskFactors,
} from './explain.js';
export type { Explanation, RankedContribution, SignalCore } from './explain.js';
export { normalizeRailWeights, normalizeTrustContext } from './validate.js';
