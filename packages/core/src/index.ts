// @halyard/core — public API

// ── Engine ───────────────────────────────────────────────────────────────────
export { HalyardEngine } from './engine/index.js';
export type { ExplainedVerdict, VerdictSummary } from './engine/index.js';
export {
  adjustRails,
  adjustedWeightMap,
  clampFactor,
  computeConfidence,
  computeTrustSignal,
  explainSignalTemplate,
  explainTemplate,
  explainVerdictTemplate,
  explainWithFallback,
  mapRiskLevel,
  normalizeFeatures,
  normalizeRailWeights,
  normalizeTrustContext,
  policyFactor,
  rankContributions,
  riskFactors,
  scoreFeatures,
  scoreTrust,
} from './engine/index.js';
export type { Explanation, RankedContribution } from './engine/index.js';

// ── KYB ──────────────────────────────────────────────────────────────────────
export {
  aggregateChecks,
  buildVerdict,
  checkBusinessName,
  checkEntityAge,
  checkJurisdiction,
  checkRegistrationStatus,
  checkSanctions,
  evaluateEntity,
  formatVerdictSummary,
  normalizeEntityPayload,
  runChecks,
  tallyVerdict,
  verifyEntity,
} from './kyb/index.js';
export type { VerdictTally } from './kyb/index.js';

// ── Audit events ─────────────────────────────────────────────────────────────
export {
  formatEventForLogging,
  packageKybVerifiedEvent,
  packageTrustSignalEvent,
  validateKybVerifiedEvent,
  validateTrustSignalEvent,
} from './events/envelope.js';

// ── Registry / LLM ───────────────────────────────────────────────────────────
export { ProviderRegistry } from './registry/provider-registry.js';
export type { ProviderDecision, ProviderRegistryOptions, RegistryStats } from './registry/provider-registry.js';
export { OpenAIExplainer, createOpenAIExplainer } from './llm/openai-explainer.js';
export type { ExplainerEnv, OpenAIExplainerOptions } from './llm/openai-explainer.js';

// ── Errors / logging ─────────────────────────────────────────────────────────
export { InternalError, ValidationError } from './errors.js';
export { parseOrThrow } from './validation.js';
export { createConsoleLogger, defaultLogger } from './logger.js';

export * as constants from './constants.js';

// ── Types ────────────────────────────────────────────────────────────────────
export type {
  AuditEnvelope,
  CheckName,
  CheckResult,
  CheckStatus,
  EntityPayload,
  Explainer,
  ExplanationInput,
  ExplanationSource,
  FeatureContributions,
  FeatureName,
  FeatureScore,
  HalyardConfig,
  KybVerifiedData,
  Logger,
  RailAdjustment,
  RailWeights,
  RiskLevel,
  ScoreTrustOptions,
  ScoreTrustResult,
  TrustContext,
  TrustSignal,
  TrustSignalData,
  TrustSignalMetadata,
  VerdictMetadata,
  VerificationVerdict,
  VerifyEntityOptions,
  VerifyEntityResult,
} from './types/index.js';
