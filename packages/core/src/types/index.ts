// Core types — shared by the KYB evaluator, the trust scorer and the event packager

// ─── Check results ────────────────────────────────────────────────────────────

export type CheckStatus = 'verified' | 'review' | 'fail';

export type CheckName =
  | 'jurisdiction_verification'
  | 'entity_age_verification'
  | 'sanctions_screening'
  | 'business_name_validation'
  | 'registration_status_verification';

export interface CheckResult {
  readonly check_name: CheckName;
  readonly status: CheckStatus;
  readonly details: Readonly<Record<string, unknown>>;
  readonly reason: string;
}

// ─── KYB entity ───────────────────────────────────────────────────────────────

/** Normalized entity description — produced by `normalizeEntityPayload`. */
export interface EntityPayload {
  entity_id: string;
  business_name: string;   // trimmed
  jurisdiction: string;    // ISO 3166-1 alpha-2, upper-cased
  entity_age_days: number; // integer ≥ 0
  registration_status: string; // lower-cased
  sanctions_flags: string[];
  business_type: string;
  registration_number: string;
}

export interface VerdictMetadata {
  verification_version: string;
  rules_applied: number;
  jurisdiction: string;
  entity_age_days: number;
}

export interface VerificationVerdict {
  readonly status: CheckStatus;
  readonly checks: readonly CheckResult[];
  readonly reason: string;
  readonly entity_id: string;
  readonly verified_at: string; // ISO 8601
  readonly metadata: Readonly<VerdictMetadata>;
}

// ─── Trust scoring ────────────────────────────────────────────────────────────

export type FeatureName = 'device_reputation' | 'velocity' | 'ip_risk' | 'history_len';
export type RiskLevel = 'low' | 'medium' | 'high';

export interface TrustContext {
  device_reputation: number; // [0, 1]
  velocity: number;          // transactions per hour, ≥ 0
  ip_risk: number;           // [0, 1]
  history_len: number;       // integer ≥ 0
  // Audit-only identifiers — never read by the scorer
  user_id?: string;
  session_id?: string;
  merchant_id?: string;
  channel: string;
  amount?: number;
}

export type FeatureContributions = Record<FeatureName, number>;

export interface FeatureScore {
  trust_score: number;
  confidence: number;
  normalized_features: FeatureContributions;
  feature_contributions: FeatureContributions;
}

export interface RailAdjustment {
  readonly rail_type: string;
  readonly original_weight: number;
  readonly adjusted_weight: number;
  readonly adjustment_factor: number;
  readonly reason: string;
}

export type RailWeights = Record<string, number>;

export type ExplanationSource = 'template' | 'llm';

export interface TrustSignalMetadata {
  model_version: string;
  context_features: TrustContext;
  original_weights: RailWeights;
  seed: number | null;
}

export interface TrustSignal {
  readonly trace_id: string;
  readonly trust_score: number;
  readonly risk_level: RiskLevel;
  readonly confidence: number;
  readonly model_type: string;
  readonly feature_contributions: Readonly<FeatureContributions>;
  readonly rail_adjustments: readonly RailAdjustment[];
  readonly explanation: string;
  readonly explanation_source: ExplanationSource;
  readonly generated_at: string;
  readonly metadata: Readonly<TrustSignalMetadata>;
}

// ─── Audit envelope (CloudEvents 1.0, structured mode) ────────────────────────

export interface AuditEnvelope<T> {
  specversion: '1.0';
  type: string;
  source: string;
  id: string;
  time: string;
  subject: string;
  datacontenttype: 'application/json';
  data: T;
}

export interface KybVerifiedData {
  verification_result: VerificationVerdict;
  entity_info: EntityPayload;
  timestamp: string;
  metadata: {
    service: string;
    version: string;
    feature: 'kyb_verification';
    trace_id: string;
  };
}

export interface TrustSignalData {
  trace_id: string;
  trust_score: number;
  risk_level: RiskLevel;
  confidence: number;
  device_reputation: number;
  velocity: number;
  ip_risk: number;
  history_len: number;
  merchant_context: Record<string, unknown>;
  cart_summary: Record<string, unknown>;
  rail_adjustments: RailAdjustment[];
  original_weights: RailWeights;
  adjusted_weights: RailWeights;
  explanation: string;
  feature_contributions: FeatureContributions;
  model_type: string;
  generated_at: string;
}

// ─── Operation results ────────────────────────────────────────────────────────

export type VerifyEntityResult = VerificationVerdict & {
  audit_event?: AuditEnvelope<KybVerifiedData>;
};

export type ScoreTrustResult = TrustSignal & {
  audit_event?: AuditEnvelope<TrustSignalData>;
};

export interface VerifyEntityOptions {
  emitAudit?: boolean;
  traceId?: string;
  now?: Date;
}

export interface ScoreTrustOptions {
  emitAudit?: boolean;
  traceId?: string;
  /** Recorded in metadata only — the scoring formula never reads it */
  seed?: number;
  now?: Date;
  merchantContext?: Record<string, unknown>;
  cartSummary?: Record<string, unknown>;
}

// ─── Collaborators ────────────────────────────────────────────────────────────

/** Subset of a pino / console logger — Fastify's `server.log` satisfies it. */
export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export type ExplanationInput =
  | { kind: 'verdict'; verdict: VerificationVerdict }
  | { kind: 'signal'; signal: TrustSignal };

/** External prose generator (e.g. an LLM). Must resolve to non-empty text. */
export interface Explainer {
  readonly name: string;
  explain(input: ExplanationInput): Promise<string>;
}

export interface HalyardConfig {
  explainer?: Explainer | null;
  /** Defaults to EXPLAIN.TIMEOUT_MS */
  explainTimeoutMs?: number;
  logger?: Logger;
}
