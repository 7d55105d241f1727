/**
 * Centralized constants for the Halyard decision engines.
 * Thresholds, weights and policy tables are part of the public contract —
 * changing a value here changes every verdict and score downstream.
 */

import type { CheckStatus, FeatureName, RiskLevel } from './types/index.js';

// ── KYB rule parameters ───────────────────────────────────────────────────────
export const KYB = {
  VERSION:            '1.0.0',
  MIN_ENTITY_AGE_DAYS: 365,
  NAME_MIN_LENGTH:    2,
  NAME_MAX_LENGTH:    200,
} as const;

export const JURISDICTION_WHITELIST: ReadonlySet<string> = new Set([
  'US', 'CA', 'GB', 'AU', 'DE', 'FR', 'NL', 'SG',
  'CH', 'LU', 'IE', 'DK', 'SE', 'NO', 'FI',
]);

/** Exact, case-sensitive match against each supplied flag. */
export const SANCTIONS_KEYWORDS: ReadonlySet<string> = new Set([
  'sanctions',
  'embargo',
  'terrorist',
  'money_laundering',
  'drug_trafficking',
  'corruption',
  'fraud',
  'tax_evasion',
  'regulatory_violation',
]);

/** Case-insensitive substrings that route a business name to manual review. */
export const SUSPICIOUS_NAME_PATTERNS: readonly string[] = ['test', 'demo', 'example', 'fake', 'invalid'];

export const VALID_REGISTRATION_STATUSES: readonly string[] = [
  'active',
  'registered',
  'incorporated',
  'good_standing',
];

/** Aggregation precedence — higher rank wins. */
export const STATUS_RANK: Readonly<Record<CheckStatus, number>> = {
  verified: 0,
  review:   1,
  fail:     2,
};

// ── Trust scoring ─────────────────────────────────────────────────────────────
export const SCORING = {
  MODEL_TYPE:       'trust_signal_linear_v1',
  MODEL_VERSION:    'trust_signal_v1',
  /** Velocity at or above this rate (tx/hour) contributes nothing */
  VELOCITY_CAP:     10,
  /** History length at or above this count contributes the full weight */
  HISTORY_CAP:      100,
  MIN_CONFIDENCE:   0.5,
} as const;

/**
 * Feature weights, in declaration order. They sum to 1 so the weighted sum of
 * [0,1] features never leaves [0,1] and the score equals the sum of its parts.
 */
export const FEATURE_WEIGHTS: Readonly<Record<FeatureName, number>> = {
  device_reputation: 0.35,
  velocity:          0.25,
  ip_risk:           0.25,
  history_len:       0.15,
};

export const FEATURE_ORDER: readonly FeatureName[] = [
  'device_reputation',
  'velocity',
  'ip_risk',
  'history_len',
];

export const FEATURE_LABELS: Readonly<Record<FeatureName, string>> = {
  device_reputation: 'device reputation',
  velocity:          'velocity',
  ip_risk:           'IP risk',
  history_len:       'history length',
};

// ── Risk bands (trust score → risk level; high score = low risk) ─────────────
export const RISK = {
  LOW:    0.7,
  MEDIUM: 0.4,
} as const;

/** Raw-feature thresholds the explanation template calls out. */
export const RISK_FACTORS = {
  LOW_DEVICE_REPUTATION: 0.5,
  HIGH_VELOCITY:         5,
  HIGH_IP_RISK:          0.7,
  SHORT_HISTORY:         10,
} as const;

// ── Rail policy ───────────────────────────────────────────────────────────────
export const RAIL_FACTOR = {
  MIN: 0.1,
  MAX: 1.5,
  /** Applied to any rail type the policy table does not list */
  PASSTHROUGH: 1.0,
} as const;

/**
 * Adjustment factor by (risk level, rail type). Slower, less reversible rails
 * lose weight as risk rises; credit stays neutral.
 */
export const RAIL_POLICY: Readonly<Record<RiskLevel, Readonly<Record<string, number>>>> = {
  low:    { ACH: 1.0, debit: 1.0, credit: 1.0 },
  medium: { ACH: 0.8, debit: 1.0, credit: 1.0 },
  high:   { ACH: 0.3, debit: 0.7, credit: 1.0 },
};

export const DEFAULT_RAIL_WEIGHTS: Readonly<Record<string, number>> = {
  ACH:    0.4,
  debit:  0.3,
  credit: 0.3,
};

// ── Explanations ──────────────────────────────────────────────────────────────
export const EXPLAIN = {
  TOP_FACTORS: 3,
  /** Budget for one external explanation before the template is used instead */
  TIMEOUT_MS:  10_000,
  MAX_RETRIES: 1,
} as const;

// ── Audit events ──────────────────────────────────────────────────────────────
export const EVENTS = {
  SPEC_VERSION:        '1.0',
  CONTENT_TYPE:        'application/json',
  SERVICE:             'halyard',
  SERVICE_VERSION:     '0.1.0',
  KYB_VERIFIED_TYPE:   'halyard.kyb.verified.v1',
  KYB_SOURCE:          'halyard-kyb',
  TRUST_SIGNAL_TYPE:   'halyard.trust.signal.v1',
  TRUST_SOURCE:        'halyard-trust',
} as const;

// ── Provider registry ─────────────────────────────────────────────────────────
export const BUILTIN_PROVIDERS = [
  'trusted_bank_001',
  'verified_credit_union_002',
  'authorized_fintech_003',
  'certified_payment_processor_004',
  'licensed_lender_005',
] as const;
