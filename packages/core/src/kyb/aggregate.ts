// Verdict aggregation — strict precedence, no weighting: fail ⊐ review ⊐ verified.

import { KYB, STATUS_RANK } from '../constants.js';
import type {
  CheckResult,
  CheckStatus,
  EntityPayload,
  VerificationVerdict,
} from '../types/index.js';

export interface AggregateResult {
  status: CheckStatus;
  reason: string;
}

/**
 * Fold an ordered check sequence into one status.
 * A single `fail` poisons the verdict; a single `review` escalates an
 * otherwise clean one. An empty sequence is `verified`.
 */
export function aggregateChecks(checks: readonly CheckResult[]): AggregateResult {
  const status = checks.reduce<CheckStatus>(
    (acc, check) => (STATUS_RANK[check.status] > STATUS_RANK[acc] ? check.status : acc),
    'verified',
  );

  const named = (s: CheckStatus) =>
    checks.filter((c) => c.status === s).map((c) => c.check_name).join(', ');

  switch (status) {
    case 'fail':
      return { status, reason: `Verification failed due to: ${named('fail')}` };
    case 'review':
      return { status, reason: `Verification requires review due to: ${named('review')}` };
    case 'verified':
      return { status, reason: 'All verification checks passed successfully' };
  }
}

/** Wrap the aggregated status with entity metadata. */
export function buildVerdict(
  checks: readonly CheckResult[],
  entity: EntityPayload,
  now: Date = new Date(),
): VerificationVerdict {
  const { status, reason } = aggregateChecks(checks);
  return {
    status,
    checks: [...checks],
    reason,
    entity_id: entity.entity_id,
    verified_at: now.toISOString(),
    metadata: {
      verification_version: KYB.VERSION,
      rules_applied: checks.length,
      jurisdiction: entity.jurisdiction,
      entity_age_days: entity.entity_age_days,
    },
  };
}
