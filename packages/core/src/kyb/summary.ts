// Verdict summaries for reporting: a plain-text report and a status tally.

import type { CheckStatus, VerdictMetadata, VerificationVerdict } from '../types/index.js';

export interface VerdictTally {
  overall_status: CheckStatus;
  total_checks: number;
  check_results: Record<CheckStatus, number>;
  entity_id: string;
  verified_at: string;
  reason: string;
  metadata: Readonly<VerdictMetadata>;
}

/** `entity_age_verification` → `Entity Age Verification` */
export function titleCase(snake: string): string {
  return snake
    .split('_')
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

export function formatVerdictSummary(verdict: VerificationVerdict): string {
  const lines = [
    `KYB Verification Result: ${verdict.status.toUpperCase()}`,
    '',
    `Reason: ${verdict.reason}`,
    '',
    'Individual Checks:',
    ...verdict.checks.map(
      (c) => `• ${titleCase(c.check_name)}: ${c.status.toUpperCase()} - ${c.reason}`,
    ),
    '',
    'Metadata:',
    `• Jurisdiction: ${verdict.metadata.jurisdiction}`,
    `• Entity Age: ${verdict.metadata.entity_age_days} days`,
    `• Rules Applied: ${verdict.metadata.rules_applied}`,
  ];
  return lines.join('\n') + '\n';
}

export function tallyVerdict(verdict: VerificationVerdict): VerdictTally {
  const counts: Record<CheckStatus, number> = { verified: 0, review: 0, fail: 0 };
  for (const check of verdict.checks) counts[check.status] += 1;

  return {
    overall_status: verdict.status,
    total_checks: verdict.checks.length,
    check_results: counts,
    entity_id: verdict.entity_id,
    verified_at: verdict.verified_at,
    reason: verdict.reason,
    metadata: verdict.metadata,
  };
}
