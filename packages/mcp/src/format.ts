// Markdown reports for MCP tool results.

import type {
  CheckStatus,
  ExplainedVerdict,
  ProviderDecision,
  RiskLevel,
  TrustSignal,
} from '@halyard/core';
import { constants } from '@halyard/core';

export function statusEmoji(status: CheckStatus): string {
  switch (status) {
    case 'verified': return '✅';
    case 'review':   return '👀';
    case 'fail':     return '🚫';
  }
}

export function riskEmoji(risk: RiskLevel): string {
  switch (risk) {
    case 'low':    return '🟢';
    case 'medium': return '🟠';
    case 'high':   return '🔴';
  }
}

function scoreBar(score: number): string {
  const filled = Math.round(score * 20);
  return '█'.repeat(filled) + '░'.repeat(20 - filled);
}

export function formatVerdictReport(verdict: ExplainedVerdict): string {
  const lines: string[] = [
    `## KYB Verification: ${statusEmoji(verdict.status)} ${verdict.status.toUpperCase()}`,
    '',
  ];
  if (verdict.entity_id) lines.push(`**Entity:** \`${verdict.entity_id}\``);
  lines.push(`**Reason:** ${verdict.reason}`, '', '### Checks');

  for (const check of verdict.checks) {
    lines.push(`- ${statusEmoji(check.status)} **${check.check_name}**: ${check.reason}`);
  }

  lines.push(
    '',
    '### Explanation',
    verdict.explanation,
    '',
    `*Verified: ${verdict.verified_at} | Rules applied: ${verdict.metadata.rules_applied}*`,
  );
  return lines.join('\n');
}

export function formatSignalReport(signal: TrustSignal): string {
  const lines: string[] = [
    `## Trust Signal: ${riskEmoji(signal.risk_level)} ${signal.risk_level.toUpperCase()} risk`,
    '',
    `**Score:** [${scoreBar(signal.trust_score)}] ${(signal.trust_score * 100).toFixed(1)}%`,
    `**Confidence:** ${(signal.confidence * 100).toFixed(1)}%`,
    '',
    '### Feature Contributions',
  ];

  for (const feature of constants.FEATURE_ORDER) {
    lines.push(
      `- **${constants.FEATURE_LABELS[feature]}:** ${signal.feature_contributions[feature].toFixed(3)}`,
    );
  }

  lines.push('', '### Rail Adjustments');
  for (const adj of signal.rail_adjustments) {
    lines.push(
      `- **${adj.rail_type}:** ${adj.original_weight.toFixed(3)} → ${adj.adjusted_weight.toFixed(3)} ` +
      `(x${adj.adjustment_factor.toFixed(2)})`,
    );
  }

  lines.push(
    '',
    '### Explanation',
    signal.explanation,
    '',
    `*Trace: ${signal.trace_id} | Model: ${signal.model_type}*`,
  );
  return lines.join('\n');
}

export function formatProviderDecision(decision: ProviderDecision): string {
  return [
    `**Provider:** \`${decision.provider_id}\``,
    `**Allowed:** ${decision.allowed ? '✅ YES' : '❌ NO'}`,
    `**Reason:** ${decision.reason}`,
  ].join('\n');
}
