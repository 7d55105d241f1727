import { randomUUID } from 'node:crypto';
import { InternalError } from '../errors.js';
import { packageKybVerifiedEvent } from '../events/envelope.js';
import type {
  CheckResult,
  EntityPayload,
  VerificationVerdict,
  VerifyEntityOptions,
  VerifyEntityResult,
} from '../types/index.js';
import { buildVerdict } from './aggregate.js';
import {
  checkBusinessName,
  checkEntityAge,
  checkJurisdiction,
  checkRegistrationStatus,
  checkSanctions,
} from './rules.js';
import { normalizeEntityPayload } from './validate.js';

type Evaluator = (entity: EntityPayload) => CheckResult;

/** Fixed evaluation order — the verdict's `checks` always follow it. */
export const EVALUATORS: readonly (readonly [string, Evaluator])[] = [
  ['jurisdiction_verification', (e) => checkJurisdiction(e.jurisdiction)],
  ['entity_age_verification', (e) => checkEntityAge(e.entity_age_days)],
  ['sanctions_screening', (e) => checkSanctions(e.sanctions_flags)],
  ['business_name_validation', (e) => checkBusinessName(e.business_name)],
  ['registration_status_verification', (e) => checkRegistrationStatus(e.registration_status)],
];

/** Run every evaluator. A throwing evaluator is a defect, surfaced as InternalError. */
export function runChecks(
  entity: EntityPayload,
  evaluators: readonly (readonly [string, Evaluator])[] = EVALUATORS,
): CheckResult[] {
  return evaluators.map(([name, evaluate]) => {
    try {
      return evaluate(entity);
    } catch (err) {
      throw new InternalError(`KYB evaluator ${name} failed`, { cause: err });
    }
  });
}

export function evaluateEntity(entity: EntityPayload, now: Date = new Date()): VerificationVerdict {
  return buildVerdict(runChecks(entity), entity, now);
}

/**
 * Verify a raw entity payload. Throws `ValidationError` for missing or
 * malformed fields; `review` and `fail` are verdicts, not errors.
 */
export function verifyEntity(raw: unknown, options: VerifyEntityOptions = {}): VerifyEntityResult {
  const entity = normalizeEntityPayload(raw);
  const now = options.now ?? new Date();
  const verdict = evaluateEntity(entity, now);

  if (!options.emitAudit) return verdict;
  return {
    ...verdict,
    audit_event: packageKybVerifiedEvent(verdict, entity, {
      traceId: options.traceId ?? randomUUID(),
      time: now,
    }),
  };
}
