// KYB rule evaluators — one pure function per facet of the entity.
// Each result's `details` carries the inspected inputs and the rule
// parameters, so a check explains itself without being re-run.

import {
  JURISDICTION_WHITELIST,
  KYB,
  SANCTIONS_KEYWORDS,
  SUSPICIOUS_NAME_PATTERNS,
  VALID_REGISTRATION_STATUSES,
} from '../constants.js';
import type { CheckResult } from '../types/index.js';

const LETTER = /\p{L}/u;

// ─── Jurisdiction ─────────────────────────────────────────────────────────────

export function checkJurisdiction(jurisdiction: string): CheckResult {
  const whitelisted = JURISDICTION_WHITELIST.has(jurisdiction);
  return {
    check_name: 'jurisdiction_verification',
    status: whitelisted ? 'verified' : 'fail',
    details: {
      jurisdiction,
      whitelisted,
      whitelist_countries: [...JURISDICTION_WHITELIST].sort(),
    },
    reason: `Jurisdiction ${jurisdiction || '(none)'} is ${whitelisted ? 'whitelisted' : 'not whitelisted'}`,
  };
}

// ─── Entity age ───────────────────────────────────────────────────────────────

/** Young entities go to review — age alone never fails a verification. */
export function checkEntityAge(entityAgeDays: number): CheckResult {
  const meets = entityAgeDays >= KYB.MIN_ENTITY_AGE_DAYS;
  return {
    check_name: 'entity_age_verification',
    status: meets ? 'verified' : 'review',
    details: {
      entity_age_days: entityAgeDays,
      minimum_required_days: KYB.MIN_ENTITY_AGE_DAYS,
      meets_requirement: meets,
    },
    reason:
      `Entity age ${entityAgeDays} days ${meets ? 'meets' : 'does not meet'} ` +
      `minimum requirement of ${KYB.MIN_ENTITY_AGE_DAYS} days`,
  };
}

// ─── Sanctions ────────────────────────────────────────────────────────────────

export function checkSanctions(sanctionsFlags: readonly string[]): CheckResult {
  const matched = sanctionsFlags.filter((flag) => SANCTIONS_KEYWORDS.has(flag));
  const detected = matched.length > 0;
  return {
    check_name: 'sanctions_screening',
    status: detected ? 'fail' : 'verified',
    details: {
      sanctions_flags: [...sanctionsFlags],
      flags_checked: sanctionsFlags.length,
      sanctions_detected: detected,
      matched_flags: matched,
      keywords_checked: [...SANCTIONS_KEYWORDS].sort(),
    },
    reason: `Sanctions screening ${detected ? 'failed' : 'passed'} with ${sanctionsFlags.length} flags checked`,
  };
}

// ─── Business name ────────────────────────────────────────────────────────────

/**
 * Format violations (length, no letters) fail; a suspicious substring only
 * routes the name to review.
 */
export function checkBusinessName(businessName: string): CheckResult {
  const nameLength = businessName.length;
  const hasMinimumLength = nameLength >= KYB.NAME_MIN_LENGTH;
  const hasMaximumLength = nameLength <= KYB.NAME_MAX_LENGTH;
  const containsLetters = LETTER.test(businessName);

  const lower = businessName.toLowerCase();
  const suspiciousMatches = SUSPICIOUS_NAME_PATTERNS.filter((p) => lower.includes(p));
  const containsSuspicious = suspiciousMatches.length > 0;

  let status: CheckResult['status'];
  let reason: string;
  if (nameLength === 0) {
    status = 'fail';
    reason = 'Business name is empty or missing';
  } else if (!hasMinimumLength || !hasMaximumLength || !containsLetters) {
    status = 'fail';
    reason = 'Business name does not meet format requirements';
  } else if (containsSuspicious) {
    status = 'review';
    reason = 'Business name contains suspicious patterns requiring review';
  } else {
    status = 'verified';
    reason = 'Business name validation passed';
  }

  return {
    check_name: 'business_name_validation',
    status,
    details: {
      business_name: businessName,
      name_length: nameLength,
      min_length: KYB.NAME_MIN_LENGTH,
      max_length: KYB.NAME_MAX_LENGTH,
      has_minimum_length: hasMinimumLength,
      has_maximum_length: hasMaximumLength,
      contains_letters: containsLetters,
      contains_suspicious: containsSuspicious,
      suspicious_matches: suspiciousMatches,
      suspicious_patterns: [...SUSPICIOUS_NAME_PATTERNS],
    },
    reason,
  };
}

// ─── Registration status ──────────────────────────────────────────────────────

export function checkRegistrationStatus(registrationStatus: string): CheckResult {
  const normalized = registrationStatus.toLowerCase();
  const isValid = VALID_REGISTRATION_STATUSES.includes(normalized);
  return {
    check_name: 'registration_status_verification',
    status: isValid ? 'verified' : 'review',
    details: {
      registration_status: registrationStatus,
      valid_statuses: [...VALID_REGISTRATION_STATUSES],
      is_valid: isValid,
    },
    reason: `Registration status '${registrationStatus}' is ${isValid ? 'valid' : 'invalid or requires review'}`,
  };
}
