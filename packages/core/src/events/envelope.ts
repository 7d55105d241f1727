// Audit event packaging — CloudEvents 1.0 structured-mode envelopes.
// Packaging never performs I/O; forwarding the envelope to a bus is the
// caller's job.

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { EVENTS } from '../constants.js';
import { adjustedWeightMap } from '../engine/rails.js';
import type {
  AuditEnvelope,
  EntityPayload,
  KybVerifiedData,
  TrustContext,
  TrustSignal,
  TrustSignalData,
  VerificationVerdict,
} from '../types/index.js';

export interface EnvelopeOptions {
  id?: string;
  time?: Date;
}

function envelope<T>(
  type: string,
  source: string,
  subject: string,
  data: T,
  id: string,
  time: Date,
): AuditEnvelope<T> {
  return {
    specversion: EVENTS.SPEC_VERSION,
    type,
    source,
    id,
    time: time.toISOString(),
    subject,
    datacontenttype: EVENTS.CONTENT_TYPE,
    data,
  };
}

// ─── KYB verified ─────────────────────────────────────────────────────────────

export function packageKybVerifiedEvent(
  verdict: VerificationVerdict,
  entity: EntityPayload,
  options: EnvelopeOptions & { traceId: string },
): AuditEnvelope<KybVerifiedData> {
  const time = options.time ?? new Date();
  const data: KybVerifiedData = {
    verification_result: verdict,
    entity_info: entity,
    timestamp: time.toISOString(),
    metadata: {
      service: EVENTS.SERVICE,
      version: EVENTS.SERVICE_VERSION,
      feature: 'kyb_verification',
      trace_id: options.traceId,
    },
  };
  return envelope(
    EVENTS.KYB_VERIFIED_TYPE,
    EVENTS.KYB_SOURCE,
    options.traceId,
    data,
    options.id ?? randomUUID(),
    time,
  );
}

// ─── Trust signal ─────────────────────────────────────────────────────────────

export interface TrustEventOptions extends EnvelopeOptions {
  merchantContext?: Record<string, unknown>;
  cartSummary?: Record<string, unknown>;
}

export function packageTrustSignalEvent(
  signal: TrustSignal,
  context: TrustContext,
  options: TrustEventOptions = {},
): AuditEnvelope<TrustSignalData> {
  const time = options.time ?? new Date();
  const data: TrustSignalData = {
    trace_id: signal.trace_id,
    trust_score: signal.trust_score,
    risk_level: signal.risk_level,
    confidence: signal.confidence,
    device_reputation: context.device_reputation,
    velocity: context.velocity,
    ip_risk: context.ip_risk,
    history_len: context.history_len,
    merchant_context: options.merchantContext ?? {},
    cart_summary: options.cartSummary ?? {},
    rail_adjustments: [...signal.rail_adjustments],
    original_weights: { ...signal.metadata.original_weights },
    adjusted_weights: adjustedWeightMap(signal.rail_adjustments),
    explanation: signal.explanation,
    feature_contributions: { ...signal.feature_contributions },
    model_type: signal.model_type,
    generated_at: signal.generated_at,
  };
  const id =
    options.id ?? `trust-signal-${signal.trace_id}-${Math.floor(time.getTime() / 1000)}`;
  return envelope(EVENTS.TRUST_SIGNAL_TYPE, EVENTS.TRUST_SOURCE, signal.trace_id, data, id, time);
}

// ─── Validation ───────────────────────────────────────────────────────────────

const checkStatus = z.enum(['verified', 'review', 'fail']);
const unit = z.number().min(0).max(1);

const envelopeBase = {
  specversion: z.literal(EVENTS.SPEC_VERSION),
  id: z.string().min(1),
  time: z.string().datetime({ offset: true }),
  subject: z.string(),
  datacontenttype: z.literal(EVENTS.CONTENT_TYPE),
};

const kybVerifiedSchema = z.object({
  ...envelopeBase,
  type: z.literal(EVENTS.KYB_VERIFIED_TYPE),
  source: z.literal(EVENTS.KYB_SOURCE),
  data: z.object({
    verification_result: z.object({
      status: checkStatus,
      checks: z.array(
        z.object({ check_name: z.string(), status: checkStatus, reason: z.string() }).passthrough(),
      ),
      reason: z.string(),
      entity_id: z.string(),
      verified_at: z.string(),
    }).passthrough(),
    entity_info: z.object({
      business_name: z.string(),
      jurisdiction: z.string(),
      entity_age_days: z.number().int().min(0),
    }).passthrough(),
    timestamp: z.string(),
    metadata: z.object({
      service: z.string(),
      version: z.string(),
      feature: z.string(),
    }).passthrough(),
  }),
});

const trustSignalSchema = z.object({
  ...envelopeBase,
  type: z.literal(EVENTS.TRUST_SIGNAL_TYPE),
  source: z.literal(EVENTS.TRUST_SOURCE),
  id: z.string().regex(/^trust-signal-.+$/).or(z.string().uuid()),
  subject: z.string().min(1),
  data: z.object({
    trace_id: z.string(),
    trust_score: unit,
    risk_level: z.enum(['low', 'medium', 'high']),
    confidence: unit,
    device_reputation: unit,
    velocity: z.number().min(0),
    ip_risk: unit,
    history_len: z.number().int().min(0),
    explanation: z.string(),
    model_type: z.string(),
    rail_adjustments: z.array(
      z.object({
        rail_type: z.string(),
        original_weight: z.number(),
        adjusted_weight: z.number(),
        adjustment_factor: z.number(),
        reason: z.string(),
      }),
    ),
  }).passthrough(),
});

/** True when `event` is a well-formed `halyard.kyb.verified.v1` envelope. */
export function validateKybVerifiedEvent(event: unknown): boolean {
  return kybVerifiedSchema.safeParse(event).success;
}

/** True when `event` is a well-formed `halyard.trust.signal.v1` envelope. */
export function validateTrustSignalEvent(event: unknown): boolean {
  return trustSignalSchema.safeParse(event).success;
}

export function formatEventForLogging(
  event: Pick<AuditEnvelope<unknown>, 'type' | 'id' | 'subject'>,
): string {
  return `Event type: ${event.type}, ID: ${event.id}, Subject: ${event.subject}`;
}
