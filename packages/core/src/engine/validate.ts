// Trust context + rail weight validation. Out-of-domain features are rejected,
// never silently clamped.

import { z } from 'zod';
import { DEFAULT_RAIL_WEIGHTS } from '../constants.js';
import { parseOrThrow } from '../validation.js';
import type { RailWeights, TrustContext } from '../types/index.js';

const number = (label: string) =>
  z.number({ required_error: 'is required', invalid_type_error: `must be a ${label}` });

const contextSchema = z.object(
  {
    device_reputation: number('number').min(0, 'must be >= 0').max(1, 'must be <= 1'),
    velocity: number('number').finite('must be finite').min(0, 'must be >= 0'),
    ip_risk: number('number').min(0, 'must be >= 0').max(1, 'must be <= 1'),
    history_len: number('number').int('must be an integer').min(0, 'must be >= 0'),
    user_id: z.string().optional(),
    session_id: z.string().optional(),
    merchant_id: z.string().optional(),
    channel: z.string().default('online'),
    amount: z.number().finite().optional(),
  },
  { required_error: 'is required', invalid_type_error: 'must be an object' },
);

// Integer-like keys would be enumerated ahead of every other rail, losing the
// caller's order.
const railType = z
  .string()
  .refine((key) => !/^(0|[1-9]\d*)$/.test(key), 'rail type must not be an integer');

const weightsSchema = z.record(
  railType,
  number('number').finite('must be finite').min(0, 'must be >= 0').max(1, 'must be <= 1'),
  { invalid_type_error: 'must be an object mapping rail type to weight' },
);

export function normalizeTrustContext(raw: unknown): TrustContext {
  return parseOrThrow(contextSchema, raw, 'context');
}

/** `undefined` / `null` fall back to DEFAULT_RAIL_WEIGHTS. */
export function normalizeRailWeights(raw: unknown): RailWeights {
  if (raw === undefined || raw === null) return { ...DEFAULT_RAIL_WEIGHTS };
  return parseOrThrow(weightsSchema, raw, 'rail_weights', 'rail_weights.');
}
