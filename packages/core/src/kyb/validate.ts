// KYB payload validation + normalization — runs before any rule.

import { z } from 'zod';
import { parseOrThrow } from '../validation.js';
import type { EntityPayload } from '../types/index.js';

const optionalText = (fallback: string) =>
  z
    .union([z.string(), z.number()], { errorMap: () => ({ message: 'must be a string' }) })
    .optional()
    .transform((v) => (v === undefined ? fallback : String(v).trim()));

const entitySchema = z.object(
  {
    entity_id: optionalText(''),
    business_name: z
      .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
      .transform((v) => v.trim()),
    jurisdiction: z
      .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
      .transform((v) => v.trim().toUpperCase()),
    entity_age_days: z
      .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .min(0, 'must be >= 0'),
    registration_status: optionalText('unknown').transform((v) => v.toLowerCase()),
    // A single string is one flag, not a list of characters
    sanctions_flags: z
      .union([z.array(z.string()), z.string()], {
        errorMap: () => ({ message: 'must be a string or an array of strings' }),
      })
      .optional()
      .transform((v) => (v === undefined ? [] : typeof v === 'string' ? [v] : v)),
    business_type: optionalText('unknown'),
    registration_number: optionalText(''),
  },
  { required_error: 'is required', invalid_type_error: 'must be an object' },
);

/**
 * Validate a raw KYB payload and return its normalized form.
 * Throws ValidationError naming the first missing or malformed field.
 */
export function normalizeEntityPayload(raw: unknown): EntityPayload {
  return parseOrThrow(entitySchema, raw, 'payload');
}
