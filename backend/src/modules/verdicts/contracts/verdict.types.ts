/**
 * VERDICT CONTRACT
 * ================
 *
 * A Verdict is one persisted, labeled sensor sample. The store assigns
 * `timestamp` on write; everything else is produced by the generator.
 *
 * LOCKED CONTRACT:
 * - features always carry exactly the 8 sensor channels
 * - confidence ∈ [0, 1], out-of-range input is rejected, never clamped
 */

import { z } from 'zod';
import { ValidationError } from '../../../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// VOCABULARIES
// ═══════════════════════════════════════════════════════════════

export const SENSOR_CHANNELS = ['Ia', 'Ib', 'VDC', 'IDC', 'T1', 'T2', 'T3', 'VD'] as const;
export type SensorChannel = (typeof SENSOR_CHANNELS)[number];

export const FAULT_LABELS = [
  'NORMAL_OP',
  'HB1_OVER_TEMP',
  'HB2_HIGH_SIDE_SC',
  'HB2_HIGH_SIDE_OC',
  'HB3_OVER_TEMP',
  'HB1_LOW_SIDE_SC',
  'HB3_LOW_SIDE_OC',
  'HB12_OVER_TEMP',
  'HB3_HIGH_SIDE_SC',
] as const;
export type FaultLabel = (typeof FAULT_LABELS)[number];

export const UNKNOWN_LOCATION = 'unknown';

export function isSensorChannel(value: unknown): value is SensorChannel {
  return typeof value === 'string' && (SENSOR_CHANNELS as readonly string[]).includes(value);
}

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const reading = z.number().finite();

export const FeaturesSchema = z
  .object({
    Ia: reading,
    Ib: reading,
    VDC: reading,
    IDC: reading,
    T1: reading,
    T2: reading,
    T3: reading,
    VD: reading,
  })
  .strict();

export const VerdictInputSchema = z.object({
  fault_label: z.enum(FAULT_LABELS),
  location: z.string().min(1).optional(),
  confidence: z.number().min(0).max(1),
  description: z.string().optional(),
  source_file: z.string().min(1),
  features: FeaturesSchema,
});

/**
 * A record as read back from a store. Stores may hand back null for an
 * optional field that was never set; it reads as absent.
 */
export const VerdictSchema = VerdictInputSchema.extend({
  location: z
    .string()
    .min(1)
    .nullish()
    .transform((v) => v ?? undefined),
  description: z
    .string()
    .nullish()
    .transform((v) => v ?? undefined),
  timestamp: z.date(),
});

export type SensorFeatures = z.infer<typeof FeaturesSchema>;
export type VerdictInput = z.infer<typeof VerdictInputSchema>;
export type Verdict = z.infer<typeof VerdictSchema>;

/**
 * Document as returned by a store, before validation
 */
export type RawVerdictDocument = Record<string, unknown>;

// ═══════════════════════════════════════════════════════════════
// BOUNDARY GUARDS
// ═══════════════════════════════════════════════════════════════

export function parseVerdictInput(input: unknown): VerdictInput {
  const result = VerdictInputSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid verdict', result.error.issues);
  }
  return result.data;
}

export function safeParseVerdict(doc: unknown): Verdict | null {
  const result = VerdictSchema.safeParse(doc);
  return result.success ? result.data : null;
}
