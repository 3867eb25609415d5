/**
 * Pricing Knobs DTO and Zod schema
 * Wire form of an override (admin API body, knobs file).
 *
 * JSON object keys are always strings, so thickness / tolerance / lead-time
 * tables arrive as { "0.25": ... } and are canonicalized to numeric keys here.
 */

import { z } from 'zod';
import { LEAD_TIME_PRESETS } from '../../config/pricing.defaults.js';
import type { PricingOverride } from '../pricing/pricing.types.js';

// ============================================================================
// Zod Schemas
// ============================================================================

function numericKeyed<T extends z.ZodTypeAny>(valueSchema: T) {
  return z.record(z.string(), valueSchema).transform((record, ctx) => {
    const out: Record<number, z.output<T>> = {};
    for (const [key, value] of Object.entries(record)) {
      const numericKey = Number(key);
      if (key.trim() === '' || !Number.isFinite(numericKey)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `key "${key}" is not a number`, path: [key] });
        return z.NEVER;
      }
      out[numericKey] = value;
    }
    return out;
  });
}

const tierSchema = z.object({
  minQty: z.number().int().min(1),
  multiplier: z.number().positive(),
});

const processSchema = z.object({
  cuttingPerLinearIn: z.number().nonnegative().optional(),
  laborPerHr: z.number().nonnegative().optional(),
  millSpeedIpm: z.number().positive().optional(),
  chamferSpeedIpm: z.number().positive().optional(),
  loadTimeMins: z.number().nonnegative().optional(),
  inspectionMinsByTolerance: numericKeyed(z.number().nonnegative()).optional(),
}).strict();

const shippingSchema = z.object({
  dimDivisor: z.number().positive().optional(),
  baseFeeCents: z.number().nonnegative().optional(),
  perLbCents: z.number().nonnegative().optional(),
  minBillableLb: z.number().nonnegative().optional(),
  packagingMarginIn: z.number().nonnegative().optional(),
  baseHeightIn: z.number().nonnegative().optional(),
  serviceMultipliers: z.object({
    ground: z.number().nonnegative(),
    twoDay: z.number().nonnegative(),
    overnight: z.number().nonnegative(),
  }).optional(),
}).strict();

export const pricingOverrideSchema = z.object({
  version: z.string().min(1).optional(),
  pricePerSqIn: z.record(z.string(), numericKeyed(z.number().nonnegative())).optional(),
  materialEnabled: z.record(z.string(), z.boolean()).optional(),
  thicknessEnabledByMaterial: z.record(z.string(), numericKeyed(z.boolean())).optional(),
  leadTimeMultiplier: numericKeyed(z.number().positive()).optional(),
  leadTimeEnabled: numericKeyed(z.boolean()).optional(),

  // Shortcut for leadTimeEnabled; an explicit leadTimeEnabled wins
  leadTimePreset: z.enum(['normal', 'no_rush', 'rush_only']).optional(),

  defaultLeadTimeDays: z.number().int().positive().optional(),
  quantityDiscountTiers: z.array(tierSchema).min(1).optional(),
  densityLbPerIn3: z.record(z.string(), z.number().positive()).optional(),
  weightMultiplierByMaterial: z.record(z.string(), z.number().positive()).optional(),
  process: processSchema.optional(),
  shipping: shippingSchema.optional(),
}).strict();

// ============================================================================
// Helper Functions
// ============================================================================

export function safeParsePricingOverride(data: unknown): {
  success: boolean;
  data?: PricingOverride;
  error?: string;
} {
  const result = pricingOverrideSchema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', '),
    };
  }

  const { leadTimePreset, ...override } = result.data;
  if (leadTimePreset && !override.leadTimeEnabled) {
    return { success: true, data: { ...override, leadTimeEnabled: { ...LEAD_TIME_PRESETS[leadTimePreset] } } };
  }
  return { success: true, data: override };
}
