/**
 * Public projection of the effective knobs: what a customer can order right now.
 * Prices and process rates stay server-side.
 */

import { MAX_PADDLE_DIA_IN } from '../pricing/quote-inputs.js';
import type { PricingConfiguration, QuantityDiscountTier } from '../pricing/pricing.types.js';

export interface LeadTimeOption {
  days: number;
  multiplier: number;
}

export interface Availability {
  version: string;
  materials: Record<string, number[]>;  // material -> orderable thicknesses, ascending
  leadTimes: LeadTimeOption[];
  defaultLeadTimeDays: number;
  boreTolerances: number[];
  quantityDiscountTiers: QuantityDiscountTier[];
  maxPaddleDiaIn: number;
}

export function describeAvailability(config: PricingConfiguration): Availability {
  const materials: Record<string, number[]> = {};
  for (const [material, byThickness] of Object.entries(config.pricePerSqIn)) {
    materials[material] = numericKeys(byThickness);
  }

  const leadTimes = numericKeys(config.leadTimeMultiplier).map(days => ({
    days,
    multiplier: config.leadTimeMultiplier[days],
  }));

  return {
    version: config.version,
    materials,
    leadTimes,
    defaultLeadTimeDays: config.defaultLeadTimeDays,
    boreTolerances: numericKeys(config.process.inspectionMinsByTolerance),
    quantityDiscountTiers: [...config.quantityDiscountTiers].sort((a, b) => a.minQty - b.minQty),
    maxPaddleDiaIn: MAX_PADDLE_DIA_IN,
  };
}

function numericKeys(table: Record<number, unknown>): number[] {
  return Object.keys(table).map(Number).sort((a, b) => a - b);
}
