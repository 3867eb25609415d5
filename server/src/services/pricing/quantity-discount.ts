import { ConfigurationError } from './pricing.errors.js';
import type { QuantityDiscountTier } from './pricing.types.js';

/**
 * Multiplier of the highest tier whose minQty <= quantity.
 * Below the lowest tier the lowest tier's multiplier applies; above the
 * highest tier its multiplier applies unchanged.
 */
export function resolveQuantityMultiplier(
  tiers: readonly QuantityDiscountTier[],
  quantity: number
): number {
  if (tiers.length === 0) {
    throw new ConfigurationError('quantity discount tiers are empty');
  }

  const sorted = [...tiers].sort((a, b) => a.minQty - b.minQty);
  let multiplier = sorted[0].multiplier;

  for (const tier of sorted) {
    if (quantity >= tier.minQty) {
      multiplier = tier.multiplier;
    } else {
      break;
    }
  }

  return multiplier;
}
