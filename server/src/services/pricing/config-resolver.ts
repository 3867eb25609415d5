/**
 * Effective Configuration Resolution
 *
 * Builds the knobs used by ONE calculation from the baseline and an optional
 * admin override. Always returns a fresh, deeply frozen object; inputs are
 * never mutated, so concurrent calculations cannot observe each other.
 */

import type { PricingConfiguration, PricingOverride } from './pricing.types.js';

type PriceTable = PricingConfiguration['pricePerSqIn'];

export function resolveEffectiveConfig(
  baseline: PricingConfiguration,
  override?: PricingOverride | null
): PricingConfiguration {
  const merged = mergeOverride(baseline, override);

  let pricePerSqIn = filterPriceTable(merged.pricePerSqIn, merged);
  if (Object.keys(pricePerSqIn).length === 0) {
    // Override priced nothing that is enabled: retry against baseline prices, same flags
    pricePerSqIn = filterPriceTable(baseline.pricePerSqIn, merged);
  }

  const leadTimeMultiplier: Record<number, number> = {};
  for (const [days, multiplier] of Object.entries(merged.leadTimeMultiplier)) {
    if (merged.leadTimeEnabled[Number(days)] === true) {
      leadTimeMultiplier[Number(days)] = multiplier;
    }
  }

  return deepFreeze(structuredClone({ ...merged, pricePerSqIn, leadTimeMultiplier }));
}

/**
 * Raw merge, no availability filtering.
 * Used for layering a knobs file onto the built-in defaults.
 */
export function mergeOverride(
  baseline: PricingConfiguration,
  override?: PricingOverride | null
): PricingConfiguration {
  const o = override ?? {};

  return {
    version: o.version ?? baseline.version,
    pricePerSqIn: o.pricePerSqIn ?? baseline.pricePerSqIn,
    materialEnabled: o.materialEnabled ?? baseline.materialEnabled,
    thicknessEnabledByMaterial: o.thicknessEnabledByMaterial ?? baseline.thicknessEnabledByMaterial,
    leadTimeMultiplier: o.leadTimeMultiplier ?? baseline.leadTimeMultiplier,
    leadTimeEnabled: o.leadTimeEnabled ?? baseline.leadTimeEnabled,
    defaultLeadTimeDays: o.defaultLeadTimeDays ?? baseline.defaultLeadTimeDays,
    quantityDiscountTiers: o.quantityDiscountTiers ?? baseline.quantityDiscountTiers,
    densityLbPerIn3: o.densityLbPerIn3 ?? baseline.densityLbPerIn3,
    weightMultiplierByMaterial: o.weightMultiplierByMaterial ?? baseline.weightMultiplierByMaterial,
    process: { ...baseline.process, ...o.process },
    shipping: { ...baseline.shipping, ...o.shipping },
  };
}

/**
 * A material with no thickness map has every priced thickness enabled;
 * with a map, only thicknesses explicitly set true survive.
 */
export function isThicknessEnabled(
  flags: Pick<PricingConfiguration, 'materialEnabled' | 'thicknessEnabledByMaterial'>,
  material: string,
  thickness: number
): boolean {
  if (flags.materialEnabled[material] !== true) {
    return false;
  }
  const enabledMap = flags.thicknessEnabledByMaterial[material];
  if (!enabledMap) {
    return true;
  }
  return enabledMap[thickness] === true;
}

function filterPriceTable(
  table: PriceTable,
  flags: Pick<PricingConfiguration, 'materialEnabled' | 'thicknessEnabledByMaterial'>
): PriceTable {
  const filtered: PriceTable = {};
  for (const [material, byThickness] of Object.entries(table)) {
    const kept: Record<number, number> = {};
    for (const [thickness, price] of Object.entries(byThickness)) {
      if (isThicknessEnabled(flags, material, Number(thickness))) {
        kept[Number(thickness)] = price;
      }
    }
    if (Object.keys(kept).length > 0) {
      filtered[material] = kept;
    }
  }
  return filtered;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
