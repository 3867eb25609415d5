/**
 * Baseline pricing knobs.
 * Loaded once at startup; admin overrides are layered on top per calculation
 * and never written back here.
 */

import type { PricingConfiguration } from '../services/pricing/pricing.types.js';

export const DEFAULT_PRICING_CONFIG: PricingConfiguration = {
  version: 'baseline-2025.1',

  // $/sq in by material -> thickness (in)
  pricePerSqIn: {
    '304': { 0.12: 0.1302, 0.25: 0.2564, 0.375: 0.3814, 0.5: 0.6307 },
    '316': { 0.12: 0.1868, 0.25: 0.3763, 0.375: 0.5710, 0.5: 0.8773 },
    'Carbon Steel': { 0.12: 0.04785, 0.25: 0.07444, 0.375: 0.11065, 0.5: 0.1503 },
    'Monel': { 0.125: 2.78, 0.25: 6.67 },
    'Hastelloy': { 0.125: 3.58, 0.25: 7.54, 0.375: 14.02 },
  },

  materialEnabled: {
    '304': true,
    '316': true,
    'Carbon Steel': true,
    'Monel': false,
    'Hastelloy': false,
  },

  // 11ga plate is priced at 0.12 but flagged at 0.125, so it is not orderable
  // until an override flags 0.12
  thicknessEnabledByMaterial: {
    '304': { 0.125: true, 0.25: true, 0.375: true, 0.5: true },
    '316': { 0.125: true, 0.25: true, 0.375: true, 0.5: true },
    'Carbon Steel': { 0.125: true, 0.25: true, 0.375: true, 0.5: true },
    'Monel': { 0.125: true, 0.25: true, 0.5: false },
    'Hastelloy': { 0.125: true, 0.25: true, 0.375: true, 0.5: true },
  },

  leadTimeMultiplier: { 7: 2.3, 14: 1.6, 21: 1.0 },
  leadTimeEnabled: { 7: true, 14: true, 21: true },
  defaultLeadTimeDays: 21,

  quantityDiscountTiers: [
    { minQty: 1, multiplier: 1.0 },
    { minQty: 5, multiplier: 0.97 },   // 3% off
    { minQty: 10, multiplier: 0.95 },
    { minQty: 25, multiplier: 0.92 },
    { minQty: 50, multiplier: 0.9 },   // 10% off
  ],

  densityLbPerIn3: {
    '304': 0.289,
    '316': 0.289,
    'Carbon Steel': 0.283,
    'Monel': 0.319,
    'Hastelloy': 0.322,
  },

  // density math runs light on stainless
  weightMultiplierByMaterial: {
    '304': 1.06,
    '316': 1.06,
    'Carbon Steel': 1.0,
  },

  process: {
    cuttingPerLinearIn: 0.826,
    laborPerHr: 150,
    millSpeedIpm: 28,
    chamferSpeedIpm: 28,
    loadTimeMins: 6,
    inspectionMinsByTolerance: { 0.005: 6, 0.002: 12, 0.001: 18 },
  },

  shipping: {
    dimDivisor: 139,
    baseFeeCents: 950,
    perLbCents: 85,
    minBillableLb: 1,
    packagingMarginIn: 4,
    baseHeightIn: 1,
    serviceMultipliers: { ground: 1.0, twoDay: 1.85, overnight: 2.85 },
  },
};

export type LeadTimePreset = 'normal' | 'no_rush' | 'rush_only';

export const LEAD_TIME_PRESETS: Record<LeadTimePreset, Record<number, boolean>> = {
  normal: { 7: true, 14: true, 21: true },
  no_rush: { 7: false, 14: true, 21: true },
  rush_only: { 7: true, 14: false, 21: false },
};
