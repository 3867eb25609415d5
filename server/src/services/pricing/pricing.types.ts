/**
 * Pricing Types
 * Inputs, tuning knobs and quote output for the plate pricing engine
 */

// ============================================================================
// Configuration
// ============================================================================

export interface QuantityDiscountTier {
  minQty: number;
  multiplier: number;       // <= 1.0, applied to the unit price
}

export interface ProcessRates {
  cuttingPerLinearIn: number;                        // $ per inch of profile cut
  laborPerHr: number;                                // mill labor $/h
  millSpeedIpm: number;
  chamferSpeedIpm: number;
  loadTimeMins: number;
  inspectionMinsByTolerance: Record<number, number>; // tolerance class -> minutes
}

export type ShippingService = 'ground' | 'twoDay' | 'overnight';

export interface ShippingPolicy {
  dimDivisor: number;
  baseFeeCents: number;
  perLbCents: number;
  minBillableLb: number;
  packagingMarginIn: number;  // added to package length and width
  baseHeightIn: number;       // package height for a single piece
  serviceMultipliers: Record<ShippingService, number>;
}

export interface PricingConfiguration {
  version: string;
  pricePerSqIn: Record<string, Record<number, number>>;
  materialEnabled: Record<string, boolean>;
  thicknessEnabledByMaterial: Record<string, Record<number, boolean>>;
  leadTimeMultiplier: Record<number, number>;
  leadTimeEnabled: Record<number, boolean>;
  defaultLeadTimeDays: number;
  quantityDiscountTiers: QuantityDiscountTier[];
  densityLbPerIn3: Record<string, number>;
  weightMultiplierByMaterial: Record<string, number>;
  process: ProcessRates;
  shipping: ShippingPolicy;
}

/**
 * Partial knobs layered over the baseline.
 * Tables replace the baseline table wholesale; process/shipping merge one level.
 */
export type PricingOverride = Partial<Omit<PricingConfiguration, 'process' | 'shipping'>> & {
  process?: Partial<ProcessRates>;
  shipping?: Partial<ShippingPolicy>;
};

// ============================================================================
// Inputs
// ============================================================================

export interface QuoteInputs {
  readonly quantity: number;
  readonly material: string;
  readonly thickness: number;
  readonly handleWidth: number;
  readonly handleLengthFromBore: number;
  readonly paddleDia: number;
  readonly boreDia: number;
  readonly boreTolerance: number;
  readonly chamfer: boolean;
  readonly chamferWidth: number | null;
  readonly shipsInDays: number;
  readonly handleLabel: string;
}

// ============================================================================
// Output
// ============================================================================

export interface PackageDimensions {
  length: number;
  width: number;
  height: number;
}

export interface ShippingRates {
  groundCents: number;
  twoDayCents: number;
  overnightCents: number;
}

export interface QuoteResult {
  // Geometry
  areaSqIn: number;
  linearInches: number;

  // Cost breakdown (per unit, before multipliers)
  materialCost: number;
  cuttingCost: number;
  boreMachiningCost: number;
  chamferCost: number;
  loadCost: number;
  inspectionCost: number;
  subtotalPreMultiplier: number;

  // Pricing
  leadTimeMultiplier: number;
  unitPricePreDiscount: number;
  quantityDiscountMultiplier: number;
  unitPrice: number;
  quantity: number;
  totalPrice: number;
  totalPriceCents: number;

  // Shipping
  estimatedUnitWeightLb: number;
  estimatedTotalWeightLb: number;
  estimatedPackageIn: PackageDimensions;
  dimWeightLb: number;
  billableWeightLb: number;
  shippingRates: ShippingRates;

  // Echo
  material: string;
  thickness: number;
  shipsInDays: number;
  handleLabel: string;
  chamferWidth: number | null;
  configVersion: string;
}
