/**
 * Plate Pricing Engine
 *
 * Pure calculation: (inputs, effective config) -> itemized quote + shipping.
 * No I/O, no clock, no shared state. Only ValidationError and
 * ConfigurationError ever leave calculateQuote.
 */

import { assertConfigurationConsistent } from './config-consistency.js';
import { ConfigurationError, isPricingError } from './pricing.errors.js';
import { resolveQuantityMultiplier } from './quantity-discount.js';
import { validateQuoteInputs } from './quote-validator.js';
import { estimateShipping } from './shipping-estimator.js';
import { roundTo, toCents } from './rounding.js';
import type { PricingConfiguration, QuoteInputs, QuoteResult } from './pricing.types.js';

/**
 * Legacy approximation from the shop costing sheet.
 * Every historical quote was computed with it; do not swap in Math.PI.
 */
export const LEGACY_PI = 3.14;

export interface CostBreakdown {
  areaSqIn: number;
  linearInches: number;
  materialCost: number;
  cuttingCost: number;
  boreMachiningCost: number;
  chamferCost: number;
  loadCost: number;
  inspectionCost: number;
  subtotal: number;
}

export function calculateQuote(inputs: QuoteInputs, config: PricingConfiguration): QuoteResult {
  try {
    assertConfigurationConsistent(config);
    validateQuoteInputs(inputs, config);
    return assertFinite(computeQuote(inputs, config));
  } catch (error) {
    if (isPricingError(error)) {
      throw error;
    }
    const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    throw new ConfigurationError(`unexpected pricing failure (${detail})`);
  }
}

/**
 * Geometry + per-unit process costs, unrounded
 */
export function computeCostBreakdown(inputs: QuoteInputs, config: PricingConfiguration): CostBreakdown {
  const { process } = config;

  const paddleRadius = inputs.paddleDia / 2;
  const areaSqIn = inputs.paddleDia * (inputs.handleLengthFromBore + paddleRadius);
  const linearInches = inputs.handleWidth + inputs.handleLengthFromBore * 2 + paddleRadius * LEGACY_PI;

  const materialCost = areaSqIn * config.pricePerSqIn[inputs.material][inputs.thickness];
  const cuttingCost = linearInches * process.cuttingPerLinearIn;

  const boreCircumference = LEGACY_PI * inputs.boreDia;
  const boreMachiningCost = boreCircumference * (process.laborPerHr / process.millSpeedIpm) * 2;
  const chamferCost = inputs.chamfer
    ? boreCircumference * (process.laborPerHr / process.chamferSpeedIpm) * 2
    : 0;

  const laborPerMin = process.laborPerHr / 60;
  const loadCost = laborPerMin * process.loadTimeMins;
  const inspectionCost = laborPerMin * process.inspectionMinsByTolerance[inputs.boreTolerance];

  const subtotal = materialCost + cuttingCost + boreMachiningCost + chamferCost + loadCost + inspectionCost;

  return {
    areaSqIn,
    linearInches,
    materialCost,
    cuttingCost,
    boreMachiningCost,
    chamferCost,
    loadCost,
    inspectionCost,
    subtotal,
  };
}

function computeQuote(inputs: QuoteInputs, config: PricingConfiguration): QuoteResult {
  const costs = computeCostBreakdown(inputs, config);

  const leadTimeMultiplier = config.leadTimeMultiplier[inputs.shipsInDays];
  const unitPricePreDiscount = costs.subtotal * leadTimeMultiplier;
  const quantityDiscountMultiplier = resolveQuantityMultiplier(config.quantityDiscountTiers, inputs.quantity);
  const unitPrice = unitPricePreDiscount * quantityDiscountMultiplier;
  const totalPrice = unitPrice * inputs.quantity;

  const density = config.densityLbPerIn3[inputs.material];
  if (density === undefined) {
    throw new ConfigurationError(`no density configured for material ${inputs.material}`);
  }
  const weightMultiplier = config.weightMultiplierByMaterial[inputs.material] ?? 1.0;
  const unitWeightLb = costs.areaSqIn * inputs.thickness * density * weightMultiplier;
  const totalWeightLb = unitWeightLb * inputs.quantity;

  const shipping = estimateShipping(
    {
      handleLengthFromBore: inputs.handleLengthFromBore,
      paddleDia: inputs.paddleDia,
      thickness: inputs.thickness,
      quantity: inputs.quantity,
      totalWeightLb,
    },
    config.shipping
  );

  return {
    areaSqIn: roundTo(costs.areaSqIn, 4),
    linearInches: roundTo(costs.linearInches, 4),

    materialCost: roundTo(costs.materialCost, 2),
    cuttingCost: roundTo(costs.cuttingCost, 2),
    boreMachiningCost: roundTo(costs.boreMachiningCost, 2),
    chamferCost: roundTo(costs.chamferCost, 2),
    loadCost: roundTo(costs.loadCost, 2),
    inspectionCost: roundTo(costs.inspectionCost, 2),
    subtotalPreMultiplier: roundTo(costs.subtotal, 2),

    leadTimeMultiplier,
    unitPricePreDiscount: roundTo(unitPricePreDiscount, 2),
    quantityDiscountMultiplier,
    unitPrice: roundTo(unitPrice, 2),
    quantity: inputs.quantity,
    totalPrice: roundTo(totalPrice, 2),
    totalPriceCents: toCents(totalPrice),

    estimatedUnitWeightLb: roundTo(unitWeightLb, 2),
    estimatedTotalWeightLb: roundTo(totalWeightLb, 2),
    estimatedPackageIn: {
      length: roundTo(shipping.packageIn.length, 2),
      width: roundTo(shipping.packageIn.width, 2),
      height: roundTo(shipping.packageIn.height, 2),
    },
    dimWeightLb: roundTo(shipping.dimWeightLb, 2),
    billableWeightLb: shipping.billableWeightLb,
    shippingRates: shipping.rates,

    material: inputs.material,
    thickness: inputs.thickness,
    shipsInDays: inputs.shipsInDays,
    handleLabel: inputs.handleLabel,
    chamferWidth: inputs.chamferWidth,
    configVersion: config.version,
  };
}

function assertFinite(result: QuoteResult): QuoteResult {
  const numeric: Array<[string, number]> = [
    ['areaSqIn', result.areaSqIn],
    ['linearInches', result.linearInches],
    ['subtotalPreMultiplier', result.subtotalPreMultiplier],
    ['leadTimeMultiplier', result.leadTimeMultiplier],
    ['quantityDiscountMultiplier', result.quantityDiscountMultiplier],
    ['unitPrice', result.unitPrice],
    ['totalPrice', result.totalPrice],
    ['estimatedTotalWeightLb', result.estimatedTotalWeightLb],
    ['dimWeightLb', result.dimWeightLb],
    ['billableWeightLb', result.billableWeightLb],
    ['shippingRates.groundCents', result.shippingRates.groundCents],
    ['shippingRates.twoDayCents', result.shippingRates.twoDayCents],
    ['shippingRates.overnightCents', result.shippingRates.overnightCents],
  ];

  for (const [name, value] of numeric) {
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`pricing produced a non-finite ${name} (${value})`);
    }
  }
  return result;
}
