/**
 * Shipping Estimator
 *
 * Package rules:
 * - length/width: product footprint + packaging margin
 * - height: base height for one piece, + one thickness per additional stacked piece
 *
 * Billable weight is the larger of actual and dimensional weight, rounded up
 * to a whole pound.
 */

import type { PackageDimensions, ShippingPolicy, ShippingRates } from './pricing.types.js';

export interface Shipment {
  handleLengthFromBore: number;
  paddleDia: number;
  thickness: number;
  quantity: number;
  totalWeightLb: number;
}

export interface ShippingEstimate {
  packageIn: PackageDimensions;
  dimWeightLb: number;
  billableWeightLb: number;
  rates: ShippingRates;
}

export function estimatePackage(shipment: Shipment, policy: ShippingPolicy): PackageDimensions {
  const paddleRadius = shipment.paddleDia / 2;
  const productLength = shipment.handleLengthFromBore + paddleRadius;
  const productWidth = shipment.paddleDia;

  return {
    length: productLength + policy.packagingMarginIn,
    width: productWidth + policy.packagingMarginIn,
    height: policy.baseHeightIn + Math.max(shipment.quantity - 1, 0) * shipment.thickness,
  };
}

export function estimateShipping(shipment: Shipment, policy: ShippingPolicy): ShippingEstimate {
  const packageIn = estimatePackage(shipment, policy);
  const dimWeightLb = (packageIn.length * packageIn.width * packageIn.height) / policy.dimDivisor;
  const billableWeightLb = Math.ceil(Math.max(shipment.totalWeightLb, dimWeightLb, policy.minBillableLb));

  const baseCents = policy.baseFeeCents + policy.perLbCents * billableWeightLb;
  const { serviceMultipliers } = policy;

  return {
    packageIn,
    dimWeightLb,
    billableWeightLb,
    rates: {
      groundCents: Math.round(baseCents * serviceMultipliers.ground),
      twoDayCents: Math.round(baseCents * serviceMultipliers.twoDay),
      overnightCents: Math.round(baseCents * serviceMultipliers.overnight),
    },
  };
}
