/**
 * Cart Summary
 * Totals for a multi-line checkout; each line ships as its own package.
 */

import { ValidationError } from './pricing.errors.js';
import type { QuoteResult, ShippingRates } from './pricing.types.js';

export interface CartSummary {
  lineCount: number;
  totalQuantity: number;
  itemsTotalCents: number;
  shippingCents: ShippingRates;
  estimatedTotalWeightLb: number;
}

export function summarizeCart(quotes: readonly QuoteResult[]): CartSummary {
  if (quotes.length === 0) {
    throw new ValidationError([{ field: 'items', reason: 'Cart is empty' }]);
  }

  const summary: CartSummary = {
    lineCount: quotes.length,
    totalQuantity: 0,
    itemsTotalCents: 0,
    shippingCents: { groundCents: 0, twoDayCents: 0, overnightCents: 0 },
    estimatedTotalWeightLb: 0,
  };

  for (const quote of quotes) {
    summary.totalQuantity += quote.quantity;
    summary.itemsTotalCents += quote.totalPriceCents;
    summary.shippingCents.groundCents += quote.shippingRates.groundCents;
    summary.shippingCents.twoDayCents += quote.shippingRates.twoDayCents;
    summary.shippingCents.overnightCents += quote.shippingRates.overnightCents;
    summary.estimatedTotalWeightLb += quote.estimatedTotalWeightLb;
  }

  summary.estimatedTotalWeightLb = Math.round(summary.estimatedTotalWeightLb * 100) / 100;
  return summary;
}
