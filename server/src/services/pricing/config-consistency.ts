/**
 * Configuration Consistency
 * Fails with ConfigurationError when the effective knobs cannot price anything
 * (provisioning problem, not bad user input)
 */

import { ConfigurationError } from './pricing.errors.js';
import type { PricingConfiguration } from './pricing.types.js';

export function assertConfigurationConsistent(config: PricingConfiguration): void {
  if (Object.keys(config.pricePerSqIn).length === 0) {
    throw new ConfigurationError('effective price table is empty: no enabled material/thickness has a price');
  }

  if (config.quantityDiscountTiers.length === 0) {
    throw new ConfigurationError('quantity discount tiers are empty');
  }

  for (const [days, enabled] of Object.entries(config.leadTimeEnabled)) {
    if (enabled && config.leadTimeMultiplier[Number(days)] === undefined) {
      throw new ConfigurationError(`lead time ${days} days is enabled but has no multiplier`);
    }
  }

  if (Object.keys(config.leadTimeMultiplier).length === 0) {
    throw new ConfigurationError('no lead time is enabled');
  }

  if (config.leadTimeMultiplier[config.defaultLeadTimeDays] === undefined) {
    throw new ConfigurationError(`default lead time ${config.defaultLeadTimeDays} days is not enabled`);
  }

  const { process, shipping } = config;

  requirePositive('process.millSpeedIpm', process.millSpeedIpm);
  requirePositive('process.chamferSpeedIpm', process.chamferSpeedIpm);
  requirePositive('shipping.dimDivisor', shipping.dimDivisor);

  requireNonNegative('process.cuttingPerLinearIn', process.cuttingPerLinearIn);
  requireNonNegative('process.laborPerHr', process.laborPerHr);
  requireNonNegative('process.loadTimeMins', process.loadTimeMins);
  requireNonNegative('shipping.baseFeeCents', shipping.baseFeeCents);
  requireNonNegative('shipping.perLbCents', shipping.perLbCents);
  requireNonNegative('shipping.minBillableLb', shipping.minBillableLb);
  requireNonNegative('shipping.packagingMarginIn', shipping.packagingMarginIn);
  requireNonNegative('shipping.baseHeightIn', shipping.baseHeightIn);

  for (const [service, multiplier] of Object.entries(shipping.serviceMultipliers)) {
    requireNonNegative(`shipping.serviceMultipliers.${service}`, multiplier);
  }
}

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number (got ${value})`);
  }
}

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number (got ${value})`);
  }
}
