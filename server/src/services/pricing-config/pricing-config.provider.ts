/**
 * Pricing Config Provider
 *
 * Produces a fresh effective configuration per calculation:
 *   baseline (loaded once) ∪ active admin override (read from the store)
 *
 * Nothing here is mutated between requests, so quotes run in parallel without
 * a lock.
 */

import { readFile } from 'fs/promises';
import { DEFAULT_PRICING_CONFIG } from '../../config/pricing.defaults.js';
import { mergeOverride, resolveEffectiveConfig } from '../pricing/config-resolver.js';
import { ConfigurationError } from '../pricing/pricing.errors.js';
import type { PricingConfiguration } from '../pricing/pricing.types.js';
import type { IKnobsStore } from '../../infra/knobs/knobs.store.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { safeParsePricingOverride } from './knobs.schema.js';

export class PricingConfigProvider {
  constructor(
    private readonly baseline: PricingConfiguration,
    private readonly store: IKnobsStore
  ) {}

  getBaseline(): PricingConfiguration {
    return this.baseline;
  }

  async getEffectiveConfig(): Promise<PricingConfiguration> {
    const active = await this.store.getActive();
    if (!active) {
      return resolveEffectiveConfig(this.baseline);
    }

    return resolveEffectiveConfig(this.baseline, {
      ...active.override,
      version: active.override.version ?? `${this.baseline.version}+override@${active.updatedAt}`,
    });
  }
}

/**
 * Built-in defaults, optionally layered with a JSON knobs file
 * @throws {ConfigurationError} if the file cannot be read or decoded
 */
export async function loadBaselineConfig(knobsFile?: string): Promise<PricingConfiguration> {
  if (!knobsFile) {
    return DEFAULT_PRICING_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(knobsFile, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`cannot read knobs file ${knobsFile}: ${reason}`);
  }

  const parsed = safeParsePricingOverride(raw);
  if (!parsed.success || !parsed.data) {
    throw new ConfigurationError(`invalid knobs file ${knobsFile}: ${parsed.error ?? 'unknown error'}`);
  }

  const baseline = mergeOverride(DEFAULT_PRICING_CONFIG, parsed.data);
  logger.info({ knobsFile, version: baseline.version }, '[PricingConfig] Baseline knobs loaded from file');
  return baseline;
}
