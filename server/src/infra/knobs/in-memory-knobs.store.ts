/**
 * In-memory knobs store (reset on server restart)
 * Copies on every read and write so callers never share the stored object.
 */

import type { PricingOverride } from '../../services/pricing/pricing.types.js';
import type { IKnobsStore, StoredKnobs } from './knobs.store.js';

export class InMemoryKnobsStore implements IKnobsStore {
  private active: StoredKnobs | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async getActive(): Promise<StoredKnobs | null> {
    return this.active ? structuredClone(this.active) : null;
  }

  async save(override: PricingOverride, updatedBy: string): Promise<StoredKnobs> {
    this.active = {
      override: structuredClone(override),
      updatedAt: this.now().toISOString(),
      updatedBy,
    };
    return structuredClone(this.active);
  }

  async reset(): Promise<void> {
    this.active = null;
  }
}
