/**
 * Pricing Knobs Store - Interface and Types
 * Holds the admin-edited override layered over the baseline knobs.
 * Only an in-memory implementation ships; a database-backed one slots in
 * behind the same interface.
 */

import type { PricingOverride } from '../../services/pricing/pricing.types.js';

export interface StoredKnobs {
  override: PricingOverride;
  updatedAt: string;  // ISO timestamp
  updatedBy: string;
}

export interface IKnobsStore {
  /**
   * Active override, or null when the baseline applies unchanged
   */
  getActive(): Promise<StoredKnobs | null>;

  /**
   * Replace the active override wholesale
   */
  save(override: PricingOverride, updatedBy: string): Promise<StoredKnobs>;

  /**
   * Drop the override (back to baseline)
   */
  reset(): Promise<void>;
}
