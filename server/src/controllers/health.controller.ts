/**
 * Health Endpoints
 *
 * - /healthz: liveness (plain text, no dependencies)
 * - /api/v1/health: readiness; resolves the effective knobs, so a broken
 *   override surfaces here before customers hit it
 */

import type { Request, Response } from 'express';
import type { PricingConfigProvider } from '../services/pricing-config/pricing-config.provider.js';
import { assertConfigurationConsistent } from '../services/pricing/config-consistency.js';
import { ConfigurationError } from '../services/pricing/pricing.errors.js';

export function livenessHandler(_req: Request, res: Response): void {
  res.status(200).send('ok');
}

export function createReadinessHandler(provider: PricingConfigProvider) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const config = await provider.getEffectiveConfig();
      assertConfigurationConsistent(config);

      res.status(200).json({
        status: 'UP',
        configVersion: config.version,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      const reason = error instanceof ConfigurationError ? error.reason
        : error instanceof Error ? error.message
        : 'unknown';

      req.log.error({ reason }, '[Health] Pricing config not usable');

      res.status(503).json({
        status: 'DOWN',
        reason,
        timestamp: new Date().toISOString()
      });
    }
  };
}
