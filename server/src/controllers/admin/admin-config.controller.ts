/**
 * Admin Config Controller
 * GET  /api/v1/admin/config        active override + effective knobs
 * PUT  /api/v1/admin/config        replace the override
 * POST /api/v1/admin/config/reset  drop the override (back to baseline)
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { safeParsePricingOverride } from '../../services/pricing-config/knobs.schema.js';
import type { PricingConfigProvider } from '../../services/pricing-config/pricing-config.provider.js';
import { resolveEffectiveConfig } from '../../services/pricing/config-resolver.js';
import { assertConfigurationConsistent } from '../../services/pricing/config-consistency.js';
import { ConfigurationError } from '../../services/pricing/pricing.errors.js';
import type { IKnobsStore } from '../../infra/knobs/knobs.store.js';
import { requireApiKey } from '../../middleware/api-key.middleware.js';

export interface AdminConfigRouterDeps {
  provider: PricingConfigProvider;
  store: IKnobsStore;
  adminApiKey: string;
}

export function createAdminConfigRouter({ provider, store, adminApiKey }: AdminConfigRouterDeps): Router {
  const router = Router();
  router.use(requireApiKey(adminApiKey, 'admin'));

  router.get('/config', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const active = await store.getActive();
      const effective = await provider.getEffectiveConfig();
      res.json({ active, effective });
    } catch (error) {
      next(error);
    }
  });

  router.put('/config', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = safeParsePricingOverride(req.body);
      if (!parsed.success || !parsed.data) {
        res.status(400).json({
          error: 'INVALID_CONFIG',
          message: parsed.error,
          traceId: req.traceId
        });
        return;
      }

      // Refuse knobs that would make every quote fail
      try {
        assertConfigurationConsistent(resolveEffectiveConfig(provider.getBaseline(), parsed.data));
      } catch (error) {
        if (error instanceof ConfigurationError) {
          res.status(400).json({
            error: 'INCONSISTENT_CONFIG',
            message: error.reason,
            traceId: req.traceId
          });
          return;
        }
        throw error;
      }

      const updatedBy = adminUser(req);
      const saved = await store.save(parsed.data, updatedBy);

      req.log.info({ updatedBy, updatedAt: saved.updatedAt }, '[Admin] Pricing knobs updated');

      res.json({ ok: true, config: saved });
    } catch (error) {
      next(error);
    }
  });

  router.post('/config/reset', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await store.reset();
      req.log.info({ updatedBy: adminUser(req) }, '[Admin] Pricing knobs reset to baseline');

      const effective = await provider.getEffectiveConfig();
      res.json({ ok: true, effective });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

function adminUser(req: Request): string {
  const header = req.headers['x-admin-user'];
  return typeof header === 'string' && header.trim() ? header.trim() : 'admin';
}
