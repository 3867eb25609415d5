/**
 * Quote Controller
 * POST /api/v1/quote        single part
 * POST /api/v1/quote/cart   several parts, summed for checkout
 * GET  /api/v1/config/active what can be ordered right now
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import { calculateQuote } from '../../services/pricing/pricing-engine.js';
import { createQuoteInputs } from '../../services/pricing/quote-inputs.js';
import { summarizeCart } from '../../services/pricing/cart.js';
import { ValidationError, type ValidationIssue } from '../../services/pricing/pricing.errors.js';
import type { PricingConfiguration, QuoteResult } from '../../services/pricing/pricing.types.js';
import type { PricingConfigProvider } from '../../services/pricing-config/pricing-config.provider.js';
import { describeAvailability } from '../../services/pricing-config/availability.js';
import { requireApiKey } from '../../middleware/api-key.middleware.js';

export const MAX_CART_ITEMS = 50;

const cartRequestSchema = z.object({
  items: z.array(z.unknown()).max(MAX_CART_ITEMS),
});

export interface QuoteRouterDeps {
  provider: PricingConfigProvider;
  apiKey: string;
}

export function createQuoteRouter({ provider, apiKey }: QuoteRouterDeps): Router {
  const router = Router();
  const guard = requireApiKey(apiKey, 'quote');

  router.post('/quote', guard, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const config = await provider.getEffectiveConfig();
      const inputs = createQuoteInputs(req.body, { defaultShipsInDays: config.defaultLeadTimeDays });
      const quote = calculateQuote(inputs, config);

      req.log.info({
        material: quote.material,
        thickness: quote.thickness,
        quantity: quote.quantity,
        totalPrice: quote.totalPrice,
        configVersion: quote.configVersion
      }, '[Quote] Calculated');

      res.json(quote);
    } catch (error) {
      next(error);
    }
  });

  router.post('/quote/cart', guard, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = cartRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map(e => ({
          field: e.path.join('.') || 'items',
          reason: e.message
        })));
      }

      const config = await provider.getEffectiveConfig();
      const items = quoteCartItems(parsed.data.items, config);
      const summary = summarizeCart(items);

      req.log.info({
        lineCount: summary.lineCount,
        itemsTotalCents: summary.itemsTotalCents,
        configVersion: config.version
      }, '[Quote] Cart calculated');

      res.json({ items, summary });
    } catch (error) {
      next(error);
    }
  });

  router.get('/config/active', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const config = await provider.getEffectiveConfig();
      res.json(describeAvailability(config));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

/**
 * Quote every line against the same effective config.
 * Input problems from all lines are reported together, prefixed with the line index.
 */
function quoteCartItems(rawItems: unknown[], config: PricingConfiguration): QuoteResult[] {
  const quotes: QuoteResult[] = [];
  const issues: ValidationIssue[] = [];

  rawItems.forEach((raw, index) => {
    try {
      const inputs = createQuoteInputs(raw, { defaultShipsInDays: config.defaultLeadTimeDays });
      quotes.push(calculateQuote(inputs, config));
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      for (const issue of error.issues) {
        issues.push({
          ...issue,
          field: `items.${index}.${issue.field}`,
          relatedFields: issue.relatedFields?.map(f => `items.${index}.${f}`)
        });
      }
    }
  });

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
  return quotes;
}
