import express, { Router } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { getConfig } from './config/env.js';
import { DEFAULT_PRICING_CONFIG } from './config/pricing.defaults.js';
import { createQuoteRouter } from './controllers/quote/quote.controller.js';
import { createAdminConfigRouter } from './controllers/admin/admin-config.controller.js';
import { livenessHandler, createReadinessHandler } from './controllers/health.controller.js';
import { InMemoryKnobsStore } from './infra/knobs/in-memory-knobs.store.js';
import type { IKnobsStore } from './infra/knobs/knobs.store.js';
import { PricingConfigProvider } from './services/pricing-config/pricing-config.provider.js';
import type { PricingConfiguration } from './services/pricing/pricing.types.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorHandlerMiddleware } from './middleware/error-handler.middleware.js';

export interface AppDeps {
    baseline?: PricingConfiguration;
    store?: IKnobsStore;
    apiKey?: string;
    adminApiKey?: string;
}

export function createApp(deps: AppDeps = {}) {
    const env = getConfig();
    const store = deps.store ?? new InMemoryKnobsStore();
    const provider = new PricingConfigProvider(deps.baseline ?? DEFAULT_PRICING_CONFIG, store);
    const apiKey = deps.apiKey ?? env.apiKey;
    const adminApiKey = deps.adminApiKey ?? env.adminApiKey;

    const app = express();

    // Request context & logging (BEFORE body parsing, so parse errors carry a traceId)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);

    app.use(helmet());
    app.use(compression());
    app.use(express.json({ limit: '1mb' }));
    app.use(cors()); // keep permissive for dev; restrict via env in server.ts if needed

    const api = Router();
    api.get('/health', createReadinessHandler(provider));
    api.use(createQuoteRouter({ provider, apiKey }));
    api.use('/admin', createAdminConfigRouter({ provider, store, adminApiKey }));

    app.use('/api/v1', api);
    app.use('/api', api);   // legacy unversioned paths

    app.get('/healthz', livenessHandler);

    app.use(errorHandlerMiddleware);

    return app;
}
