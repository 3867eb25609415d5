import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { ConfigValidator } from './lib/config/config-validator.js';
import { logger } from './lib/logger/structured-logger.js';
import { loadBaselineConfig } from './services/pricing-config/pricing-config.provider.js';

async function main(): Promise<void> {
    new ConfigValidator().validateOrThrow();

    const { port, pricingKnobsFile } = getConfig();
    const baseline = await loadBaselineConfig(pricingKnobsFile);

    if (!process.env.API_KEY) {
        logger.warn('API_KEY is not set. /api/v1/quote is open to anyone.');
    }

    const app = createApp({ baseline });
    const server = app.listen(port, () => {
        logger.info({ port, configVersion: baseline.version }, `Server listening on http://localhost:${port}`);
    });

    function shutdown(signal: NodeJS.Signals) {
        logger.info(`Received ${signal}. Shutting down gracefully...`);
        server.close(() => {
            logger.info('Server closed');
            process.exit(0);
        });
    }

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Server failed to start');
    process.exit(1);
});
