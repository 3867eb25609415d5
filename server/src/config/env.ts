import dotenv from 'dotenv';

dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function resolveLogLevel(value: string | undefined): LogLevel {
    const level = LOG_LEVELS.find(l => l === value);
    return level ?? 'info';
}

export interface AppConfig {
    env: string;
    port: number;
    logLevel: LogLevel;
    apiKey: string;          // empty = quote routes open
    adminApiKey: string;     // falls back to apiKey
    pricingKnobsFile?: string;
}

export function getConfig(): AppConfig {
    const env = process.env.NODE_ENV || 'development';
    const port = Number(process.env.PORT || 3000);
    const logLevel = resolveLogLevel(process.env.LOG_LEVEL);
    const apiKey = (process.env.API_KEY || '').trim();
    const adminApiKey = (process.env.ADMIN_API_KEY || '').trim() || apiKey;
    const pricingKnobsFile = process.env.PRICING_KNOBS_FILE?.trim() || undefined;

    return { env, port, logLevel, apiKey, adminApiKey, pricingKnobsFile };
}
