/**
 * Configuration Validator
 * Fail fast on misconfiguration
 *
 * Validates environment variables at startup
 */

import { logger } from '../logger/structured-logger.js';

export interface ConfigRequirements {
  required: string[];
  optional: string[];
}

/**
 * Configuration requirements for the application
 */
export const CONFIG_REQUIREMENTS: ConfigRequirements = {
  required: [],
  optional: [
    'API_KEY',             // Guards /quote; unset leaves quoting open
    'ADMIN_API_KEY',       // Guards /admin; falls back to API_KEY
    'PRICING_KNOBS_FILE',  // JSON knobs layered over the built-in baseline
    'LOG_LEVEL',           // Logging verbosity (debug, info, warn, error, silent)
    'NODE_ENV',            // Environment (development, production)
    'PORT'                 // Server port
  ]
};

export interface ValidationResult {
  valid: boolean;
  missing: string[];
  warnings: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConfigValidator {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Validate configuration against requirements
   * Returns result with missing/warning details
   */
  validate(): ValidationResult {
    const missing: string[] = [];
    const warnings: string[] = [];

    for (const key of CONFIG_REQUIREMENTS.required) {
      if (!this.env[key]) {
        missing.push(key);
      }
    }

    for (const key of CONFIG_REQUIREMENTS.optional) {
      if (!this.env[key]) {
        warnings.push(`Optional config ${key} not set`);
      }
    }

    // Unprotected admin routes are never acceptable in production
    if (this.env.NODE_ENV === 'production' && !this.env.ADMIN_API_KEY && !this.env.API_KEY) {
      missing.push('ADMIN_API_KEY');
    }

    if (this.env.PORT && !Number.isInteger(Number(this.env.PORT))) {
      warnings.push(`PORT is not an integer: ${this.env.PORT}`);
    }

    return {
      valid: missing.length === 0,
      missing,
      warnings
    };
  }

  /**
   * Validate configuration or throw ConfigError
   * Use this at application startup to fail fast
   */
  validateOrThrow(): void {
    const result = this.validate();

    if (!result.valid) {
      const message = `Missing required configuration: ${result.missing.join(', ')}`;

      logger.error({
        missing: result.missing,
        required: CONFIG_REQUIREMENTS.required
      }, 'Configuration validation failed');

      throw new ConfigError(message);
    }

    if (result.warnings.length > 0) {
      logger.warn({
        warnings: result.warnings
      }, 'Configuration warnings');
    }

    logger.info(this.getConfigSummary(), 'Configuration validated');
  }

  /**
   * Get current configuration summary (sanitized)
   */
  getConfigSummary(): Record<string, string | boolean> {
    return {
      logLevel: this.env.LOG_LEVEL || 'info',
      nodeEnv: this.env.NODE_ENV || 'development',
      hasApiKey: !!this.env.API_KEY,
      hasAdminApiKey: !!this.env.ADMIN_API_KEY,
      knobsFile: this.env.PRICING_KNOBS_FILE || 'built-in'
    };
  }
}
