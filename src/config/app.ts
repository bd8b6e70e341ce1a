/**
 * Application configuration
 * Centralized configuration management with environment validation
 */

import { z } from 'zod';
import { logger } from '../utils/logger';

// Environment validation schema
const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).default('info'),

  // Monitoring
  LOKI_HOST: z.string().optional(),

  // Security
  ALLOWED_ORIGINS: z.string().default('*'),
  TRUST_PROXY: z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true'),

  // Content Limits
  MAX_REQUEST_SIZE: z.string().default('1mb'),

  // Package details
  PACKAGE_VERSION: z.string().default('0.2.0'),
});

export type AppConfig = z.infer<typeof envSchema>;

class ConfigManager {
  private config: AppConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadAndValidateConfig(env);
  }

  /**
   * Load and validate environment configuration
   */
  private loadAndValidateConfig(env: NodeJS.ProcessEnv): AppConfig {
    const result = envSchema.safeParse(env);

    if (!result.success) {
      const errors = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);

      logger.error('Configuration validation failed', { errors });
      throw new Error(`Invalid configuration: ${errors.join(', ')}`);
    }

    logger.debug('Configuration loaded successfully', {
      environment: result.data.NODE_ENV,
      port: result.data.PORT,
      logLevel: result.data.LOG_LEVEL,
    });

    return result.data;
  }

  public getAppConfig() {
    return {
      nodeEnv: this.config.NODE_ENV,
      port: this.config.PORT,
      logLevel: this.config.LOG_LEVEL,
      trustProxy: this.config.TRUST_PROXY,
    };
  }

  public getSecurityConfig() {
    return {
      allowedOrigins: this.config.ALLOWED_ORIGINS,
      maxRequestSize: this.config.MAX_REQUEST_SIZE,
    };
  }

  public getPackageConfig() {
    return {
      npmPackageVersion: this.config.PACKAGE_VERSION,
    };
  }

  public isDevelopment(): boolean {
    return this.config.NODE_ENV === 'development';
  }
}

// Export singleton instance
const configManager = new ConfigManager();
export default configManager;
export { ConfigManager };
