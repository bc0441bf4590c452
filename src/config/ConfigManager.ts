import dotenv from 'dotenv';
import { z } from 'zod';
import type { AppConfig, CircuitBreakerDefaults, LoggingConfig, RoutingConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ValidationError } from '../errors/index.js';

const appConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    file: z.object({
      enabled: z.boolean(),
      path: z.string().min(1, 'Log file path must not be empty'),
      maxSize: z.string().min(1),
      maxFiles: z.number().int().min(1),
    }),
    console: z.object({
      enabled: z.boolean(),
      colorize: z.boolean(),
    }),
  }),
  circuitBreaker: z.object({
    failureThreshold: z.number().int().min(1, 'Breaker threshold must be at least 1'),
    resetTimeoutMinutes: z.number().min(0, 'Breaker reset timeout must not be negative'),
    sweepIntervalMinutes: z.number().positive('Breaker sweep interval must be positive'),
  }),
  routing: z.object({
    fanOutConcurrency: z.number().int().min(1, 'Fan-out concurrency must be at least 1'),
  }),
  providers: z.object({
    enabled: z.array(z.string().min(1)),
  }),
});

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    // Circuit breaker defaults
    config.circuitBreaker.failureThreshold = this.getNumber(
      'CIRCUIT_BREAKER_THRESHOLD',
      config.circuitBreaker.failureThreshold
    );
    config.circuitBreaker.resetTimeoutMinutes = this.getNumber(
      'CIRCUIT_BREAKER_RESET_MINUTES',
      config.circuitBreaker.resetTimeoutMinutes
    );
    config.circuitBreaker.sweepIntervalMinutes = this.getNumber(
      'CIRCUIT_BREAKER_SWEEP_MINUTES',
      config.circuitBreaker.sweepIntervalMinutes
    );

    // Routing
    config.routing.fanOutConcurrency = this.getNumber(
      'ROUTING_FANOUT_CONCURRENCY',
      config.routing.fanOutConcurrency
    );

    // Provider enablement
    config.providers.enabled = this.getStringArray('ENABLED_PROVIDERS', config.providers.enabled);

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value ? value : defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new ValidationError(`Environment variable ${key} must be a valid number`, [
        `${key}: ${value}`,
      ]);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getStringArray(key: string, defaultValue: string[]): string[] {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ValidationError(`Environment variable ${key} must be one of: ${validValues.join(', ')}`, [
        `${key}: ${value}`,
      ]);
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  getCircuitBreakerDefaults(): CircuitBreakerDefaults {
    return this.config.circuitBreaker;
  }

  getRoutingConfig(): RoutingConfig {
    return this.config.routing;
  }

  isProviderEnabled(providerName: string): boolean {
    return this.config.providers.enabled.includes(providerName);
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    const result = appConfigSchema.safeParse(this.config);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Configuration validation failed:\n${issues.join('\n')}`, issues);
    }
  }
}
