import type { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  circuitBreaker: {
    failureThreshold: 5,
    resetTimeoutMinutes: 5,
    sweepIntervalMinutes: 15,
  },
  routing: {
    fanOutConcurrency: 4,
  },
  providers: {
    enabled: [],
  },
};
