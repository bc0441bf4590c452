export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface CircuitBreakerDefaults {
  failureThreshold: number;
  resetTimeoutMinutes: number;
  sweepIntervalMinutes: number; // How often collected name-keyed breakers are dropped
}

export interface RoutingConfig {
  fanOutConcurrency: number; // Sources a mixed provider queries at once
}

export interface ProvidersConfig {
  enabled: string[]; // providerName values the user has switched on
}

export interface AppConfig {
  logging: LoggingConfig;
  circuitBreaker: CircuitBreakerDefaults;
  routing: RoutingConfig;
  providers: ProvidersConfig;
}
