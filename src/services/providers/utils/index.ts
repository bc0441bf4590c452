export * from './CircuitBreaker.js';
export * from './CircuitBreakerRegistry.js';
