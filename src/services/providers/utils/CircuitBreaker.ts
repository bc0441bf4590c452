/**
 * Circuit Breaker Utility
 *
 * Advisory failure counter for one external dependency. Providers check
 * `isOpen()` before an external call and report the outcome afterwards; the
 * breaker never retries or blocks on its own.
 *
 * Recovery is time based: once the reset timeout has passed since the last
 * failure, the next `isOpen()` check resets the counter and reports closed.
 */

import { logger } from '../../../middleware/logging.js';
import { ProviderUnavailableError } from '../../../errors/index.js';

export interface CircuitBreakerConfig {
  threshold: number; // Failures at which the circuit opens
  resetTimeoutMs: number; // Quiet period after the last failure before auto-reset
  name?: string; // Used in log lines and errors
  onOpen?: () => void;
  onClose?: () => void;
}

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failureCount: number;
  threshold: number;
  resetTimeoutMs: number;
  lastFailureTime: string | null;
}

export class CircuitBreaker {
  private failureCount: number = 0;
  private lastFailureTime: number | null = null;
  private opened: boolean = false;

  private readonly threshold: number;
  private readonly resetTimeoutMs: number;
  private readonly name: string;
  private readonly onOpen?: () => void;
  private readonly onClose?: () => void;

  constructor(config: CircuitBreakerConfig) {
    this.threshold = config.threshold;
    this.resetTimeoutMs = config.resetTimeoutMs;
    this.name = config.name ?? 'anonymous';
    this.onOpen = config.onOpen;
    this.onClose = config.onClose;
  }

  /**
   * Run `fn` if the circuit is closed, recording its outcome.
   * Throws ProviderUnavailableError without calling `fn` while open.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      throw new ProviderUnavailableError(this.name, `Circuit breaker is open for ${this.name}`);
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure();
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  /**
   * Record a successful call: one failure is forgiven per success
   */
  recordSuccess(): void {
    this.failureCount = Math.max(0, this.failureCount - 1);
    this.syncState();
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();
    this.syncState();
  }

  /**
   * Check if circuit is open. Auto-resets once the reset timeout has elapsed.
   */
  isOpen(): boolean {
    // Never open without a recorded failure, whatever the threshold
    if (this.failureCount === 0 || this.failureCount < this.threshold) {
      return false;
    }

    if (this.lastFailureTime === null || Date.now() - this.lastFailureTime > this.resetTimeoutMs) {
      logger.debug(`Circuit breaker reset timeout elapsed: ${this.name}`);
      this.reset();
      return false;
    }

    return true;
  }

  getState(): CircuitState {
    return this.isOpen() ? CircuitState.OPEN : CircuitState.CLOSED;
  }

  getStats(): CircuitBreakerStats {
    const state = this.getState();
    return {
      state,
      failureCount: this.failureCount,
      threshold: this.threshold,
      resetTimeoutMs: this.resetTimeoutMs,
      lastFailureTime: this.lastFailureTime
        ? new Date(this.lastFailureTime).toISOString()
        : null,
    };
  }

  reset(): void {
    this.failureCount = 0;
    this.syncState();
  }

  private syncState(): void {
    const open = this.failureCount > 0 && this.failureCount >= this.threshold;
    if (open === this.opened) {
      return;
    }
    this.opened = open;

    if (open) {
      logger.warn('Circuit breaker opened', {
        breaker: this.name,
        failureCount: this.failureCount,
        threshold: this.threshold,
      });
      this.onOpen?.();
    } else {
      logger.info('Circuit breaker closed, normal operation resumed', { breaker: this.name });
      this.onClose?.();
    }
  }
}
