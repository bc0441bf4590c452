/**
 * Circuit Breaker Registry
 *
 * Hands out shared breakers so that unrelated call sites talking to the same
 * logical provider see the same failure state.
 *
 * - Class-keyed breakers live for the life of the process.
 * - Name-keyed breakers are only weakly held. A breaker nobody references any
 *   more may be collected and is recreated (with an empty history) on the next
 *   lookup; a periodic sweep drops the dead map entries.
 */

import { CircuitBreaker } from './CircuitBreaker.js';
import { ConfigManager } from '../../../config/ConfigManager.js';
import type { CircuitBreakerDefaults } from '../../../config/types.js';
import { logger } from '../../../middleware/logging.js';
import { ConfigurationError } from '../../../errors/index.js';

const MS_PER_MINUTE = 60_000;

/**
 * Type identity used as a breaker key: any class, abstract or not
 */
export type BreakerClass = abstract new (...args: never[]) => object;

export type BreakerKey = string | BreakerClass;

export class CircuitBreakerRegistry {
  private static instance: CircuitBreakerRegistry | undefined;

  private readonly classBreakers = new Map<Function, CircuitBreaker>();
  private readonly namedBreakers = new Map<string, WeakRef<CircuitBreaker>>();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(private readonly defaults: CircuitBreakerDefaults) {}

  /**
   * Process-wide registry built from the configured defaults
   */
  static getInstance(): CircuitBreakerRegistry {
    if (!CircuitBreakerRegistry.instance) {
      CircuitBreakerRegistry.instance = new CircuitBreakerRegistry(
        ConfigManager.getInstance().getCircuitBreakerDefaults()
      );
    }
    return CircuitBreakerRegistry.instance;
  }

  getBreaker(key: BreakerKey): CircuitBreaker {
    return this.getOrCreate(key, this.defaults.failureThreshold, this.defaults.resetTimeoutMinutes);
  }

  /**
   * Breaker for the class of `instance`
   */
  getBreakerFor(instance: object): CircuitBreaker {
    return this.getOrCreateForClass(
      instance.constructor,
      this.defaults.failureThreshold,
      this.defaults.resetTimeoutMinutes
    );
  }

  /**
   * Threshold and timeout only apply when this call creates the breaker;
   * later calls return the existing instance unchanged.
   *
   * @throws ConfigurationError if threshold is below 1 or the timeout is negative
   */
  getCustomBreaker(key: BreakerKey, threshold: number, resetTimeoutMinutes: number): CircuitBreaker {
    const name = typeof key === 'string' ? key : key.name || 'anonymous';
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new ConfigurationError(
        `circuitBreaker.${name}.threshold`,
        `Circuit breaker threshold for ${name} must be a whole number of at least 1, got ${threshold}`
      );
    }
    if (!Number.isFinite(resetTimeoutMinutes) || resetTimeoutMinutes < 0) {
      throw new ConfigurationError(
        `circuitBreaker.${name}.resetTimeoutMinutes`,
        `Circuit breaker reset timeout for ${name} must not be negative, got ${resetTimeoutMinutes}`
      );
    }
    return this.getOrCreate(key, threshold, resetTimeoutMinutes);
  }

  /**
   * Drop name-keyed entries whose breaker has been collected
   */
  sweep(): number {
    let removed = 0;
    for (const [name, ref] of this.namedBreakers) {
      if (ref.deref() === undefined) {
        this.namedBreakers.delete(name);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug(`Swept ${removed} collected circuit breakers`);
    }
    return removed;
  }

  /**
   * Number of tracked breakers, dead weak entries included until swept
   */
  size(): { classKeyed: number; nameKeyed: number } {
    return { classKeyed: this.classBreakers.size, nameKeyed: this.namedBreakers.size };
  }

  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private getOrCreate(key: BreakerKey, threshold: number, resetTimeoutMinutes: number): CircuitBreaker {
    if (typeof key === 'string') {
      return this.getOrCreateNamed(key, threshold, resetTimeoutMinutes);
    }
    return this.getOrCreateForClass(key, threshold, resetTimeoutMinutes);
  }

  private getOrCreateForClass(
    type: Function,
    threshold: number,
    resetTimeoutMinutes: number
  ): CircuitBreaker {
    const existing = this.classBreakers.get(type);
    if (existing) {
      return existing;
    }

    const breaker = this.create(type.name || 'anonymous', threshold, resetTimeoutMinutes);
    this.classBreakers.set(type, breaker);
    return breaker;
  }

  private getOrCreateNamed(name: string, threshold: number, resetTimeoutMinutes: number): CircuitBreaker {
    const existing = this.namedBreakers.get(name)?.deref();
    if (existing) {
      return existing;
    }

    const breaker = this.create(name, threshold, resetTimeoutMinutes);
    this.namedBreakers.set(name, new WeakRef(breaker));
    this.ensureSweepTimer();
    return breaker;
  }

  private create(name: string, threshold: number, resetTimeoutMinutes: number): CircuitBreaker {
    logger.debug(`Creating circuit breaker: ${name}`, { threshold, resetTimeoutMinutes });
    return new CircuitBreaker({
      name,
      threshold,
      resetTimeoutMs: resetTimeoutMinutes * MS_PER_MINUTE,
    });
  }

  private ensureSweepTimer(): void {
    if (this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.defaults.sweepIntervalMinutes * MS_PER_MINUTE);
    // Never keep the process alive just to sweep
    this.sweepTimer.unref();
  }
}
