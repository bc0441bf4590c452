/**
 * BaseProvider Abstract Class
 *
 * Base class that all routable providers extend. A provider declares the
 * capability contracts it serves through `defineCapabilities()` and implements
 * their methods directly on the class.
 *
 * Calls to an external catalog should go through `guard()`, which consults and
 * feeds the breaker shared by every instance of the concrete class.
 */

import type { ProviderConfig, TestConnectionResponse } from '../../types/provider.js';
import type { ProviderCapabilities } from '../../types/providers/index.js';
import { CircuitBreaker, CircuitBreakerRegistry } from './utils/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { ProviderError, ProviderUnavailableError } from '../../errors/index.js';

export interface ProviderOptions {
  /** Registry the provider takes its breaker from; defaults to the process-wide one */
  breakerRegistry?: CircuitBreakerRegistry;
}

export abstract class BaseProvider {
  protected config: ProviderConfig;
  protected readonly breakerRegistry: CircuitBreakerRegistry;
  private declared: ProviderCapabilities | null = null;

  constructor(config: ProviderConfig, options: ProviderOptions = {}) {
    this.config = config;
    this.breakerRegistry = options.breakerRegistry ?? CircuitBreakerRegistry.getInstance();
  }

  /**
   * Declare which contracts this provider serves, and at what priority.
   * Called once, on first use, after the subclass constructor has run.
   */
  protected abstract defineCapabilities(): ProviderCapabilities;

  /** Display name used in logs */
  get name(): string {
    return this.getCapabilities().name;
  }

  /** Persisted identity; configuration notifications refer to it */
  get id(): string {
    return this.config.providerName;
  }

  get isMixed(): boolean {
    return this.getCapabilities().mixed;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  getCapabilities(): ProviderCapabilities {
    if (!this.declared) {
      this.declared = this.defineCapabilities();
    }
    return this.declared;
  }

  getConfig(): ProviderConfig {
    return this.config;
  }

  updateConfig(config: ProviderConfig): void {
    if (config.updated_at.getTime() === this.config.updated_at.getTime() && config.enabled === this.config.enabled) {
      return;
    }
    this.config = config;
    logger.debug(`Updated config for provider: ${this.name}`, { enabled: config.enabled });
  }

  setEnabled(enabled: boolean): void {
    this.updateConfig({ ...this.config, enabled, updated_at: new Date() });
  }

  get circuitBreaker(): CircuitBreaker {
    return this.breakerRegistry.getBreakerFor(this);
  }

  /**
   * Report health: a provider is considered healthy while its circuit is closed
   */
  async testConnection(): Promise<TestConnectionResponse> {
    if (this.circuitBreaker.isOpen()) {
      return {
        success: false,
        error: 'Circuit breaker is open - provider experiencing failures',
      };
    }

    return {
      success: true,
      message: 'Provider is healthy',
    };
  }

  /**
   * Run an external call under this provider's circuit breaker.
   * The breaker is only consulted before and updated after; it is never held
   * across the call itself.
   */
  protected async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const breaker = this.circuitBreaker;
    if (breaker.isOpen()) {
      throw new ProviderUnavailableError(
        this.name,
        `${this.name} is temporarily unavailable (circuit open)`,
        { operation }
      );
    }

    try {
      const result = await fn();
      breaker.recordSuccess();
      return result;
    } catch (error) {
      breaker.recordFailure();
      logger.warn(`${this.name} ${operation} failed`, {
        provider: this.name,
        operation,
        error: getErrorMessage(error),
      });

      if (error instanceof ProviderError) {
        throw error;
      }
      throw new ProviderError(
        `${this.name} ${operation} failed: ${getErrorMessage(error)}`,
        this.name,
        undefined,
        true,
        { operation },
        toError(error)
      );
    }
  }
}
