/**
 * Provider Registry
 *
 * Factory for provider instances. Implementations register a factory under
 * their persisted id; the registry builds and caches instances from
 * configuration and hands the router one instance per implementation.
 */

import type { BaseProvider } from './BaseProvider.js';
import type { ProviderSource } from './ProviderRouter.js';
import type { ProviderConfig } from '../../types/provider.js';
import { ConfigManager } from '../../config/ConfigManager.js';
import { logger } from '../../middleware/logging.js';
import { ValidationError } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export type ProviderFactory = (config: ProviderConfig) => BaseProvider;

export type ProviderEnablement = Pick<ConfigManager, 'isProviderEnabled'>;

export class ProviderRegistry implements ProviderSource {
  private readonly factories = new Map<string, ProviderFactory>();
  private readonly instances = new Map<string, BaseProvider>(); // Cache provider instances

  constructor(private readonly enablement: ProviderEnablement = ConfigManager.getInstance()) {}

  /**
   * Register a provider implementation under its persisted id
   */
  registerProvider(providerId: string, factory: ProviderFactory): void {
    if (this.factories.has(providerId)) {
      logger.warn(`Provider already registered, replacing factory: ${providerId}`);
      this.invalidateCache(providerId);
    }
    this.factories.set(providerId, factory);
    logger.debug(`Registered provider: ${providerId}`);
  }

  isRegistered(providerId: string): boolean {
    return this.factories.has(providerId);
  }

  getRegisteredProviderIds(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Create provider instance from configuration
   * Returns cached instance if available
   */
  createProvider(config: ProviderConfig): BaseProvider {
    // Configs that were never persisted (id=0) share one cache slot
    const cacheKey = config.id === 0
      ? `${config.providerName}_default`
      : `${config.providerName}_${config.id}`;

    const cached = this.instances.get(cacheKey);
    if (cached) {
      cached.updateConfig(config);
      return cached;
    }

    const factory = this.factories.get(config.providerName);
    if (!factory) {
      throw new ValidationError(`Unknown provider: ${config.providerName}`);
    }

    const instance = factory(config);
    this.instances.set(cacheKey, instance);

    logger.debug(`Created provider instance: ${config.providerName}`, {
      configId: config.id,
    });

    return instance;
  }

  /**
   * Cached instance for a provider id, or null if none was created yet
   */
  getProvider(providerId: string): BaseProvider | null {
    for (const instance of this.instances.values()) {
      if (instance.id === providerId) {
        return instance;
      }
    }
    return null;
  }

  /**
   * One instance per registered provider, reusing cached instances.
   * New instances take their enabled flag from configuration.
   */
  getAvailableProviders(): BaseProvider[] {
    const providers: BaseProvider[] = [];

    for (const providerId of this.factories.keys()) {
      const existing = this.getProvider(providerId);
      if (existing) {
        providers.push(existing);
        continue;
      }

      try {
        providers.push(this.createProvider(this.defaultConfig(providerId)));
      } catch (error) {
        logger.error(`Failed to create provider: ${providerId}`, {
          error: getErrorMessage(error),
        });
      }
    }

    return providers;
  }

  /**
   * Invalidate cached instances (e.g., after config change)
   */
  invalidateCache(providerId: string): void {
    let invalidatedCount = 0;
    for (const [key, instance] of this.instances.entries()) {
      if (instance.id === providerId) {
        this.instances.delete(key);
        invalidatedCount++;
      }
    }

    if (invalidatedCount > 0) {
      logger.debug(`Invalidated ${invalidatedCount} cached instances for ${providerId}`);
    }
  }

  clearCache(): void {
    const count = this.instances.size;
    this.instances.clear();
    logger.debug(`Cleared ${count} cached provider instances`);
  }

  private defaultConfig(providerId: string): ProviderConfig {
    const now = new Date();
    return {
      id: 0,
      providerName: providerId,
      enabled: this.enablement.isProviderEnabled(providerId),
      created_at: now,
      updated_at: now,
    };
  }
}
