/**
 * Provider routing bootstrap
 *
 * Wires the breaker registry, provider factory, router and dispatcher
 * together. The host registers its providers on `registry`, then calls
 * `handleApplicationStarted()` once the application is up.
 */

import { ConfigManager } from './config/ConfigManager.js';
import { initializeLogger, logger } from './middleware/logging.js';
import type { BaseProvider } from './services/providers/BaseProvider.js';
import { ProviderDispatcher } from './services/providers/ProviderDispatcher.js';
import { ProviderRegistry } from './services/providers/ProviderRegistry.js';
import { ProviderRouter } from './services/providers/ProviderRouter.js';
import { MixedMetadataProvider } from './services/providers/mixed/MixedMetadataProvider.js';
import { CircuitBreakerRegistry } from './services/providers/utils/index.js';

export interface ProviderRoutingOptions {
  registry?: ProviderRegistry;
  breakerRegistry?: CircuitBreakerRegistry;
  /** Instances routed in addition to those the registry builds */
  providers?: BaseProvider[];
}

export interface ProviderRouting {
  registry: ProviderRegistry;
  router: ProviderRouter;
  dispatcher: ProviderDispatcher;
  breakers: CircuitBreakerRegistry;
  /** Initializes routing; later calls do nothing */
  handleApplicationStarted(): void;
  shutdown(): void;
}

export function createProviderRouting(options: ProviderRoutingOptions = {}): ProviderRouting {
  const breakers = options.breakerRegistry ?? CircuitBreakerRegistry.getInstance();
  const registry = options.registry ?? new ProviderRegistry();

  registry.registerProvider(
    MixedMetadataProvider.PROVIDER_ID,
    config => new MixedMetadataProvider(config, { router: () => router, breakerRegistry: breakers })
  );

  const router = new ProviderRouter({ source: registry, providers: options.providers });
  const dispatcher = new ProviderDispatcher(router);

  return {
    registry,
    router,
    dispatcher,
    breakers,
    handleApplicationStarted: () => {
      if (router.isInitialized()) {
        return;
      }
      router.initialize();
    },
    shutdown: () => {
      breakers.dispose();
      router.removeAllListeners();
      logger.info('Provider routing shut down');
    },
  };
}

/**
 * Validate configuration and set up logging before building the routing stack
 */
export function startProviderRouting(options: ProviderRoutingOptions = {}): ProviderRouting {
  const config = ConfigManager.getInstance();
  config.validate();
  initializeLogger();

  const routing = createProviderRouting(options);
  routing.handleApplicationStarted();
  return routing;
}
