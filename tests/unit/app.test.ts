/**
 * Provider routing bootstrap Tests
 */

import { createProviderRouting, startProviderRouting } from '../../src/app.js';
import { initializeLogger } from '../../src/middleware/logging.js';
import { ProviderRegistry } from '../../src/services/providers/ProviderRegistry.js';
import { MixedMetadataProvider } from '../../src/services/providers/mixed/MixedMetadataProvider.js';
import { ARTIST_INFO, ARTIST_SEARCH } from '../../src/services/providers/contracts.js';
import type { CircuitBreakerRegistry } from '../../src/services/providers/utils/CircuitBreakerRegistry.js';
import type { ProviderConfig } from '../../src/types/provider.js';
import {
  createArtist,
  createFakeProvider,
  createTestBreakerRegistry,
  declareAll,
  type FakeMusicProvider,
} from '../providers/helpers.js';

jest.mock('../../src/middleware/logging.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
  initializeLogger: jest.fn(),
}));

describe('createProviderRouting', () => {
  let breakerRegistry: CircuitBreakerRegistry;
  let registry: ProviderRegistry;
  let catalogs: Map<string, FakeMusicProvider>;

  function registerCatalog(id: string, priority: number): void {
    registry.registerProvider(id, (config: ProviderConfig) => {
      const catalog = createFakeProvider(
        { id, enabled: config.enabled, declarations: declareAll(priority) },
        { breakerRegistry }
      );
      catalogs.set(id, catalog);
      return catalog;
    });
  }

  beforeEach(() => {
    breakerRegistry = createTestBreakerRegistry();
    catalogs = new Map();
    registry = new ProviderRegistry({ isProviderEnabled: name => name !== 'metamix' });
  });

  afterEach(() => {
    breakerRegistry.dispose();
  });

  it('should register the music orchestrator', () => {
    createProviderRouting({ registry, breakerRegistry });

    expect(registry.isRegistered(MixedMetadataProvider.PROVIDER_ID)).toBe(true);
  });

  it('should initialize routing once the application has started', () => {
    registerCatalog('catalog', 10);
    const routing = createProviderRouting({ registry, breakerRegistry });

    expect(routing.router.isInitialized()).toBe(false);
    routing.handleApplicationStarted();
    routing.handleApplicationStarted();

    expect(routing.router.isInitialized()).toBe(true);
    expect(routing.router.getActiveProvider(ARTIST_INFO)).toBe(catalogs.get('catalog'));
  });

  it('should route through the orchestrator when several catalogs are enabled', async () => {
    registerCatalog('catalog', 10);
    registerCatalog('archive', 5);
    const routing = createProviderRouting({ registry, breakerRegistry });
    routing.handleApplicationStarted();

    catalogs.get('archive')?.artists.set('artist-1', createArtist('artist-1', 'Archived Artist'));

    expect(routing.router.getActiveProvider(ARTIST_SEARCH)).toBeInstanceOf(MixedMetadataProvider);
    await expect(
      routing.dispatcher.invoke(ARTIST_INFO, api => api.getArtistInfo('artist-1'))
    ).resolves.toEqual(createArtist('artist-1', 'Archived Artist'));
  });

  it('should dispose breakers on shutdown', () => {
    const routing = createProviderRouting({ registry, breakerRegistry });
    const dispose = jest.spyOn(breakerRegistry, 'dispose');

    routing.shutdown();

    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('should set up logging and start routing in one step', () => {
    registerCatalog('catalog', 10);

    const routing = startProviderRouting({ registry, breakerRegistry });

    expect(initializeLogger).toHaveBeenCalledTimes(1);
    expect(routing.router.isInitialized()).toBe(true);
    expect(routing.dispatcher.resolve(ARTIST_INFO)).toBe(catalogs.get('catalog'));
  });
});
