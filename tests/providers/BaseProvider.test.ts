/**
 * BaseProvider Tests
 */

import { ARTIST_INFO } from '../../src/services/providers/contracts.js';
import type { CircuitBreakerRegistry } from '../../src/services/providers/utils/CircuitBreakerRegistry.js';
import { ProviderError, ProviderUnavailableError } from '../../src/errors/index.js';
import {
  createArtist,
  createFakeProvider,
  createTestBreakerRegistry,
  FakeMusicProvider,
} from './helpers.js';

jest.mock('../../src/middleware/logging.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('BaseProvider', () => {
  let breakerRegistry: CircuitBreakerRegistry;
  let provider: FakeMusicProvider;

  beforeEach(() => {
    breakerRegistry = createTestBreakerRegistry(2, 1);
    provider = createFakeProvider(
      { id: 'catalog', name: 'Catalog', declarations: [{ contract: ARTIST_INFO, priority: 1 }] },
      { breakerRegistry }
    );
  });

  afterEach(() => {
    breakerRegistry.dispose();
  });

  it('should expose identity from config and capabilities', () => {
    expect(provider.id).toBe('catalog');
    expect(provider.name).toBe('Catalog');
    expect(provider.isMixed).toBe(false);
    expect(provider.isEnabled()).toBe(true);
  });

  it('should wrap failures in ProviderError and count them', async () => {
    provider.failure = new Error('catalog timeout');

    await expect(provider.getArtistInfo('artist-1')).rejects.toThrow(ProviderError);
    await expect(provider.getArtistInfo('artist-1')).rejects.toThrow(
      'Catalog getArtistInfo failed: catalog timeout'
    );
    expect(provider.circuitBreaker.isOpen()).toBe(true);
  });

  it('should refuse calls while the circuit is open', async () => {
    provider.failure = new Error('catalog timeout');
    await expect(provider.getArtistInfo('artist-1')).rejects.toThrow(ProviderError);
    await expect(provider.getArtistInfo('artist-1')).rejects.toThrow(ProviderError);

    provider.failure = null;
    await expect(provider.getArtistInfo('artist-1')).rejects.toThrow(ProviderUnavailableError);

    const health = await provider.testConnection();
    expect(health).toEqual({
      success: false,
      error: 'Circuit breaker is open - provider experiencing failures',
    });
  });

  it('should share the breaker across instances of the same class', () => {
    const first = new FakeMusicProvider({ id: 'first', declarations: [] }, { breakerRegistry });
    const second = new FakeMusicProvider({ id: 'second', declarations: [] }, { breakerRegistry });

    expect(first.circuitBreaker).toBe(second.circuitBreaker);
    expect(first.circuitBreaker).not.toBe(provider.circuitBreaker);
  });

  it('should forgive a failure after a success', async () => {
    provider.artists.set('artist-1', createArtist('artist-1', 'Test Artist'));
    provider.failure = new Error('catalog timeout');
    await expect(provider.getArtistInfo('artist-1')).rejects.toThrow(ProviderError);

    provider.failure = null;
    await expect(provider.getArtistInfo('artist-1')).resolves.toEqual(createArtist('artist-1', 'Test Artist'));
    expect(provider.circuitBreaker.getStats().failureCount).toBe(0);
  });

  it('should update enabled state with a new timestamp', () => {
    const before = provider.getConfig().updated_at;

    provider.setEnabled(false);

    expect(provider.isEnabled()).toBe(false);
    expect(provider.getConfig().updated_at).not.toBe(before);
  });
});
