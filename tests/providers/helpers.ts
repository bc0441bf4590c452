/**
 * Provider Test Helpers
 *
 * Configurable in-memory providers for routing tests.
 */

import { BaseProvider, type ProviderOptions } from '../../src/services/providers/BaseProvider.js';
import {
  ALBUM_INFO,
  ALBUM_SEARCH,
  ARTIST_INFO,
  ARTIST_SEARCH,
  type AlbumInfoApi,
  type AlbumSearchApi,
  type ArtistInfoApi,
  type ArtistSearchApi,
} from '../../src/services/providers/contracts.js';
import { CircuitBreakerRegistry } from '../../src/services/providers/utils/CircuitBreakerRegistry.js';
import type { ProviderConfig } from '../../src/types/provider.js';
import type { CapabilityDeclaration, ProviderCapabilities } from '../../src/types/providers/index.js';
import type { Album, Artist } from '../../src/types/music.js';

/**
 * Create a mock provider config for testing
 */
export function createMockProviderConfig(
  providerName: string,
  overrides: Partial<ProviderConfig> = {}
): ProviderConfig {
  return {
    id: 1,
    providerName,
    enabled: true,
    created_at: new Date('2024-01-01T00:00:00Z'),
    updated_at: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

/**
 * Breaker registry isolated from the process-wide one
 */
export function createTestBreakerRegistry(threshold = 3, resetTimeoutMinutes = 1): CircuitBreakerRegistry {
  return new CircuitBreakerRegistry({
    failureThreshold: threshold,
    resetTimeoutMinutes,
    sweepIntervalMinutes: 15,
  });
}

export interface FakeProviderSpec {
  id: string;
  name?: string;
  mixed?: boolean;
  enabled?: boolean;
  declarations: CapabilityDeclaration[];
}

/**
 * Provider implementing every music contract from canned data.
 * Declares only the contracts it is given.
 */
export class FakeMusicProvider
  extends BaseProvider
  implements ArtistInfoApi, AlbumInfoApi, ArtistSearchApi, AlbumSearchApi
{
  readonly artists = new Map<string, Artist>();
  readonly albums = new Map<string, Album>();
  artistResults: Artist[] = [];
  albumResults: Album[] = [];
  failure: Error | null = null;
  readonly calls: string[] = [];

  constructor(private readonly spec: FakeProviderSpec, options: ProviderOptions = {}) {
    super(createMockProviderConfig(spec.id, { enabled: spec.enabled ?? true }), options);
  }

  protected defineCapabilities(): ProviderCapabilities {
    return {
      id: this.spec.id,
      name: this.spec.name ?? this.spec.id,
      version: '1.0.0',
      mixed: this.spec.mixed ?? false,
      declarations: this.spec.declarations,
    };
  }

  async getArtistInfo(foreignArtistId: string): Promise<Artist | null> {
    return this.respond('getArtistInfo', () => this.artists.get(foreignArtistId) ?? null);
  }

  async getAlbumInfo(foreignAlbumId: string): Promise<Album | null> {
    return this.respond('getAlbumInfo', () => this.albums.get(foreignAlbumId) ?? null);
  }

  async searchArtists(query: string, limit?: number): Promise<Artist[]> {
    return this.respond('searchArtists', () =>
      this.artistResults
        .filter(artist => artist.name.toLowerCase().includes(query.toLowerCase()))
        .slice(0, limit)
    );
  }

  async searchAlbums(query: string, _artistName?: string, limit?: number): Promise<Album[]> {
    return this.respond('searchAlbums', () =>
      this.albumResults
        .filter(album => album.title.toLowerCase().includes(query.toLowerCase()))
        .slice(0, limit)
    );
  }

  private respond<T>(operation: string, answer: () => T): Promise<T> {
    this.calls.push(operation);
    return this.guard(operation, async () => {
      if (this.failure) {
        throw this.failure;
      }
      return answer();
    });
  }
}

/**
 * A fake with a class of its own, as the router keeps one instance per class
 */
export function createFakeProvider(spec: FakeProviderSpec, options: ProviderOptions = {}): FakeMusicProvider {
  const FakeProvider = class extends FakeMusicProvider {};
  return new FakeProvider(spec, options);
}

export const ALL_MUSIC_CONTRACTS = [ARTIST_INFO, ALBUM_INFO, ARTIST_SEARCH, ALBUM_SEARCH];

export function declareAll(priority: number, mixed?: boolean): CapabilityDeclaration[] {
  return ALL_MUSIC_CONTRACTS.map(contract => ({ contract, priority, mixed }));
}

export function createArtist(foreignArtistId: string, name: string): Artist {
  return { foreignArtistId, name };
}

export function createAlbum(foreignAlbumId: string, title: string, artistName = 'Test Artist'): Album {
  return { foreignAlbumId, title, artistName };
}
