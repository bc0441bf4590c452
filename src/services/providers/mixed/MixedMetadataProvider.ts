/**
 * MetaMix
 *
 * Mixed provider for music metadata. Artist lookups ask every source and
 * enrich the best answer with the others' albums and links; album lookups take
 * the first source that knows the album; searches merge every source's results.
 */

import { MixedProvider } from './MixedProvider.js';
import {
  ALBUM_INFO,
  ALBUM_SEARCH,
  ARTIST_INFO,
  ARTIST_SEARCH,
  type AlbumInfoApi,
  type AlbumSearchApi,
  type ArtistInfoApi,
  type ArtistSearchApi,
} from '../contracts.js';
import type { ProviderCapabilities } from '../../../types/providers/index.js';
import type { Album, Artist, ArtistLink } from '../../../types/music.js';

const ORCHESTRATOR_PRIORITY = 50;

export class MixedMetadataProvider
  extends MixedProvider
  implements ArtistInfoApi, AlbumInfoApi, ArtistSearchApi, AlbumSearchApi
{
  static readonly PROVIDER_ID = 'metamix';

  protected defineCapabilities(): ProviderCapabilities {
    return {
      id: MixedMetadataProvider.PROVIDER_ID,
      name: 'MetaMix',
      version: '1.0.0',
      mixed: true,
      declarations: [ARTIST_INFO, ALBUM_INFO, ARTIST_SEARCH, ALBUM_SEARCH].map(contract => ({
        contract,
        priority: ORCHESTRATOR_PRIORITY,
      })),
    };
  }

  async getArtistInfo(foreignArtistId: string): Promise<Artist | null> {
    const results = await this.fanOut(ARTIST_INFO, 'getArtistInfo', source =>
      source.getArtistInfo(foreignArtistId)
    );
    const found = results.map(entry => entry.result).filter((artist): artist is Artist => artist !== null);

    // Highest-priority exact match is the base; without one, the highest-priority answer
    const base = found.find(artist => artist.foreignArtistId === foreignArtistId) ?? found[0];
    if (!base) {
      return null;
    }

    return found.filter(artist => artist !== base).reduce(mergeArtist, base);
  }

  async getAlbumInfo(foreignAlbumId: string): Promise<Album | null> {
    return this.firstSuccessful(ALBUM_INFO, 'getAlbumInfo', source => source.getAlbumInfo(foreignAlbumId));
  }

  async searchArtists(query: string, limit?: number): Promise<Artist[]> {
    const results = await this.fanOut(ARTIST_SEARCH, 'searchArtists', source =>
      source.searchArtists(query, limit)
    );
    return mergeById(results.map(entry => entry.result), artist => artist.foreignArtistId, limit);
  }

  async searchAlbums(query: string, artistName?: string, limit?: number): Promise<Album[]> {
    const results = await this.fanOut(ALBUM_SEARCH, 'searchAlbums', source =>
      source.searchAlbums(query, artistName, limit)
    );
    return mergeById(results.map(entry => entry.result), album => album.foreignAlbumId, limit);
  }
}

/**
 * Flatten per-source result lists, keeping the first occurrence of each id
 */
function mergeById<T>(lists: T[][], idOf: (item: T) => string, limit?: number): T[] {
  const seen = new Set<string>();
  const merged: T[] = [];

  for (const item of lists.flat()) {
    const id = idOf(item);
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);
    merged.push(item);
  }

  return limit === undefined ? merged : merged.slice(0, limit);
}

/**
 * Fill gaps in `base` from `other` and union their albums and links
 */
function mergeArtist(base: Artist, other: Artist): Artist {
  return {
    ...base,
    disambiguation: base.disambiguation ?? other.disambiguation,
    overview: base.overview ?? other.overview,
    genres: base.genres ?? other.genres,
    links: mergeLinks(base.links, other.links),
    albums: mergeAlbums(base.albums, other.albums),
  };
}

/**
 * Links match on url or name, ignoring case
 */
function mergeLinks(base?: ArtistLink[], other?: ArtistLink[]): ArtistLink[] | undefined {
  if (!base || !other) {
    return base ?? other;
  }

  const merged = [...base];
  for (const link of other) {
    const duplicate = merged.some(
      existing =>
        existing.url.toLowerCase() === link.url.toLowerCase() ||
        existing.name.toLowerCase() === link.name.toLowerCase()
    );
    if (!duplicate) {
      merged.push(link);
    }
  }
  return merged;
}

function mergeAlbums(base?: Album[], other?: Album[]): Album[] | undefined {
  if (!base || !other) {
    return base ?? other;
  }
  return mergeById([base, other], album => album.foreignAlbumId);
}
