/**
 * Music Metadata Contracts
 *
 * Capability contracts the library manager routes music lookups through.
 */

import { defineContract } from './CapabilityInspector.js';
import type { Album, Artist } from '../../types/music.js';

export interface ArtistInfoApi {
  getArtistInfo(foreignArtistId: string): Promise<Artist | null>;
}

export interface AlbumInfoApi {
  getAlbumInfo(foreignAlbumId: string): Promise<Album | null>;
}

export interface ArtistSearchApi {
  searchArtists(query: string, limit?: number): Promise<Artist[]>;
}

export interface AlbumSearchApi {
  searchAlbums(query: string, artistName?: string, limit?: number): Promise<Album[]>;
}

export const ARTIST_INFO = defineContract<ArtistInfoApi>('artist-info', ['getArtistInfo']);
export const ALBUM_INFO = defineContract<AlbumInfoApi>('album-info', ['getAlbumInfo']);
export const ARTIST_SEARCH = defineContract<ArtistSearchApi>('artist-search', ['searchArtists']);
export const ALBUM_SEARCH = defineContract<AlbumSearchApi>('album-search', ['searchAlbums']);
