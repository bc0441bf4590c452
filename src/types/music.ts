/**
 * Music Domain Types
 *
 * The shapes exchanged through the music capability contracts. Providers map
 * their catalog's records into these; the router never inspects them.
 */

export interface ArtistLink {
  name: string;   // 'discogs', 'deezer', 'lastfm', ...
  url: string;
}

export interface Artist {
  foreignArtistId: string;
  name: string;
  disambiguation?: string;
  overview?: string;
  genres?: string[];
  links?: ArtistLink[];
  albums?: Album[];
}

export interface Album {
  foreignAlbumId: string;
  title: string;
  artistName: string;
  foreignArtistId?: string;
  releaseDate?: string;
  albumType?: 'album' | 'single' | 'ep' | 'compilation' | 'other';
  trackCount?: number;
}
