import type { ScalarField, TagField } from '../types/catalog.js';

export type FieldMapping =
  | { readonly kind: 'scalar'; readonly remoteField: ScalarField }
  | { readonly kind: 'tag'; readonly remoteField: TagField };

/**
 * NFO element name (lowercased) -> Plex field.
 * Several NFO names alias the same Plex field.
 */
export const SUPPORTED_FIELD_MAP: Readonly<Record<string, FieldMapping>> = {
  // single-valued fields
  title: { kind: 'scalar', remoteField: 'title' },
  originaltitle: { kind: 'scalar', remoteField: 'originalTitle' },
  plot: { kind: 'scalar', remoteField: 'summary' },
  summary: { kind: 'scalar', remoteField: 'summary' },
  overview: { kind: 'scalar', remoteField: 'summary' },
  studio: { kind: 'scalar', remoteField: 'studio' },
  premiered: { kind: 'scalar', remoteField: 'originallyAvailableAt' },
  year: { kind: 'scalar', remoteField: 'year' },
  mpaa: { kind: 'scalar', remoteField: 'contentRating' },
  contentrating: { kind: 'scalar', remoteField: 'contentRating' },
  rating: { kind: 'scalar', remoteField: 'rating' },

  // tag collections
  genres: { kind: 'tag', remoteField: 'genres' },
  genre: { kind: 'tag', remoteField: 'genres' },
  country: { kind: 'tag', remoteField: 'countries' },
  countries: { kind: 'tag', remoteField: 'countries' },
  directors: { kind: 'tag', remoteField: 'directors' },
  director: { kind: 'tag', remoteField: 'directors' },
  writers: { kind: 'tag', remoteField: 'writers' },
  writer: { kind: 'tag', remoteField: 'writers' },
  actors: { kind: 'tag', remoteField: 'actors' },
  actor: { kind: 'tag', remoteField: 'actors' },
};

export function lookupFieldMapping(nfoField: string): FieldMapping | undefined {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_FIELD_MAP, nfoField)
    ? SUPPORTED_FIELD_MAP[nfoField]
    : undefined;
}

/**
 * Root element synonyms per media kind
 */
export const ROOT_TAG_ALIASES: Readonly<Record<'movie' | 'show' | 'season' | 'episode', readonly string[]>> = {
  movie: ['movie', 'moviedetail', 'moviedetails'],
  show: ['show', 'showdetail', 'showdetails', 'tvshow', 'serie', 'tvserie'],
  season: ['season', 'seasondetail', 'seasondetails'],
  episode: ['episode', 'episodedetail', 'episodedetails'],
};
