import type { EntityCapabilities, ScalarField, TagField, UploadKind } from '../../types/catalog.js';

const ALL_SCALARS: readonly ScalarField[] = [
  'title',
  'originalTitle',
  'summary',
  'studio',
  'originallyAvailableAt',
  'year',
  'contentRating',
  'rating',
];

function capabilities(
  scalarFields: readonly ScalarField[],
  tagFields: readonly TagField[],
  uploads: readonly UploadKind[]
): EntityCapabilities {
  return {
    scalarFields: new Set(scalarFields),
    tagFields: new Set(tagFields),
    uploads: new Set(uploads),
  };
}

/**
 * What each Plex item type accepts, checked before planning
 */
const CAPABILITIES: Readonly<Record<string, EntityCapabilities>> = {
  movie: capabilities(
    ALL_SCALARS,
    ['genres', 'countries', 'directors', 'writers', 'actors'],
    ['poster', 'art', 'theme']
  ),
  show: capabilities(ALL_SCALARS, ['genres', 'actors'], ['poster', 'art', 'theme']),
  season: capabilities(['title', 'summary'], [], ['poster', 'art']),
  episode: capabilities(
    ['title', 'summary', 'originallyAvailableAt', 'year', 'contentRating', 'rating'],
    ['directors', 'writers', 'actors'],
    ['poster', 'art']
  ),
};

const NONE = capabilities([], [], []);

export function capabilitiesFor(kind: string): EntityCapabilities {
  return Object.prototype.hasOwnProperty.call(CAPABILITIES, kind) ? CAPABILITIES[kind] : NONE;
}
