/**
 * Application-wide Constants
 *
 * Centralized location for scoring weights, batching limits and keyword tables.
 */

import type { UploadKind, LockableArtworkField } from '../types/catalog.js';

/**
 * Time durations in milliseconds
 */
export const TIME = {
  /** 30 seconds */
  THIRTY_SECONDS: 30000,
} as const;

/**
 * Candidate scoring weights
 */
export const MATCH_SCORE = {
  /** Exact title and exact year */
  PERFECT: 100,
  /** Exact title; also the confidence threshold */
  EXCELLENT: 99,
  /** Search title contained in candidate title */
  SUBSTRING: 20,
  /** Candidate title starts with the raw search title */
  PREFIX_BONUS: 5,
  /** Subtracted when a noise keyword appears in the candidate title */
  NOISE_PENALTY: 50,
  /** Floor after the noise penalty */
  NOISE_FLOOR: 1,
  /** Candidate is structurally a child of the supplied parent */
  PARENT_BONUS: 30,
} as const;

/** Score at or above which a match is considered confident */
export const CONFIDENCE_THRESHOLD = MATCH_SCORE.EXCELLENT;

/**
 * Titles containing any of these are extras, not the feature itself
 */
export const NOISE_KEYWORDS: readonly string[] = [
  'sample',
  'trailer',
  'teaser',
  'promo',
  'deleted scene',
  'behind the scenes',
];

/**
 * Tag tokens are split on any run of these characters
 */
export const TAG_SEPARATOR_PATTERN = /[,/|;]+/;
export const TAG_SEPARATORS: readonly string[] = [',', '/', '|', ';'];

/**
 * Max tags per edit request, keeps the query string under Plex URL limits
 */
export const MAX_TAG_BATCH = 5;

/**
 * Artwork classification by filename keyword. Order matters: first match wins.
 */
export const ARTWORK_KEYWORDS: ReadonlyArray<{
  keyword: string;
  upload: UploadKind;
  lockField: LockableArtworkField;
}> = [
  { keyword: 'poster', upload: 'poster', lockField: 'thumb' },
  { keyword: 'fanart', upload: 'art', lockField: 'art' },
  { keyword: 'backdrop', upload: 'art', lockField: 'art' },
  { keyword: 'background', upload: 'art', lockField: 'art' },
  { keyword: 'art', upload: 'art', lockField: 'art' },
  { keyword: 'theme', upload: 'theme', lockField: 'theme' },
];

/**
 * Extensions that default to a poster upload when no keyword matches
 */
export const IMAGE_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'png', 'webp'];

/**
 * Plex library item type numbers used by section edit requests
 */
export const PLEX_TYPE_NUMBER: Readonly<Record<string, number>> = {
  movie: 1,
  show: 2,
  season: 3,
  episode: 4,
};
