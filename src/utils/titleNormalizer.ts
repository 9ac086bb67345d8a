/**
 * Title Normalization Utilities
 *
 * Canonical form used when comparing NFO titles against catalog titles:
 * compatibility decomposition, combining marks removed, case-folded, trimmed.
 *
 * Examples:
 * - "Amélie" → "amelie"
 * - "  THE Matrix " → "the matrix"
 * - "Pokémon: The Movie" → "pokemon: the movie"
 * - "Straße" → "strasse"
 */

const COMBINING_MARKS = /\p{M}/gu;

/**
 * Trailing year in one of: "(1999)", "[1999]", "{1999}", "- 1999", "-1999".
 * A bare "Title 1999" is left alone so titles such as "Blade Runner 2049" survive.
 */
const TRAILING_YEAR = /\s*[-([{]\s*(\d{4})[)\]}]?$/;

function stripMarks(value: string): string {
  return value.normalize('NFKD').replace(COMBINING_MARKS, '');
}

/** Full case fold: "ß" becomes "ss" the same way "SS" does */
function caseFold(value: string): string {
  return value.toUpperCase().toLowerCase();
}

/**
 * Normalize a title for comparison. Total: null/undefined/empty yield ''.
 *
 * Marks are stripped again after folding, and trimming happens last,
 * so normalizeTitle(normalizeTitle(s)) === normalizeTitle(s).
 */
export function normalizeTitle(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }

  return stripMarks(caseFold(stripMarks(String(value).trim()))).trim();
}

export interface TitleWithYear {
  title: string;
  year: number | null;
}

/**
 * Split a trailing year off a title
 *
 * @example
 * extractTrailingYear("Alien (1979)") // { title: "Alien", year: 1979 }
 * extractTrailingYear("Alien - 1979") // { title: "Alien", year: 1979 }
 * extractTrailingYear("Alien")        // { title: "Alien", year: null }
 */
export function extractTrailingYear(value: string | null | undefined): TitleWithYear {
  const raw = (value ?? '').trim();
  const match = raw.match(TRAILING_YEAR);

  if (!match || match.index === undefined) {
    return { title: raw, year: null };
  }

  return {
    title: raw.slice(0, match.index).trim(),
    year: parseInt(match[1], 10),
  };
}
