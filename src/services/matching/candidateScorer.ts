/**
 * Candidate Scorer
 *
 * Ranks catalog candidates against a sidecar title. Scoring per candidate:
 * exact normalized title 99 (100 with matching year), substring 20 (+5 when
 * the candidate title starts with the search title), minus 50 for extras
 * such as trailers (floored at 1), plus 30 when the candidate sits under the
 * supplied parent. Ties keep discovery order.
 */

import { logger } from '../../middleware/logging.js';
import { CONFIDENCE_THRESHOLD, MATCH_SCORE, NOISE_KEYWORDS } from '../../config/constants.js';
import { extractTrailingYear, normalizeTitle } from '../../utils/titleNormalizer.js';
import type { CatalogEntity } from '../../types/catalog.js';

export interface ScoredCandidate {
  score: number;
  candidate: CatalogEntity;
}

export interface ScoreResult {
  /** Sorted by descending score */
  matches: ScoredCandidate[];
  bestMatch: CatalogEntity | null;
  bestScore: number;
  isConfident: boolean;
  /** Candidates scoring at or above the confidence threshold */
  excellentCount: number;
}

export interface ScoreOptions {
  /** Overrides a year parsed from the search title */
  searchYear?: number | null;
  parent?: CatalogEntity | null;
  /** Only candidates of this catalog type are scored */
  mediaKind?: string | null;
}

function emptyResult(): ScoreResult {
  return { matches: [], bestMatch: null, bestScore: 0, isConfident: false, excellentCount: 0 };
}

/**
 * True when the candidate is structurally below the parent
 */
export function isChildOfParent(candidate: CatalogEntity, parent: CatalogEntity): boolean {
  const parentKey = parent.ratingKey;

  if (candidate.parentRatingKey === parentKey || candidate.grandparentRatingKey === parentKey) {
    return true;
  }

  if (candidate.key && candidate.key.includes(parentKey)) {
    return true;
  }

  const parentTitle = normalizeTitle(parent.title);
  return (
    (candidate.parentTitle !== null && normalizeTitle(candidate.parentTitle) === parentTitle) ||
    (candidate.grandparentTitle !== null && normalizeTitle(candidate.grandparentTitle) === parentTitle)
  );
}

function scoreOne(
  candidate: CatalogEntity,
  search: { raw: string; normalized: string; year: number | null },
  parent: CatalogEntity | null
): number {
  const title = candidate.title;
  const normalized = normalizeTitle(title);
  let score = 0;

  if (normalized === search.normalized) {
    score = MATCH_SCORE.EXCELLENT;
    if (search.year !== null && candidate.year === search.year) {
      score = MATCH_SCORE.PERFECT;
    }
  } else if (normalized.includes(search.normalized)) {
    score = MATCH_SCORE.SUBSTRING;
    if (title.toLowerCase().startsWith(search.raw.toLowerCase())) {
      score += MATCH_SCORE.PREFIX_BONUS;
    }
  }

  const lowered = title.toLowerCase();
  if (NOISE_KEYWORDS.some(keyword => lowered.includes(keyword))) {
    score = Math.max(score - MATCH_SCORE.NOISE_PENALTY, MATCH_SCORE.NOISE_FLOOR);
  }

  if (parent && isChildOfParent(candidate, parent)) {
    score += MATCH_SCORE.PARENT_BONUS;
  }

  return Math.max(0, score);
}

/**
 * Score and rank candidates for a search title
 */
export function scoreCandidates(
  searchTitle: string,
  candidates: readonly CatalogEntity[],
  options: ScoreOptions = {}
): ScoreResult {
  const extracted = extractTrailingYear(searchTitle);
  const raw = extracted.title;
  const year = options.searchYear ?? extracted.year;
  const normalized = normalizeTitle(raw);
  const parent = options.parent ?? null;

  if (!normalized) {
    logger.warn('Empty search title provided to scorer');
    return emptyResult();
  }

  if (parent && normalizeTitle(parent.title) === normalized && (year === null || parent.year === year)) {
    logger.debug(`Parent itself '${parent.title}' matches search query '${raw}'`);
    return {
      matches: [{ score: MATCH_SCORE.PERFECT, candidate: parent }],
      bestMatch: parent,
      bestScore: MATCH_SCORE.PERFECT,
      isConfident: true,
      excellentCount: 1,
    };
  }

  const scored = candidates
    .filter(candidate => !options.mediaKind || candidate.kind === options.mediaKind)
    .map((candidate, order) => ({
      score: scoreOne(candidate, { raw, normalized, year }, parent),
      candidate,
      order,
    }))
    .sort((a, b) => b.score - a.score || a.order - b.order);

  if (scored.length === 0) {
    logger.debug(`No candidates left to score for '${raw}'`);
    return emptyResult();
  }

  const matches = scored.map(({ score, candidate }) => ({ score, candidate }));
  const best = matches[0];
  const excellentCount = matches.filter(match => match.score >= CONFIDENCE_THRESHOLD).length;

  return {
    matches,
    bestMatch: best.candidate,
    bestScore: best.score,
    isConfident: best.score >= CONFIDENCE_THRESHOLD,
    excellentCount,
  };
}
