/**
 * Resolution Policy
 *
 * Turns a ranked ScoreResult into at most one catalog entity. Unattended
 * runs only accept a single confident match; interactive runs hand the
 * ambiguous cases to a chooser.
 */

import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { extractTrailingYear } from '../../utils/titleNormalizer.js';
import type { CatalogEntity, CatalogService } from '../../types/catalog.js';
import type { RunStatistics } from '../run/RunStatistics.js';
import { scoreCandidates, type ScoreResult } from './candidateScorer.js';

export type ResolutionState =
  | 'no-candidates'
  | 'single-excellent-confident'
  | 'multiple-excellent'
  | 'no-confident-match';

/**
 * Interactive selection. Resolves to null when the user declines; may throw
 * UserQuitError to end the run.
 */
export interface CandidateChooser {
  choose(searchTitle: string, candidates: readonly CatalogEntity[]): Promise<CatalogEntity | null>;
}

export type ResolutionMode =
  | { readonly kind: 'unattended' }
  | { readonly kind: 'interactive'; readonly chooser: CandidateChooser };

export interface ResolutionContext {
  catalog: CatalogService;
  stats: RunStatistics;
  mode: ResolutionMode;
}

export function classifyScoreResult(result: ScoreResult): ResolutionState {
  if (result.matches.length === 0 || !result.bestMatch) {
    return 'no-candidates';
  }
  if (result.isConfident && result.excellentCount === 1) {
    return 'single-excellent-confident';
  }
  if (result.excellentCount > 1) {
    return 'multiple-excellent';
  }
  return 'no-confident-match';
}

/**
 * Apply the policy to an already-scored result
 */
export async function selectCandidate(
  searchTitle: string,
  result: ScoreResult,
  context: Pick<ResolutionContext, 'stats' | 'mode'>
): Promise<CatalogEntity | null> {
  const { stats, mode } = context;
  const state = classifyScoreResult(result);

  switch (state) {
    case 'no-candidates':
      logger.warn(`No candidate found for '${searchTitle}'`);
      stats.recordSkipped(searchTitle, 'No candidate found.');
      return null;

    case 'single-excellent-confident':
      logger.info(`Automatically matched '${searchTitle}' (confident single match, score=${result.bestScore})`);
      return result.bestMatch;

    case 'multiple-excellent': {
      if (mode.kind === 'unattended') {
        logger.warn(
          `Multiple excellent matches found for '${searchTitle}' (${result.excellentCount} matches), skipping`
        );
        stats.recordSkipped(searchTitle, `Multiple excellent matches (${result.excellentCount}), not guessing.`);
        return null;
      }

      const excellent = result.matches.slice(0, result.excellentCount).map(match => match.candidate);
      const chosen = await mode.chooser.choose(searchTitle, excellent);
      if (!chosen) {
        stats.recordSkipped(searchTitle, 'User did not select any match.');
      }
      return chosen;
    }

    case 'no-confident-match': {
      if (mode.kind === 'unattended') {
        logger.warn(`No confident match for '${searchTitle}' (best score=${result.bestScore}), skipping`);
        stats.recordSkipped(searchTitle, `No confident match (best score=${result.bestScore}).`);
        return null;
      }

      logger.info(`No confident match for '${searchTitle}', prompting for a selection`);
      const chosen = await mode.chooser.choose(
        searchTitle,
        result.matches.map(match => match.candidate)
      );
      if (!chosen) {
        stats.recordSkipped(searchTitle, 'No confident match and user did not select any match.');
      }
      return chosen;
    }
  }
}

/**
 * Gather candidates below a parent for season and episode lookups.
 * Returns an empty list when the parent cannot be enumerated.
 */
async function scopedCandidates(mediaKind: string | null, parent: CatalogEntity): Promise<CatalogEntity[]> {
  try {
    if (mediaKind === 'season' && parent.kind === 'show') {
      return await parent.children();
    }

    if (mediaKind === 'episode') {
      if (parent.kind === 'season') {
        return await parent.children();
      }

      if (parent.kind === 'show') {
        const episodes: CatalogEntity[] = [];
        for (const season of await parent.children()) {
          try {
            episodes.push(...(await season.children()));
          } catch (error) {
            logger.debug(`Could not list episodes of '${season.title}'`, { error: getErrorMessage(error) });
          }
        }
        return episodes;
      }
    }
  } catch (error) {
    logger.debug(`Scoped candidate collection under '${parent.title}' failed`, {
      error: getErrorMessage(error),
    });
  }

  return [];
}

/**
 * Search the catalog for a title and pick an entity
 *
 * With a parent, seasons and episodes are looked for among its children
 * first; anything else goes through catalog search.
 */
export async function resolveCatalogItem(
  searchTitle: string,
  mediaKind: string | null,
  context: ResolutionContext,
  parent: CatalogEntity | null = null
): Promise<CatalogEntity | null> {
  let candidates: CatalogEntity[] = parent ? await scopedCandidates(mediaKind, parent) : [];

  if (candidates.length > 0) {
    logger.debug(`Using ${candidates.length} scoped candidates under parent for '${searchTitle}'`);
  } else {
    const query = extractTrailingYear(searchTitle).title;
    try {
      candidates = query ? await context.catalog.search(query) : [];
    } catch (error) {
      logger.error(`Plex search failed for '${query}'`, { error: getErrorMessage(error) });
      candidates = [];
    }
  }

  const result = scoreCandidates(searchTitle, candidates, { parent, mediaKind });
  return selectCandidate(searchTitle, result, context);
}
