import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import type { CatalogEntity } from '../../types/catalog.js';
import type { SidecarRecord } from '../../types/sidecar.js';
import { resolveCatalogItem, type ResolutionContext } from './resolutionPolicy.js';

function episodeLabel(season: number, episode: number): string {
  return `S${String(season).padStart(2, '0')}E${String(episode).padStart(2, '0')}`;
}

async function findSeason(show: CatalogEntity, seasonNumber: number): Promise<CatalogEntity | null> {
  logger.info(`Directly looking for Season ${seasonNumber} in '${show.title}'`);
  try {
    return await show.season(seasonNumber);
  } catch (error) {
    logger.warn(`Direct season lookup failed in '${show.title}'`, { error: getErrorMessage(error) });
    return null;
  }
}

async function findEpisode(
  show: CatalogEntity,
  seasonNumber: number,
  episodeNumber: number
): Promise<CatalogEntity | null> {
  const label = episodeLabel(seasonNumber, episodeNumber);
  logger.info(`Directly looking for ${label} in '${show.title}'`);

  let season: CatalogEntity | null = null;
  try {
    season = await show.season(seasonNumber);
    const episode = season ? await season.episode(episodeNumber) : null;
    if (episode) {
      return episode;
    }
  } catch (error) {
    logger.debug(`Direct lookup error for ${label}`, { error: getErrorMessage(error) });
  }

  logger.warn(`Direct lookup failed for ${label} in '${show.title}', falling back to loop search`);

  try {
    season = season ?? (await show.season(seasonNumber));
    if (!season) {
      return null;
    }

    for (const episode of await season.children()) {
      if (episode.index === episodeNumber) {
        logger.debug(`Found episode by iterating index (${episode.index}) for ${label} in '${show.title}'`);
        return episode;
      }
    }
  } catch (error) {
    logger.debug(`Could not list episodes for ${label} in '${show.title}'`, { error: getErrorMessage(error) });
  }

  return null;
}

/**
 * Resolve a show, season or episode sidecar against an already resolved show
 *
 * Tries direct addressing by season/episode number first, then a scan of the
 * season's episodes, then title resolution scoped to the show. Lookup errors
 * fall through to the next tier.
 */
export async function resolveWithinShow(
  record: SidecarRecord,
  show: CatalogEntity,
  context: ResolutionContext
): Promise<CatalogEntity | null> {
  let found: CatalogEntity | null = null;

  switch (record.mediaKind) {
    case 'show':
      return show;

    case 'season':
      if (record.seasonNumber !== null) {
        found = await findSeason(show, record.seasonNumber);
      }
      break;

    case 'episode':
      if (record.seasonNumber !== null && record.episodeNumber !== null) {
        found = await findEpisode(show, record.seasonNumber, record.episodeNumber);
      }
      break;

    default:
      break;
  }

  if (found) {
    return found;
  }

  const kindFilter = record.mediaKind === 'unknown' ? null : record.mediaKind;
  return resolveCatalogItem(record.title, kindFilter, context, show);
}
