import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { MalformedSidecarError, UserQuitError } from '../../errors/index.js';
import type { RunOptions } from '../../config/types.js';
import type { CatalogEntity, CatalogService } from '../../types/catalog.js';
import type { SidecarRecord } from '../../types/sidecar.js';
import type { GroupedSidecars, MediaUnit } from '../nfo/nfoDiscovery.js';
import { parseSidecarFile } from '../nfo/nfoParser.js';
import { resolveCatalogItem, type ResolutionContext, type ResolutionMode } from '../matching/resolutionPolicy.js';
import { resolveWithinShow } from '../matching/hierarchicalLookup.js';
import { planUpdates } from '../update/updatePlanner.js';
import { executePlan } from '../update/updateExecutor.js';
import { RunStatistics, type RunSummary } from './RunStatistics.js';

export interface SyncDependencies {
  catalog: CatalogService;
  options: RunOptions;
  mode: ResolutionMode;
  /** Defaults to reading the file from disk */
  parseSidecar?: (nfoPath: string) => Promise<SidecarRecord>;
}

export interface SyncResult {
  summary: RunSummary;
  /** The user quit from an interactive prompt before the run finished */
  quit: boolean;
}

const SHOW_SCOPED_KINDS = new Set(['show', 'season', 'episode']);

async function loadSidecar(
  file: string,
  parse: (nfoPath: string) => Promise<SidecarRecord>,
  stats: RunStatistics
): Promise<SidecarRecord | null> {
  try {
    const record = await parse(file);
    if (!record.title) {
      logger.warn(`NFO file '${file}' is empty or missing a title, skipping`);
      stats.recordSkipped(file, 'NFO empty or missing title.');
      return null;
    }
    return record;
  } catch (error) {
    if (error instanceof MalformedSidecarError) {
      logger.warn(error.message);
      stats.recordSkipped(file, 'NFO could not be parsed.');
      return null;
    }
    throw error;
  }
}

async function resolveRecord(
  record: SidecarRecord,
  parent: CatalogEntity,
  context: ResolutionContext
): Promise<CatalogEntity | null> {
  if (parent.kind === 'show' && SHOW_SCOPED_KINDS.has(record.mediaKind)) {
    return resolveWithinShow(record, parent, context);
  }

  const kindFilter = record.mediaKind === 'unknown' ? null : record.mediaKind;
  return resolveCatalogItem(record.title, kindFilter, context, parent);
}

async function processFile(
  file: string,
  parent: CatalogEntity,
  deps: SyncDependencies,
  context: ResolutionContext
): Promise<void> {
  const { stats } = context;
  const parse = deps.parseSidecar ?? parseSidecarFile;

  stats.incrementProcessed();
  logger.info(`Processing NFO file: ${file}`);

  const record = await loadSidecar(file, parse, stats);
  if (!record) {
    return;
  }

  const entity = await resolveRecord(record, parent, context);
  if (!entity) {
    logger.warn(`Could not resolve a Plex item for '${record.title}', update skipped`);
    stats.recordSkipped(`${record.title} (${file})`, 'Could not resolve Plex item.');
    return;
  }

  logger.info(`Matched NFO '${record.title}' to Plex item '${entity.title}'`);

  try {
    // search hits carry partial metadata; locks and tags need the full item
    await entity.reload();
  } catch (error) {
    logger.error(`Could not load '${entity.title}' from Plex`, { error: getErrorMessage(error) });
    stats.recordFailed(entity.title, 'Error while loading current metadata.');
    return;
  }

  const plan = planUpdates(record, entity, { allowUnlock: deps.options.allowUnlock });
  await executePlan(file, entity, plan, deps.options, stats);
}

async function processUnit(unit: MediaUnit, deps: SyncDependencies, context: ResolutionContext): Promise<void> {
  logger.info(`Processing parent folder '${unit.name}' at path '${unit.path}'`);

  const parent = await resolveCatalogItem(unit.name, unit.kind, context);
  if (!parent) {
    logger.warn(`Could not resolve parent item for '${unit.name}', skipping all files within`);
    context.stats.recordSkipped(unit.name, 'Could not resolve parent item in Plex.');
    return;
  }

  logger.info(`Resolved parent '${unit.name}' to Plex ${parent.kind}: '${parent.title}'`);

  for (const file of unit.files) {
    try {
      await processFile(file, parent, deps, context);
    } catch (error) {
      if (error instanceof UserQuitError) {
        throw error;
      }
      logger.error(`Unexpected error while processing ${file}`, { error: getErrorMessage(error) });
      context.stats.recordFailed(file, getErrorMessage(error));
    }
  }
}

/**
 * Run the whole pipeline over grouped sidecar files, one at a time
 */
export async function runSync(grouped: GroupedSidecars, deps: SyncDependencies): Promise<SyncResult> {
  const stats = new RunStatistics();
  const context: ResolutionContext = { catalog: deps.catalog, stats, mode: deps.mode };

  for (const file of grouped.unmatched) {
    logger.warn(`'${file}' is not under a recognised library folder, skipping`);
    stats.recordSkipped(file, 'Not under a recognised library folder.');
  }

  let quit = false;
  try {
    for (const unit of grouped.units) {
      await processUnit(unit, deps, context);
    }
  } catch (error) {
    if (!(error instanceof UserQuitError)) {
      throw error;
    }
    logger.info('User quit, stopping run');
    quit = true;
  }

  return { summary: stats.finalize(), quit };
}
