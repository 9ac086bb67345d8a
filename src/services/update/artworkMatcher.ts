/**
 * Artwork Matcher
 *
 * Finds artwork and theme files next to a sidecar (same stem, allowed
 * extension) and uploads them to the resolved entity.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { delay } from '../../utils/delay.js';
import { ARTWORK_KEYWORDS, IMAGE_EXTENSIONS } from '../../config/constants.js';
import type { SyncConfig } from '../../config/types.js';
import type { CatalogEntity, LockableArtworkField, UploadKind } from '../../types/catalog.js';
import type { RunStatistics } from '../run/RunStatistics.js';

export type ArtworkOptions = Pick<
  SyncConfig,
  'dryRun' | 'allowUnlock' | 'updateArtwork' | 'artworkExtensions' | 'delayMs'
>;

export interface ArtworkFile {
  path: string;
  kind: UploadKind;
  lockField: LockableArtworkField;
}

/**
 * Classify an artwork file by keywords in its stem, first match wins.
 * Images without a keyword default to poster; anything else is ignored.
 */
export function classifyArtwork(filePath: string): ArtworkFile | null {
  const extension = path.extname(filePath).replace(/^\./, '').toLowerCase();
  const stem = path.basename(filePath, path.extname(filePath)).toLowerCase();

  const match = ARTWORK_KEYWORDS.find(entry => stem.includes(entry.keyword));
  if (match) {
    return { path: filePath, kind: match.upload, lockField: match.lockField };
  }

  if (IMAGE_EXTENSIONS.includes(extension)) {
    return { path: filePath, kind: 'poster', lockField: 'thumb' };
  }

  return null;
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isFile();
  } catch (error) {
    logger.debug(`No artwork at ${candidate}`, { error: getErrorMessage(error) });
    return false;
  }
}

/**
 * Sibling files named `<sidecar stem>.<ext>` for each allowed extension
 */
export async function findArtworkFiles(
  sidecarPath: string,
  extensions: readonly string[]
): Promise<ArtworkFile[]> {
  const dir = path.dirname(sidecarPath);
  const stem = path.basename(sidecarPath, path.extname(sidecarPath));
  const found: ArtworkFile[] = [];

  for (const extension of extensions) {
    const candidate = path.join(dir, `${stem}.${extension}`);
    if (!(await isFile(candidate))) {
      continue;
    }

    const artwork = classifyArtwork(candidate);
    if (artwork) {
      found.push(artwork);
    }
  }

  return found;
}

/**
 * Returns false when the file must not be uploaded
 */
async function clearLock(
  entity: CatalogEntity,
  artwork: ArtworkFile,
  options: ArtworkOptions,
  stats: RunStatistics
): Promise<boolean> {
  const filename = path.basename(artwork.path);

  if (entity.lockState(artwork.lockField) !== 'locked') {
    return true;
  }

  if (!options.allowUnlock) {
    logger.warn(`Skipping '${filename}' because field '${artwork.lockField}' is locked and unlocking is disabled`);
    stats.recordSkipped(entity.title, `Artwork upload skipped, field locked (${filename}).`);
    return false;
  }

  if (options.dryRun) {
    logger.info(`[DRY-RUN] Would unlock '${artwork.lockField}' for '${entity.title}'`);
    return true;
  }

  logger.info(`Field '${artwork.lockField}' is locked. Attempting unlock for '${entity.title}'`);
  try {
    await entity.unlockField(artwork.lockField);
    await entity.reload();
    return true;
  } catch (error) {
    logger.error(`Failed to unlock '${artwork.lockField}' for '${entity.title}'`, {
      error: getErrorMessage(error),
    });
    stats.recordFailed(entity.title, `Unlock failed for ${artwork.lockField} (${filename}).`);
    return false;
  }
}

async function uploadOne(
  entity: CatalogEntity,
  artwork: ArtworkFile,
  options: ArtworkOptions,
  stats: RunStatistics
): Promise<void> {
  const filename = path.basename(artwork.path);
  logger.info(`Processing '${filename}' for '${entity.title}' (${artwork.kind})`);

  if (!entity.capabilities.uploads.has(artwork.kind)) {
    logger.warn(`'${entity.title}' (${entity.kind}) does not accept ${artwork.kind} uploads, skipping`);
    stats.recordSkipped(entity.title, `No ${artwork.kind} upload for item type '${entity.kind}' (${filename}).`);
    return;
  }

  if (!(await clearLock(entity, artwork, options, stats))) {
    return;
  }

  if (options.dryRun) {
    logger.info(`[DRY-RUN] Would upload '${filename}' to '${entity.title}' as ${artwork.kind}`);
    return;
  }

  try {
    await entity.upload(artwork.kind, artwork.path);
  } catch (error) {
    logger.error(`Failed to upload '${filename}' for '${entity.title}'`, { error: getErrorMessage(error) });
    stats.recordFailed(entity.title, `Artwork upload failed (${filename}).`);
    return;
  }

  logger.info(`Uploaded '${filename}' as ${artwork.kind} for '${entity.title}'`);
  stats.recordUpdated(`${entity.title}: Uploaded '${filename}' (${artwork.kind})`);

  await delay(options.delayMs);

  try {
    await entity.refresh();
    await entity.reload();
  } catch (error) {
    logger.debug(`Reload failed for '${entity.title}' after upload`, { error: getErrorMessage(error) });
  }
}

/**
 * Upload every artwork file found beside the sidecar. Each file is handled
 * on its own; one failure does not stop the others.
 */
export async function updateArtwork(
  sidecarPath: string,
  entity: CatalogEntity,
  options: ArtworkOptions,
  stats: RunStatistics
): Promise<void> {
  if (!options.updateArtwork) {
    logger.info('Artwork updates are disabled');
    return;
  }

  const files = await findArtworkFiles(sidecarPath, options.artworkExtensions);
  if (files.length === 0) {
    const stem = path.basename(sidecarPath, path.extname(sidecarPath));
    logger.info(`No artwork files found for '${entity.title}' matching '${stem}'`);
    return;
  }

  for (const artwork of files) {
    await uploadOne(entity, artwork, options, stats);
  }
}
