/**
 * Update Executor
 *
 * Applies a validated plan to a catalog entity as one batch edit, then hands
 * over to the artwork matcher.
 */

import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { chunk, tagsMissingFrom } from '../../utils/tagTokens.js';
import { delay } from '../../utils/delay.js';
import { MAX_TAG_BATCH } from '../../config/constants.js';
import type { SyncConfig } from '../../config/types.js';
import type { CatalogEntity } from '../../types/catalog.js';
import type { PlanResult, TagOp, UpdateOp } from '../../types/plan.js';
import type { RunStatistics } from '../run/RunStatistics.js';
import { updateArtwork } from './artworkMatcher.js';

export type ExecutorOptions = Pick<
  SyncConfig,
  'dryRun' | 'allowUnlock' | 'updateArtwork' | 'alwaysUpdateArtwork' | 'artworkExtensions' | 'delayMs'
>;

export type ExecutionOutcome = 'no-changes' | 'dry-run' | 'updated' | 'failed';

function describeOp(op: UpdateOp): string {
  return op.type === 'field'
    ? `Field -> ${op.field} = '${op.newValue}' (was: '${op.oldValue}')`
    : `Tags -> ${op.field} (new: [${op.newTags.join(', ')}], existing: [${op.existingTags.join(', ')}])`;
}

function queueTagOp(entity: CatalogEntity, op: TagOp, allowUnlock: boolean): void {
  if (allowUnlock) {
    for (const batch of chunk(op.existingTags, MAX_TAG_BATCH)) {
      entity.editTags(op.field, batch, { remove: true, locked: true });
    }
    for (const batch of chunk(op.newTags, MAX_TAG_BATCH)) {
      entity.editTags(op.field, batch, { remove: false, locked: true });
    }
    logger.debug(`${entity.title}: Replaced all '${op.field}' tags (${op.newTags.length} total)`);
    return;
  }

  const toAdd = tagsMissingFrom(op.newTags, op.existingTags);
  if (toAdd.length === 0) {
    logger.debug(`${entity.title}: No new '${op.field}' tags to append`);
    return;
  }

  for (const batch of chunk(toAdd, MAX_TAG_BATCH)) {
    entity.editTags(op.field, batch, { remove: false, locked: true });
  }
  logger.debug(`${entity.title}: Added ${toAdd.length} new '${op.field}' tags`);
}

async function commit(entity: CatalogEntity, ops: readonly UpdateOp[], options: ExecutorOptions): Promise<void> {
  logger.debug(`${entity.title}: Planned operations summary: ${ops.length} ops`);

  entity.beginEdits();

  for (const op of ops) {
    if (op.type === 'field') {
      entity.editField(op.field, op.newValue, options.allowUnlock);
      logger.debug(`${entity.title}: Queued field '${op.field}' = '${op.newValue}'`);
    } else {
      queueTagOp(entity, op, options.allowUnlock);
    }
  }

  await entity.saveEdits();
}

/**
 * Execute a plan for one entity and record the outcome
 *
 * Failures are recorded and never thrown, so the run moves on to the next
 * entity.
 */
export async function executePlan(
  sidecarPath: string,
  entity: CatalogEntity,
  plan: PlanResult,
  options: ExecutorOptions,
  stats: RunStatistics
): Promise<ExecutionOutcome> {
  const title = entity.title;

  for (const op of plan.unsupported) {
    stats.recordUnsupported(title, `Missing field '${op.field}' on ${entity.kind}`);
  }
  for (const field of plan.lockSkipped) {
    stats.recordSkipped(title, `Field '${field}' is locked, not updated.`);
  }

  if (plan.ops.length === 0) {
    logger.info(`'${title}': No metadata changes required`);
    stats.recordSkipped(title, 'No metadata changes required.');

    if (options.alwaysUpdateArtwork) {
      await updateArtwork(sidecarPath, entity, options, stats);
    }
    return 'no-changes';
  }

  if (options.dryRun) {
    logger.info(`[DRY RUN] Planned edits for '${title}':`);
    for (const op of plan.ops) {
      logger.info(`  ${describeOp(op)}`);
    }
    stats.recordSkipped(title, 'Dry-run is activated.');

    await updateArtwork(sidecarPath, entity, options, stats);
    return 'dry-run';
  }

  let committed = false;
  try {
    await commit(entity, plan.ops, options);
    committed = true;

    logger.info(`Successfully updated '${title}'`);
    stats.recordUpdated(title);

    await delay(options.delayMs);
    await entity.reload();
  } catch (error) {
    logger.error(`Error while updating '${title}'`, { error: getErrorMessage(error) });
    stats.recordFailed(title, committed ? 'Error while reloading after update.' : 'Error while updating.');
  }

  if (committed || options.alwaysUpdateArtwork) {
    await updateArtwork(sidecarPath, entity, options, stats);
  }

  return committed ? 'updated' : 'failed';
}
