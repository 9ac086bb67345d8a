/**
 * Diff & Update Planner
 *
 * Compares a parsed sidecar against the resolved catalog entity and produces
 * the field and tag operations needed to bring the entity in line. Nothing is
 * written here.
 */

import { logger } from '../../middleware/logging.js';
import { lookupFieldMapping } from '../../config/fieldMap.js';
import { dedupeTags, isCombinedToken, splitTagString, tagsMissingFrom } from '../../utils/tagTokens.js';
import type { CatalogEntity, RemoteField, ScalarField, TagField } from '../../types/catalog.js';
import type { SidecarField, SidecarRecord, SidecarSubRecord } from '../../types/sidecar.js';
import type { FieldOp, PlanResult, TagOp, UpdateOp } from '../../types/plan.js';

export interface PlannerOptions {
  allowUnlock: boolean;
}

function firstString(value: string | readonly string[] | undefined): string {
  if (value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : value[0] ?? '';
}

/** Name of a structured tag entry such as <actor><name>..</name></actor> */
function recordTagName(record: SidecarSubRecord): string {
  return firstString(record.tag) || firstString(record.name);
}

/**
 * Raw tag tokens from a sidecar field. Strings are split on the separator
 * class; structured entries contribute their tag or name.
 */
export function collectTagTokens(field: SidecarField): string[] {
  switch (field.kind) {
    case 'scalar':
      return splitTagString(field.value);
    case 'list':
      return field.values.flatMap(value => splitTagString(value));
    case 'records':
      return field.records.map(recordTagName).map(name => name.trim()).filter(name => name.length > 0);
  }
}

function scalarValue(field: SidecarField): string {
  switch (field.kind) {
    case 'scalar':
      return field.value.trim();
    case 'list':
      return (field.values[0] ?? '').trim();
    case 'records':
      return '';
  }
}

function planScalar(
  record: SidecarRecord,
  nfoField: string,
  field: SidecarField,
  remoteField: ScalarField,
  entity: CatalogEntity,
  options: PlannerOptions,
  lockSkipped: ScalarField[]
): FieldOp | null {
  const newValue = scalarValue(field);
  if (!newValue) {
    if (field.kind === 'records') {
      logger.debug(`${entity.title}: NFO field '${nfoField}' is structured, not a single value; skipping`);
    }
    return null;
  }

  const oldValue = entity.getFieldValue(remoteField).trim();
  if (newValue === oldValue) {
    logger.debug(`${entity.title}: Skipping unchanged field '${remoteField}'`);
    return null;
  }

  if (entity.lockState(remoteField) === 'locked' && !options.allowUnlock) {
    logger.debug(`${entity.title}: Field '${remoteField}' locked and unlocking is disabled, skipping`, {
      nfo: record.path,
    });
    lockSkipped.push(remoteField);
    return null;
  }

  return { type: 'field', field: remoteField, newValue, oldValue };
}

function planTags(
  field: SidecarField,
  remoteField: TagField,
  entity: CatalogEntity,
  options: PlannerOptions
): TagOp | null {
  const tokens: string[] = [];

  for (const token of dedupeTags(collectTagTokens(field))) {
    if (isCombinedToken(token)) {
      logger.debug(`${entity.title}: Skipping combined tag '${token}'`);
      continue;
    }
    tokens.push(token);
  }

  if (tokens.length === 0) {
    return null;
  }

  const existing = dedupeTags(entity.getTags(remoteField));
  const missing = tagsMissingFrom(tokens, existing);

  // replace mode: sets equal; append mode: nothing missing
  const unchanged = options.allowUnlock
    ? missing.length === 0 && existing.length === tokens.length
    : missing.length === 0;

  if (unchanged) {
    logger.debug(`${entity.title}: Tags for '${remoteField}' already up to date`);
    return null;
  }

  return { type: 'tag', field: remoteField, newTags: tokens, existingTags: existing };
}

function hasContent(field: SidecarField): boolean {
  switch (field.kind) {
    case 'scalar':
      return field.value.trim().length > 0;
    case 'list':
      return field.values.length > 0;
    case 'records':
      return field.records.length > 0;
  }
}

function isSupported(op: UpdateOp, entity: CatalogEntity): boolean {
  return op.type === 'field'
    ? entity.capabilities.scalarFields.has(op.field)
    : entity.capabilities.tagFields.has(op.field);
}

/**
 * Build the validated plan for one sidecar/entity pair
 *
 * Several sidecar names can map to the same catalog field (plot, summary,
 * overview); only the first one present is planned.
 */
export function planUpdates(record: SidecarRecord, entity: CatalogEntity, options: PlannerOptions): PlanResult {
  const planned: UpdateOp[] = [];
  const lockSkipped: ScalarField[] = [];
  const claimed = new Set<RemoteField>();

  for (const [nfoField, field] of Object.entries(record.fields)) {
    const mapping = lookupFieldMapping(nfoField);
    if (!mapping) {
      continue;
    }

    if (claimed.has(mapping.remoteField)) {
      logger.debug(`${entity.title}: '${nfoField}' duplicates an earlier field for '${mapping.remoteField}'`);
      continue;
    }

    const op =
      mapping.kind === 'scalar'
        ? planScalar(record, nfoField, field, mapping.remoteField, entity, options, lockSkipped)
        : planTags(field, mapping.remoteField, entity, options);

    if (hasContent(field)) {
      claimed.add(mapping.remoteField);
    }
    if (op) {
      planned.push(op);
    }
  }

  const ops: UpdateOp[] = [];
  const unsupported: UpdateOp[] = [];

  for (const op of planned) {
    if (isSupported(op, entity)) {
      ops.push(op);
    } else {
      logger.debug(`${entity.title}: '${op.field}' not available on item type '${entity.kind}', dropping`);
      unsupported.push(op);
    }
  }

  return { ops, unsupported, lockSkipped };
}
