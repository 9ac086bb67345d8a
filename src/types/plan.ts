import type { ScalarField, TagField } from './catalog.js';

export interface FieldOp {
  readonly type: 'field';
  readonly field: ScalarField;
  readonly newValue: string;
  readonly oldValue: string;
}

/**
 * Tag sets are case-insensitively unique, order-preserving and never
 * contain a token with a separator character left in it.
 */
export interface TagOp {
  readonly type: 'tag';
  readonly field: TagField;
  readonly newTags: readonly string[];
  readonly existingTags: readonly string[];
}

export type UpdateOp = FieldOp | TagOp;

export interface PlanResult {
  /** Validated ops, in sidecar field order */
  readonly ops: readonly UpdateOp[];
  /** Ops dropped because the entity kind does not expose the field */
  readonly unsupported: readonly UpdateOp[];
  /** Scalar fields skipped because they are locked and unlocking is off */
  readonly lockSkipped: readonly ScalarField[];
}
