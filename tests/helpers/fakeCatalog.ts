/**
 * In-process stand-ins for the Plex catalog
 */

import { capabilitiesFor } from '../../src/services/catalog/entityCapabilities.js';
import type {
  CatalogEntity,
  CatalogService,
  EditTagsOptions,
  EntityCapabilities,
  LockState,
  LockableField,
  ScalarField,
  TagField,
  UploadKind,
} from '../../src/types/catalog.js';

type FailingOperation =
  | 'children'
  | 'season'
  | 'episode'
  | 'saveEdits'
  | 'unlockField'
  | 'upload'
  | 'refresh'
  | 'reload';

export interface FakeEntityInit {
  ratingKey: string;
  kind: string;
  title: string;
  year?: number | null;
  index?: number | null;
  key?: string | null;
  parentRatingKey?: string | null;
  grandparentRatingKey?: string | null;
  parentTitle?: string | null;
  grandparentTitle?: string | null;
  librarySectionTitle?: string | null;
  fields?: Partial<Record<ScalarField, string>>;
  tags?: Partial<Record<TagField, string[]>>;
  locks?: Partial<Record<LockableField, LockState>>;
  children?: FakeEntity[];
  failOn?: Partial<Record<FailingOperation, Error>>;
}

export class FakeEntity implements CatalogEntity {
  readonly ratingKey: string;
  readonly kind: string;
  readonly title: string;
  readonly year: number | null;
  readonly index: number | null;
  readonly key: string | null;
  readonly parentRatingKey: string | null;
  readonly grandparentRatingKey: string | null;
  readonly parentTitle: string | null;
  readonly grandparentTitle: string | null;
  readonly librarySectionTitle: string | null;

  /** Every catalog call in order, e.g. "editField:summary=New plot:locked=true" */
  readonly calls: string[] = [];
  fields: Partial<Record<ScalarField, string>>;
  tags: Partial<Record<TagField, string[]>>;
  locks: Partial<Record<LockableField, LockState>>;
  childEntities: FakeEntity[];
  failOn: Partial<Record<FailingOperation, Error>>;

  constructor(init: FakeEntityInit) {
    this.ratingKey = init.ratingKey;
    this.kind = init.kind;
    this.title = init.title;
    this.year = init.year ?? null;
    this.index = init.index ?? null;
    this.key = init.key ?? null;
    this.parentRatingKey = init.parentRatingKey ?? null;
    this.grandparentRatingKey = init.grandparentRatingKey ?? null;
    this.parentTitle = init.parentTitle ?? null;
    this.grandparentTitle = init.grandparentTitle ?? null;
    this.librarySectionTitle = init.librarySectionTitle ?? null;
    this.fields = init.fields ?? {};
    this.tags = init.tags ?? {};
    this.locks = init.locks ?? {};
    this.childEntities = init.children ?? [];
    this.failOn = init.failOn ?? {};
  }

  get capabilities(): EntityCapabilities {
    return capabilitiesFor(this.kind);
  }

  private maybeFail(operation: FailingOperation): void {
    const error = this.failOn[operation];
    if (error) {
      throw error;
    }
  }

  getFieldValue(field: ScalarField): string {
    return this.fields[field] ?? '';
  }

  getTags(field: TagField): string[] {
    return [...(this.tags[field] ?? [])];
  }

  lockState(field: LockableField): LockState {
    return this.locks[field] ?? 'unknown';
  }

  async children(): Promise<CatalogEntity[]> {
    this.calls.push('children');
    this.maybeFail('children');
    return [...this.childEntities];
  }

  async season(seasonNumber: number): Promise<CatalogEntity | null> {
    this.calls.push(`season:${seasonNumber}`);
    this.maybeFail('season');
    return this.childEntities.find(child => child.kind === 'season' && child.index === seasonNumber) ?? null;
  }

  async episode(episodeNumber: number): Promise<CatalogEntity | null> {
    this.calls.push(`episode:${episodeNumber}`);
    this.maybeFail('episode');
    return this.childEntities.find(child => child.kind === 'episode' && child.index === episodeNumber) ?? null;
  }

  beginEdits(): void {
    this.calls.push('beginEdits');
  }

  editField(field: ScalarField, value: string, locked: boolean): void {
    this.calls.push(`editField:${field}=${value}:locked=${locked}`);
  }

  editTags(field: TagField, tags: readonly string[], options: EditTagsOptions): void {
    this.calls.push(`editTags:${field}:remove=${options.remove}:locked=${options.locked}:[${tags.join('|')}]`);
  }

  async saveEdits(): Promise<void> {
    this.calls.push('saveEdits');
    this.maybeFail('saveEdits');
  }

  async unlockField(field: LockableField): Promise<void> {
    this.calls.push(`unlockField:${field}`);
    this.maybeFail('unlockField');
    this.locks[field] = 'unlocked';
  }

  async upload(kind: UploadKind, filePath: string): Promise<void> {
    this.calls.push(`upload:${kind}:${filePath}`);
    this.maybeFail('upload');
  }

  async refresh(): Promise<void> {
    this.calls.push('refresh');
    this.maybeFail('refresh');
  }

  async reload(): Promise<void> {
    this.calls.push('reload');
    this.maybeFail('reload');
  }
}

export class FakeCatalogService implements CatalogService {
  readonly queries: string[] = [];
  connected = false;

  constructor(
    private readonly results: Record<string, CatalogEntity[]> = {},
    private readonly searchError?: Error
  ) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async search(query: string): Promise<CatalogEntity[]> {
    this.queries.push(query);
    if (this.searchError) {
      throw this.searchError;
    }
    return [...(this.results[query] ?? [])];
  }

  async fetchEntity(ratingKey: string): Promise<CatalogEntity> {
    for (const entities of Object.values(this.results)) {
      const found = entities.find(entity => entity.ratingKey === ratingKey);
      if (found) {
        return found;
      }
    }
    throw new Error(`No entity ${ratingKey}`);
  }
}
