import fs from 'fs/promises';
import { logger } from '../../middleware/logging.js';
import { InvalidStateError } from '../../errors/index.js';
import { PLEX_TYPE_NUMBER } from '../../config/constants.js';
import { PlexMetadata, plexMetadataContainerSchema } from '../../validation/plexSchemas.js';
import type {
  CatalogEntity,
  EditTagsOptions,
  EntityCapabilities,
  LockState,
  LockableField,
  ScalarField,
  TagField,
  UploadKind,
} from '../../types/catalog.js';
import { PlexClient } from './PlexClient.js';
import { capabilitiesFor } from './entityCapabilities.js';

/** Query parameter (and lock) name Plex uses for each tag collection */
const TAG_PARAM: Readonly<Record<TagField, string>> = {
  genres: 'genre',
  countries: 'country',
  directors: 'director',
  writers: 'writer',
  actors: 'actor',
};

const TAG_SOURCE: Readonly<Record<TagField, 'Genre' | 'Country' | 'Director' | 'Writer' | 'Role'>> = {
  genres: 'Genre',
  countries: 'Country',
  directors: 'Director',
  writers: 'Writer',
  actors: 'Role',
};

const UPLOAD_PATH: Readonly<Record<UploadKind, string>> = {
  poster: 'posters',
  art: 'arts',
  theme: 'themes',
};

function isTagField(field: LockableField): field is TagField {
  return Object.prototype.hasOwnProperty.call(TAG_PARAM, field);
}

/**
 * A Plex library item (movie, show, season or episode)
 *
 * Attribute reads come from the last fetched metadata snapshot; reload()
 * replaces it. Edits are queued between beginEdits() and saveEdits() and
 * sent as one section edit request.
 */
export class PlexEntity implements CatalogEntity {
  private metadata: PlexMetadata;
  private sectionId: string | null;
  private pending: URLSearchParams | null = null;
  private tagIndexes = new Map<string, number>();
  private tagRemovals = new Map<string, string[]>();

  constructor(
    private readonly client: PlexClient,
    metadata: PlexMetadata,
    sectionId?: string
  ) {
    this.metadata = metadata;
    this.sectionId = metadata.librarySectionID ?? sectionId ?? null;
  }

  get ratingKey(): string {
    return this.metadata.ratingKey;
  }

  get kind(): string {
    return this.metadata.type;
  }

  get title(): string {
    return this.metadata.title;
  }

  get year(): number | null {
    return this.metadata.year ?? null;
  }

  get index(): number | null {
    return this.metadata.index ?? null;
  }

  get key(): string | null {
    return this.metadata.key ?? null;
  }

  get parentRatingKey(): string | null {
    return this.metadata.parentRatingKey ?? null;
  }

  get grandparentRatingKey(): string | null {
    return this.metadata.grandparentRatingKey ?? null;
  }

  get parentTitle(): string | null {
    return this.metadata.parentTitle ?? null;
  }

  get grandparentTitle(): string | null {
    return this.metadata.grandparentTitle ?? null;
  }

  get librarySectionTitle(): string | null {
    return this.metadata.librarySectionTitle ?? null;
  }

  get capabilities(): EntityCapabilities {
    return capabilitiesFor(this.kind);
  }

  getFieldValue(field: ScalarField): string {
    const value = this.metadata[field];
    return value === undefined ? '' : String(value).trim();
  }

  getTags(field: TagField): string[] {
    const tags = this.metadata[TAG_SOURCE[field]] ?? [];
    return tags.map(tag => tag.tag).filter(tag => tag.length > 0);
  }

  lockState(field: LockableField): LockState {
    const locks = this.metadata.Field;
    if (!locks) {
      return 'unknown';
    }

    const name = isTagField(field) ? TAG_PARAM[field] : field;
    const entry = locks.find(lock => lock.name === name);
    return entry?.locked ? 'locked' : 'unlocked';
  }

  async children(): Promise<CatalogEntity[]> {
    const response = await this.client.get(
      `/library/metadata/${this.ratingKey}/children`,
      plexMetadataContainerSchema
    );
    const sectionId = response.MediaContainer.librarySectionID ?? this.sectionId ?? undefined;

    return response.MediaContainer.Metadata.map(item => new PlexEntity(this.client, item, sectionId));
  }

  async season(seasonNumber: number): Promise<CatalogEntity | null> {
    if (this.kind !== 'show') {
      return null;
    }
    return this.childByIndex(seasonNumber, 'season');
  }

  async episode(episodeNumber: number): Promise<CatalogEntity | null> {
    if (this.kind !== 'season') {
      return null;
    }
    return this.childByIndex(episodeNumber, 'episode');
  }

  private async childByIndex(index: number, kind: string): Promise<CatalogEntity | null> {
    const children = await this.children();
    return children.find(child => child.kind === kind && child.index === index) ?? null;
  }

  beginEdits(): void {
    this.pending = new URLSearchParams();
    this.tagIndexes.clear();
    this.tagRemovals.clear();
  }

  editField(field: ScalarField, value: string, locked: boolean): void {
    const params = this.requireBatch();
    params.set(`${field}.value`, value);
    params.set(`${field}.locked`, locked ? '1' : '0');
  }

  editTags(field: TagField, tags: readonly string[], options: EditTagsOptions): void {
    const params = this.requireBatch();
    const name = TAG_PARAM[field];

    if (options.remove) {
      // Plex splits the removal list on commas, so each value is escaped first
      const removals = [...(this.tagRemovals.get(name) ?? []), ...tags.map(tag => encodeURIComponent(tag))];
      this.tagRemovals.set(name, removals);
      params.set(`${name}[].tag.tag-`, removals.join(','));
    } else {
      let next = this.tagIndexes.get(name) ?? 0;
      for (const tag of tags) {
        params.append(`${name}[${next}].tag.tag`, tag);
        next++;
      }
      this.tagIndexes.set(name, next);
    }

    params.set(`${name}.locked`, options.locked ? '1' : '0');
  }

  async saveEdits(): Promise<void> {
    const params = this.requireBatch();
    this.pending = null;
    this.tagIndexes.clear();
    this.tagRemovals.clear();

    await this.client.put(this.sectionEditPath(), this.editParams(params));
    logger.debug(`Saved edits for ${this.title}`, { ratingKey: this.ratingKey });
  }

  async unlockField(field: LockableField): Promise<void> {
    const name = isTagField(field) ? TAG_PARAM[field] : field;
    const params = new URLSearchParams();
    params.set(`${name}.locked`, '0');

    await this.client.put(this.sectionEditPath(), this.editParams(params));
  }

  async upload(kind: UploadKind, filePath: string): Promise<void> {
    const body = await fs.readFile(filePath);
    await this.client.post(`/library/metadata/${this.ratingKey}/${UPLOAD_PATH[kind]}`, body);
  }

  async refresh(): Promise<void> {
    await this.client.put(`/library/metadata/${this.ratingKey}/refresh`);
  }

  async reload(): Promise<void> {
    const response = await this.client.get(
      `/library/metadata/${this.ratingKey}`,
      plexMetadataContainerSchema
    );
    const [item] = response.MediaContainer.Metadata;

    if (!item) {
      throw new InvalidStateError('metadata', 'empty', `Plex returned no metadata for ${this.ratingKey}`);
    }

    this.metadata = item;
    this.sectionId = item.librarySectionID ?? response.MediaContainer.librarySectionID ?? this.sectionId;
  }

  private requireBatch(): URLSearchParams {
    if (!this.pending) {
      throw new InvalidStateError('editing', 'idle', 'beginEdits() must be called before editing');
    }
    return this.pending;
  }

  private sectionEditPath(): string {
    if (!this.sectionId) {
      throw new InvalidStateError('library section', 'none', `No library section known for ${this.title}`);
    }
    return `/library/sections/${this.sectionId}/all`;
  }

  private editParams(edits: URLSearchParams): URLSearchParams {
    const params = new URLSearchParams();
    const typeNumber = PLEX_TYPE_NUMBER[this.kind];
    if (typeNumber !== undefined) {
      params.set('type', String(typeNumber));
    }
    params.set('id', this.ratingKey);
    edits.forEach((value, key) => params.append(key, value));
    return params;
  }
}
