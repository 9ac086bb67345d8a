/**
 * Catalog (Plex) contract
 *
 * The sync pipeline only talks to the catalog through these interfaces.
 * `services/catalog/PlexEntity.ts` is the production implementation; tests
 * use an in-process fake.
 */

export type ScalarField =
  | 'title'
  | 'originalTitle'
  | 'summary'
  | 'studio'
  | 'originallyAvailableAt'
  | 'year'
  | 'contentRating'
  | 'rating';

export type TagField = 'genres' | 'countries' | 'directors' | 'writers' | 'actors';

export type RemoteField = ScalarField | TagField;

export type UploadKind = 'poster' | 'art' | 'theme';

/** Lock names Plex uses for the artwork slots */
export type LockableArtworkField = 'thumb' | 'art' | 'theme';

export type LockableField = RemoteField | LockableArtworkField;

/**
 * 'unknown' means the service did not report a lock state for this field
 * on this entity; callers treat it as unlocked.
 */
export type LockState = 'locked' | 'unlocked' | 'unknown';

/**
 * What a given entity kind exposes. Checked before planning.
 */
export interface EntityCapabilities {
  readonly scalarFields: ReadonlySet<ScalarField>;
  readonly tagFields: ReadonlySet<TagField>;
  readonly uploads: ReadonlySet<UploadKind>;
}

export interface EditTagsOptions {
  remove: boolean;
  locked: boolean;
}

export interface CatalogEntity {
  readonly ratingKey: string;
  /** Catalog item type, e.g. 'movie', 'show', 'season', 'episode', 'artist' */
  readonly kind: string;
  readonly title: string;
  readonly year: number | null;
  /** Season number for seasons, episode number for episodes */
  readonly index: number | null;
  readonly key: string | null;
  readonly parentRatingKey: string | null;
  readonly grandparentRatingKey: string | null;
  readonly parentTitle: string | null;
  readonly grandparentTitle: string | null;
  readonly librarySectionTitle: string | null;
  readonly capabilities: EntityCapabilities;

  /** Current value as a string, empty string when unset */
  getFieldValue(field: ScalarField): string;
  /** Current tag names, trimmed, in catalog order */
  getTags(field: TagField): string[];
  lockState(field: LockableField): LockState;

  /** Seasons of a show, episodes of a season */
  children(): Promise<CatalogEntity[]>;
  /** Direct season addressing; null when the show has no such season */
  season(seasonNumber: number): Promise<CatalogEntity | null>;
  /** Direct episode addressing on a season; null when absent */
  episode(episodeNumber: number): Promise<CatalogEntity | null>;

  /** Open a batch edit scope; edits are queued until saveEdits() */
  beginEdits(): void;
  editField(field: ScalarField, value: string, locked: boolean): void;
  editTags(field: TagField, tags: readonly string[], options: EditTagsOptions): void;
  saveEdits(): Promise<void>;

  /** Clear a lock immediately (outside any batch) */
  unlockField(field: LockableField): Promise<void>;
  upload(kind: UploadKind, filePath: string): Promise<void>;
  refresh(): Promise<void>;
  reload(): Promise<void>;
}

export interface CatalogService {
  /** Establish a session; failure is fatal to the run */
  connect(): Promise<void>;
  /** Title/keyword search across all libraries, in service order */
  search(query: string): Promise<CatalogEntity[]>;
  fetchEntity(ratingKey: string): Promise<CatalogEntity>;
}
