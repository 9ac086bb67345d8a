/**
 * Sidecar (NFO) record types
 *
 * A parsed NFO is a flat map of named fields. Each field is a scalar, an
 * ordered list of scalars, or an ordered list of one-level sub-records.
 * Anything nested deeper is dropped at parse time and listed in
 * `droppedNestedFields`.
 */

export type MediaKind = 'movie' | 'show' | 'season' | 'episode';

export type SidecarMediaKind = MediaKind | 'unknown';

/**
 * A child element with its own children, e.g. <actor><name/><role/></actor>.
 * Repeated sub-elements collapse into a list.
 */
export type SidecarSubRecord = Readonly<Record<string, string | readonly string[]>>;

export type SidecarField =
  | { readonly kind: 'scalar'; readonly value: string }
  | { readonly kind: 'list'; readonly values: readonly string[] }
  | { readonly kind: 'records'; readonly records: readonly SidecarSubRecord[] };

export interface SidecarRecord {
  readonly path: string;
  /** Lowercased root element name, e.g. 'tvshow' or 'episodedetails' */
  readonly rootTag: string;
  readonly mediaKind: SidecarMediaKind;
  /** Empty string when the NFO carries no usable <title> */
  readonly title: string;
  /** Keyed by lowercased element name, in document order */
  readonly fields: Readonly<Record<string, SidecarField>>;
  readonly seasonNumber: number | null;
  readonly episodeNumber: number | null;
  readonly droppedNestedFields: readonly string[];
}
