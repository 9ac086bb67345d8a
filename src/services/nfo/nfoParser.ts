import fs from 'fs/promises';
import { Parser } from 'xml2js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { MalformedSidecarError } from '../../errors/index.js';
import { ROOT_TAG_ALIASES } from '../../config/fieldMap.js';
import {
  MediaKind,
  SidecarField,
  SidecarMediaKind,
  SidecarRecord,
  SidecarSubRecord,
} from '../../types/sidecar.js';

/**
 * Secure XML parser
 *
 * Attributes are ignored (NFO values live in element text), text is trimmed,
 * and every child is wrapped in an array so repeated elements keep their order.
 */
const secureXMLParser = new Parser({
  strict: true,
  explicitArray: true,
  explicitRoot: true,
  ignoreAttrs: true,
  trim: true,
});

/** Key xml2js uses for the text of an element that also has children */
const TEXT_KEY = '_';

/**
 * Secure XML parsing with XXE protection
 */
async function parseXMLSecurely(xml: string): Promise<unknown> {
  // Reject XML with entity or DOCTYPE declarations outright
  if (xml.includes('<!ENTITY') || xml.includes('<!DOCTYPE')) {
    throw new Error('XML contains potentially dangerous entity or DOCTYPE declarations');
  }
  const parsed: unknown = await secureXMLParser.parseStringPromise(xml);
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asEntries(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Map a root element name to a media kind using the documented synonyms
 */
export function getMediaKindFromRootTag(rootTag: string): SidecarMediaKind {
  const tag = rootTag.toLowerCase();
  const kinds: MediaKind[] = ['movie', 'show', 'season', 'episode'];

  for (const kind of kinds) {
    if (ROOT_TAG_ALIASES[kind].includes(tag)) {
      return kind;
    }
  }

  return 'unknown';
}

/**
 * Convert one child element into a sub-record, keeping only the next level.
 * Grandchildren that carry their own children are recorded as dropped.
 */
function toSubRecord(
  element: Record<string, unknown>,
  parentTag: string,
  dropped: string[]
): SidecarSubRecord | null {
  const record: Record<string, string | string[]> = {};

  for (const [rawKey, rawValue] of Object.entries(element)) {
    if (rawKey === TEXT_KEY) {
      continue;
    }

    const key = rawKey.toLowerCase();
    const values: string[] = [];

    for (const entry of asEntries(rawValue)) {
      if (typeof entry === 'string') {
        if (entry) {
          values.push(entry);
        }
      } else if (isRecord(entry)) {
        const path = `${parentTag}.${key}`;
        if (!dropped.includes(path)) {
          dropped.push(path);
        }
      }
    }

    const existing = record[key];
    const merged = existing === undefined ? values : [...asStrings(existing), ...values];

    if (merged.length === 1) {
      record[key] = merged[0];
    } else if (merged.length > 1) {
      record[key] = merged;
    }
  }

  return Object.keys(record).length > 0 ? record : null;
}

function asStrings(value: string | readonly string[]): string[] {
  return typeof value === 'string' ? [value] : [...value];
}

/**
 * Collapse all entries for one element name into a field
 *
 * - only text entries: one → scalar, several → list
 * - any entry with children: records; bare text entries become { name: text }
 */
function buildField(
  tag: string,
  entries: unknown[],
  dropped: string[]
): SidecarField | null {
  const texts: string[] = [];
  const ordered: Array<string | SidecarSubRecord> = [];
  let hasRecords = false;

  for (const entry of entries) {
    if (typeof entry === 'string') {
      if (entry) {
        texts.push(entry);
        ordered.push(entry);
      }
    } else if (isRecord(entry)) {
      const record = toSubRecord(entry, tag, dropped);
      if (record) {
        hasRecords = true;
        ordered.push(record);
      }
    }
  }

  if (hasRecords) {
    return {
      kind: 'records',
      records: ordered.map(item => (typeof item === 'string' ? { name: item } : item)),
    };
  }

  if (texts.length === 0) {
    return null;
  }

  return texts.length === 1
    ? { kind: 'scalar', value: texts[0] }
    : { kind: 'list', values: texts };
}

function firstText(field: SidecarField | undefined): string {
  if (!field) {
    return '';
  }
  if (field.kind === 'scalar') {
    return field.value;
  }
  if (field.kind === 'list') {
    return field.values[0] ?? '';
  }
  return '';
}

function parseIndex(fields: Readonly<Record<string, SidecarField>>, names: readonly string[]): number | null {
  for (const name of names) {
    const text = firstText(fields[name]);
    if (/^\d+$/.test(text)) {
      return parseInt(text, 10);
    }
  }
  return null;
}

/**
 * Parse NFO XML text into a sidecar record
 *
 * @throws {MalformedSidecarError} if the text is not XML or has no root element
 */
export async function parseSidecarXml(xml: string, nfoPath: string): Promise<SidecarRecord> {
  const content = xml.replace(/^\uFEFF/, '').trim();

  if (!content.startsWith('<')) {
    throw new MalformedSidecarError(nfoPath, `NFO file is not XML: ${nfoPath}`);
  }

  let parsed: unknown;
  try {
    parsed = await parseXMLSecurely(content);
  } catch (error) {
    throw new MalformedSidecarError(
      nfoPath,
      `Failed to parse NFO file ${nfoPath}: ${getErrorMessage(error)}`,
      toError(error)
    );
  }

  if (!isRecord(parsed)) {
    throw new MalformedSidecarError(nfoPath, `NFO file has no root element: ${nfoPath}`);
  }

  const rootName = Object.keys(parsed)[0];
  if (rootName === undefined) {
    throw new MalformedSidecarError(nfoPath, `NFO file has no root element: ${nfoPath}`);
  }

  const root = parsed[rootName];
  const rootTag = rootName.toLowerCase();
  const dropped: string[] = [];
  const grouped = new Map<string, unknown[]>();

  if (isRecord(root)) {
    for (const [rawKey, rawValue] of Object.entries(root)) {
      if (rawKey === TEXT_KEY) {
        continue;
      }
      const key = rawKey.toLowerCase();
      const bucket = grouped.get(key) ?? [];
      bucket.push(...asEntries(rawValue));
      grouped.set(key, bucket);
    }
  }

  const fields: Record<string, SidecarField> = {};
  for (const [tag, entries] of grouped) {
    const field = buildField(tag, entries, dropped);
    if (field) {
      fields[tag] = field;
    }
  }

  if (dropped.length > 0) {
    logger.debug(`Dropped deeply nested NFO elements in ${nfoPath}`, { elements: dropped });
  }

  return {
    path: nfoPath,
    rootTag,
    mediaKind: getMediaKindFromRootTag(rootTag),
    title: firstText(fields.title),
    fields,
    seasonNumber: parseIndex(fields, ['season', 'seasonnumber']),
    episodeNumber: parseIndex(fields, ['episode', 'episodenumber']),
    droppedNestedFields: dropped,
  };
}

/**
 * Read and parse an NFO file from disk
 *
 * @throws {MalformedSidecarError} if the file is missing, unreadable or not valid NFO XML
 */
export async function parseSidecarFile(nfoPath: string): Promise<SidecarRecord> {
  let content: string;

  try {
    content = await fs.readFile(nfoPath, 'utf-8');
  } catch (error) {
    throw new MalformedSidecarError(
      nfoPath,
      `NFO file could not be read: ${nfoPath} (${getErrorMessage(error)})`,
      toError(error)
    );
  }

  const record = await parseSidecarXml(content, nfoPath);

  logger.debug(`Parsed NFO ${nfoPath}`, {
    rootTag: record.rootTag,
    mediaKind: record.mediaKind,
    fields: Object.keys(record.fields),
  });

  return record;
}
