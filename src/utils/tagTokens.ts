/**
 * Tag token helpers shared by the update planner and executor
 */

import { TAG_SEPARATOR_PATTERN, TAG_SEPARATORS } from '../config/constants.js';

/**
 * Split a raw tag string on the separator class, trimming and dropping empties
 *
 * @example
 * splitTagString("Action, Drama / Thriller") // ["Action", "Drama", "Thriller"]
 */
export function splitTagString(value: string): string[] {
  return value
    .split(TAG_SEPARATOR_PATTERN)
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

/**
 * True when a token still carries a separator, i.e. it was never split
 */
export function isCombinedToken(token: string): boolean {
  return TAG_SEPARATORS.some(separator => token.includes(separator));
}

/**
 * Case-insensitive de-duplication keeping the first-seen spelling and order
 *
 * @example
 * dedupeTags(["Action", "action", "Drama"]) // ["Action", "Drama"]
 */
export function dedupeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const tag of tags) {
    const clean = tag.trim();
    if (!clean) {
      continue;
    }

    const lowered = clean.toLowerCase();
    if (!seen.has(lowered)) {
      seen.add(lowered);
      unique.push(clean);
    }
  }

  return unique;
}

/**
 * Tags in `candidates` that are not already in `existing` (case-insensitive)
 */
export function tagsMissingFrom(candidates: readonly string[], existing: readonly string[]): string[] {
  const existingLower = new Set(existing.map(tag => tag.toLowerCase()));
  return candidates.filter(tag => !existingLower.has(tag.toLowerCase()));
}

/**
 * Split a list into consecutive chunks of at most `size` items
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
