/**
 * Tag parsing helpers.
 *
 * A tag is a dot-separated path such as `"api.users.create"`. Each
 * dot-separated prefix names an ancestor in the metric tree.
 *
 * @module core/tag
 */

import { InvalidTagError } from './errors.js';

export const TAG_SEPARATOR = '.';

/** One or more segments, each free of whitespace and dots. */
const TAG_PATTERN = /^[^\s.]+(?:\.[^\s.]+)*$/;

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(tag);
}

export function assertValidTag(tag: string): void {
  if (!isValidTag(tag)) {
    throw new InvalidTagError(tag);
  }
}

/**
 * Returns the parent tag, or null for a root tag.
 * `parentTag('a.b.c')` is `'a.b'`; `parentTag('a')` is `null`.
 */
export function parentTag(tag: string): string | null {
  const idx = tag.lastIndexOf(TAG_SEPARATOR);
  return idx === -1 ? null : tag.slice(0, idx);
}

/**
 * Returns every prefix of the tag, root first, ending with the tag itself.
 * `tagPrefixes('a.b.c')` is `['a', 'a.b', 'a.b.c']`.
 */
export function tagPrefixes(tag: string): string[] {
  const segments = tag.split(TAG_SEPARATOR);
  return segments.map((_, i) => segments.slice(0, i + 1).join(TAG_SEPARATOR));
}

export function childTag(tag: string, suffix: string): string {
  return `${tag}${TAG_SEPARATOR}${suffix}`;
}
