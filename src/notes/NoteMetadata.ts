/**
 * Note metadata records and their ordering
 *
 * The sort key is derived once, when the record is built, so sorting never
 * re-parses dates.
 *
 * @since 2026-10-19
 */

import type { NoteMetadata, NoteMetadataInput, SortKey } from './types.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const OLDEST: SortKey = { kind: 'oldest' };

/**
 * Parse a `YYYY-MM-DD` display date. Anything else, including impossible
 * calendar dates, yields the `oldest` sentinel.
 */
export function parseSortKey(dateDisplay: string): SortKey {
  const match = dateDisplay.match(ISO_DATE_PATTERN);
  if (!match) return OLDEST;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) return OLDEST;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return OLDEST;
  }

  return { kind: 'dated', timestamp: date.getTime() };
}

/**
 * Build an immutable metadata record
 */
export function createNoteMetadata(input: NoteMetadataInput): NoteMetadata {
  return Object.freeze({
    title: input.title,
    dateDisplay: input.dateDisplay,
    summary: input.summary,
    tags: Object.freeze([...input.tags]),
    category: input.category,
    sortKey: parseSortKey(input.dateDisplay),
    extra: Object.freeze({ ...input.extra }),
  });
}

/**
 * Compare sort keys ascending: `oldest` first, then by timestamp
 */
export function compareSortKeys(a: SortKey, b: SortKey): number {
  if (a.kind === 'oldest' || b.kind === 'oldest') {
    if (a.kind === b.kind) return 0;
    return a.kind === 'oldest' ? -1 : 1;
  }
  return a.timestamp - b.timestamp;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Newest first; undated notes last. Ties fall back to title, then slug,
 * both descending.
 */
export function compareNotes<T extends NoteMetadata & { slug?: string }>(a: T, b: T): number {
  return (
    compareSortKeys(b.sortKey, a.sortKey) ||
    compareText(b.title, a.title) ||
    compareText(b.slug ?? '', a.slug ?? '')
  );
}
