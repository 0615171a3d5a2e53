/**
 * Slug Generator
 *
 * Turns a title (or a filename stem) into a URL-safe identifier. Slugs name
 * the published note pages, so the fallback order below is fixed:
 *
 *   1. normalized primary seed
 *   2. normalized fallback seed
 *   3. `note-` + first 8 hex chars of the fallback seed's UTF-8 bytes
 *   4. `note-` + zero-padded sequence number
 *
 * @since 2026-10-19
 */

const OUTSIDE_SLUG_ALPHABET = /[^a-z0-9-]/g;
const HYPHEN_RUN = /-+/g;
const EDGE_HYPHENS = /^-+|-+$/g;
const NON_ASCII = /[^\x00-\x7f]/g;

/**
 * Decompose, drop non-ASCII, lowercase and hyphenate.
 * Returns an empty string when nothing survives.
 */
export function normalizeSlug(text: string): string {
  return text
    .normalize('NFKD')
    .replace(NON_ASCII, '')
    .toLowerCase()
    .replace(OUTSIDE_SLUG_ALPHABET, '-')
    .replace(HYPHEN_RUN, '-')
    .replace(EDGE_HYPHENS, '');
}

function formatSequence(sequence: number): string {
  const value = Number.isFinite(sequence) ? Math.abs(Math.trunc(sequence)) : 0;
  return String(value).padStart(3, '0');
}

/**
 * Derive a slug; never fails and never returns an empty string
 */
export function slugify(primarySeed: string, fallbackSeed: string, sequence: number): string {
  const primary = normalizeSlug(primarySeed);
  if (primary) {
    return primary;
  }

  const fallback = normalizeSlug(fallbackSeed);
  if (fallback) {
    return fallback;
  }

  const hex = Buffer.from(fallbackSeed, 'utf8').toString('hex').slice(0, 8);
  if (hex) {
    return `note-${hex}`;
  }

  return `note-${formatSequence(sequence)}`;
}
