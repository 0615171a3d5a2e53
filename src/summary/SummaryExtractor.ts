/**
 * Summary Extractor
 *
 * Builds a plain-text teaser from the first paragraph of a note body when
 * the metadata carries no summary of its own.
 *
 * @since 2026-10-19
 */

import { splitLines } from '../base/text-utils.js';

export interface SummaryOptions {
  /** Maximum length in code points before truncation (default 140) */
  maxLength?: number;

  /** Appended when the text is cut (default `…`) */
  ellipsis?: string;
}

export const DEFAULT_SUMMARY_LENGTH = 140;

/**
 * Remove Markdown punctuation, keeping the text
 */
export function stripMarkdown(text: string): string {
  return text
    .replace(/`([^`]+)`/g, '$1')
    .replace(/[*_~]/g, '')
    .replace(/^>\s?/gm, '')
    .replace(/^#{1,6}\s+/gm, '')
    .replace(/^[-*+]\s+/gm, '')
    .replace(/^\s*([-*_])\s*\1\s*\1\s*$/gm, '');
}

/**
 * Blank out headings and blockquotes so they never become the teaser
 */
function blankNonProse(body: string): string {
  return splitLines(body)
    .map((line) => {
      const stripped = line.trim();
      return !stripped || stripped.startsWith('>') || stripped.startsWith('#') ? '' : line;
    })
    .join('\n');
}

/**
 * Derive a single-line teaser from the first paragraph
 */
export function extractSummary(body: string, options: SummaryOptions = {}): string {
  const maxLength = options.maxLength ?? DEFAULT_SUMMARY_LENGTH;
  const ellipsis = options.ellipsis ?? '…';

  const prose = blankNonProse(body);
  const paragraphs = prose
    .split(/\n\s*\n/)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

  const plain = stripMarkdown(paragraphs[0] ?? prose)
    .trim()
    .replace(/\n/g, ' ');

  const chars = Array.from(plain);
  return chars.length > maxLength ? chars.slice(0, maxLength).join('') + ellipsis : plain;
}
