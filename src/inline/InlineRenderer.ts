/**
 * Inline Renderer
 *
 * Escapes a text span for HTML and turns `[label](url)` occurrences into
 * anchors. Links are swapped for placeholder tokens before the text is
 * escaped, then replaced with fully rendered anchor markup, so the anchors
 * themselves are never escaped twice and link syntax never leaks into the
 * output.
 *
 * @since 2026-10-19
 */

import { v4 as uuidv4 } from 'uuid';
import type { LinkSpan } from './types.js';

const LINK_PATTERN = /\[([^\]]+)\]\(([^)]+)\)/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/**
 * Escape `&`, `<`, `>` and both quote characters.
 *
 * Not idempotent: `escapeHtml('&amp;')` yields `&amp;amp;`.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Find every `[label](url)` span, left to right, non-overlapping
 */
export function findLinkSpans(text: string): LinkSpan[] {
  const spans: LinkSpan[] = [];
  for (const match of text.matchAll(LINK_PATTERN)) {
    const start = match.index ?? 0;
    spans.push({
      label: match[1],
      url: match[2],
      start,
      end: start + match[0].length,
    });
  }
  return spans;
}

/**
 * Render one link as an anchor with label and href escaped independently
 */
export function renderLink(link: Pick<LinkSpan, 'label' | 'url'>): string {
  return `<a href="${escapeHtml(link.url)}">${escapeHtml(link.label)}</a>`;
}

/**
 * Build a token prefix that does not occur anywhere in `text`.
 * Only ASCII letters, digits and hyphens are used, which escaping leaves alone.
 */
function createPlaceholderPrefix(text: string): string {
  let prefix = `mdlink-${uuidv4()}-`;
  while (text.includes(prefix)) {
    prefix = `mdlink-${uuidv4()}-`;
  }
  return prefix;
}

/**
 * Escape a text span and render its inline links
 */
export function renderInline(text: string): string {
  const links = findLinkSpans(text);
  if (links.length === 0) {
    return escapeHtml(text);
  }

  const prefix = createPlaceholderPrefix(text);
  const token = (index: number) => `${prefix}${index}-end`;

  let withPlaceholders = '';
  let cursor = 0;
  links.forEach((link, index) => {
    withPlaceholders += text.slice(cursor, link.start) + token(index);
    cursor = link.end;
  });
  withPlaceholders += text.slice(cursor);

  let html = escapeHtml(withPlaceholders);
  links.forEach((link, index) => {
    html = html.replace(token(index), () => renderLink(link));
  });
  return html;
}
