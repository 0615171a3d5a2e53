/**
 * Inline rendering: HTML escaping and `[label](url)` links
 */

export { escapeHtml, findLinkSpans, renderInline, renderLink } from './InlineRenderer.js';
export type { LinkSpan } from './types.js';
