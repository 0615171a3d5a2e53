/**
 * markdown-notes
 *
 * Markdown-to-HTML engine for a small notes site: front matter and
 * annotation metadata, slugs, summaries, and a block renderer for a fixed
 * Markdown subset.
 *
 * ## Engine:
 * - createNoteEngine / NoteEngine - one document in, metadata + HTML out
 * - extractFrontMatter, slugify, extractSummary, renderInline - the parts
 * - SimpleMarkdownRenderer, MarkedRenderer, RendererRegistry - body renderers
 *
 * ## Site build:
 * - buildSite and friends, used by the CLI
 */

// Base infrastructure (renderer interface, registry)
export * from './base/index.js';

// Engine parts
export * from './inline/index.js';
export * from './slug/index.js';
export * from './frontmatter/index.js';
export * from './markdown/index.js';
export * from './summary/index.js';

// Note records
export * from './notes/index.js';

// Build driver
export * from './site/index.js';
