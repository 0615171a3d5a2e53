/**
 * Site build: config, note collection, listings and detail pages
 *
 * @since 2026-10-19
 */

export { buildSite, groupByCategory } from './SiteBuilder.js';
export type { BuildOptions, BuildSummary } from './SiteBuilder.js';
export { collectNotes, orderSourceFiles } from './NoteCollector.js';
export {
  buildArticleList,
  fillTemplate,
  formatMetaLine,
  indentLines,
  loadTemplate,
  renderNoteCard,
  renderNotePage,
  resolveCategory,
} from './PageRenderer.js';
export { writeNotePages, updateSection } from './PageWriter.js';
export type { WriteResult } from './PageWriter.js';
export { loadSiteConfig, parseSiteConfig, SiteConfigSchema, DEFAULT_CONFIG_FILE } from './SiteConfig.js';
export type { SiteConfig, CategoryConfig, SiteText } from './SiteConfig.js';
