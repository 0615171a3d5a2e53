/**
 * Front matter and inline annotation metadata
 *
 * @since 2026-10-19
 */

export {
  extractFrontMatter,
  parseFrontMatterLines,
  parseListValue,
  DEFAULT_METADATA_LABELS,
} from './FrontMatterExtractor.js';
export type {
  DocumentMeta,
  FrontMatterBlock,
  FrontMatterData,
  FrontMatterOptions,
  FrontMatterResult,
  FrontMatterValue,
  MetadataLabels,
} from './types.js';
