export { extractSummary, stripMarkdown, DEFAULT_SUMMARY_LENGTH } from './SummaryExtractor.js';
export type { SummaryOptions } from './SummaryExtractor.js';
