/**
 * Markdown rendering
 *
 * - BlockParser: line state machine producing block elements
 * - serializeBlock: block element to HTML
 * - SimpleMarkdownRenderer: the two combined (default strategy)
 * - MarkedRenderer: `marked`-backed strategy
 *
 * @since 2026-10-19
 */

export { BlockParser, isTableRow, isTableDivider, splitTableCells } from './BlockParser.js';
export { serializeBlock } from './HtmlSerializer.js';
export { SimpleMarkdownRenderer } from './SimpleMarkdownRenderer.js';
export { MarkedRenderer } from './MarkedRenderer.js';
export type {
  BlockElement,
  BlockParserOptions,
  BlockquoteBlock,
  HeadingBlock,
  ListBlock,
  ListKind,
  ParagraphBlock,
  RuleBlock,
  TableBlock,
  TableRow,
} from './types.js';
