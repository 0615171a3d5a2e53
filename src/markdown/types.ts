/**
 * Types for the block parser
 *
 * Block elements only live between parsing a line run and serializing it;
 * nothing downstream keeps them.
 *
 * @since 2026-10-19
 */

export type ListKind = 'ordered' | 'unordered';

export interface HeadingBlock {
  type: 'heading';
  /** Heading level (1-6) */
  level: number;
  text: string;
}

export interface BlockquoteBlock {
  type: 'blockquote';
  /** One entry per source line, marker removed */
  lines: string[];
}

export interface ListBlock {
  type: 'list';
  kind: ListKind;
  items: string[];
}

export interface RuleBlock {
  type: 'rule';
}

export interface ParagraphBlock {
  type: 'paragraph';
  /** Source lines joined with single spaces */
  text: string;
}

export interface TableRow {
  cells: string[];
  isHeader: boolean;
}

export interface TableBlock {
  type: 'table';
  rows: TableRow[];
}

export type BlockElement =
  | HeadingBlock
  | BlockquoteBlock
  | ListBlock
  | RuleBlock
  | ParagraphBlock
  | TableBlock;

/**
 * Block parser options
 */
export interface BlockParserOptions {
  /**
   * Render `[label](url)` links inside blockquotes.
   * Off by default: blockquote lines are only escaped.
   */
  inlineBlockquoteLinks?: boolean;
}
