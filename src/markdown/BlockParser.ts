/**
 * Block Parser
 *
 * Line-oriented state machine for the Markdown subset notes are written in:
 * headings, blockquotes, single-level lists, horizontal rules, paragraphs
 * and pipe tables. Exactly one block is open at a time; every transition
 * flushes it first.
 *
 * @since 2026-10-19
 */

import { splitLines } from '../base/text-utils.js';
import type { BlockElement, ListKind, TableRow } from './types.js';

const HEADING_PATTERN = /^(#{1,6})\s+(.*)$/;
const BLOCKQUOTE_PATTERN = /^>\s?(.*)$/;
const LIST_ITEM_PATTERN = /^\s*([*+-]|\d+[.)])\s+/;
const HORIZONTAL_RULE_PATTERN = /^\s*([-*_])(?:\s*\1){2,}\s*$/;
const TABLE_DIVIDER_PATTERN = /^[\s|:-]+$/;

/**
 * Open block, if any
 */
type ParserState =
  | { kind: 'none' }
  | { kind: 'paragraph'; lines: string[] }
  | { kind: 'blockquote'; lines: string[] }
  | { kind: 'list'; listKind: ListKind; items: string[] }
  | { kind: 'table'; rows: TableRow[] };

const NONE: ParserState = { kind: 'none' };

/**
 * A line wrapped in pipes, e.g. `| a | b |`
 */
export function isTableRow(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length >= 2 && trimmed.startsWith('|') && trimmed.endsWith('|');
}

/**
 * A header/body divider such as `| --- | :-: |`
 */
export function isTableDivider(line: string): boolean {
  const trimmed = line.trim();
  return TABLE_DIVIDER_PATTERN.test(trimmed) && trimmed.includes('-');
}

/**
 * Split a table row into trimmed cells, dropping the outer pipes
 */
export function splitTableCells(line: string): string[] {
  return line
    .trim()
    .slice(1, -1)
    .split('|')
    .map((cell) => cell.trim());
}

/**
 * Close the open state. `none`, blank paragraphs and tables made only of
 * divider rows yield nothing.
 */
function flushState(state: ParserState): BlockElement | null {
  switch (state.kind) {
    case 'none':
      return null;
    case 'paragraph': {
      const text = state.lines.join(' ').trim();
      return text ? { type: 'paragraph', text } : null;
    }
    case 'blockquote':
      return { type: 'blockquote', lines: state.lines };
    case 'list':
      return { type: 'list', kind: state.listKind, items: state.items };
    case 'table':
      return state.rows.length > 0 ? { type: 'table', rows: state.rows } : null;
  }
}

/**
 * Block Parser
 */
export class BlockParser {
  /**
   * Parse a Markdown body into block elements
   */
  parse(markdown: string): BlockElement[] {
    const blocks: BlockElement[] = [];
    let state: ParserState = NONE;

    const flush = (): void => {
      const block = flushState(state);
      if (block) blocks.push(block);
      state = NONE;
    };

    for (const raw of splitLines(markdown)) {
      const line = raw.replace(/\s+$/, '');

      // 1. Table rows
      if (isTableRow(line)) {
        if (state.kind !== 'table') {
          flush();
          state = { kind: 'table', rows: [] };
        }
        if (!isTableDivider(line)) {
          state.rows.push({ cells: splitTableCells(line), isHeader: state.rows.length === 0 });
        }
        continue;
      }
      if (state.kind === 'table') {
        flush();
      }

      // 2. Blank line
      if (!line.trim()) {
        flush();
        continue;
      }

      // 3. Horizontal rule
      if (HORIZONTAL_RULE_PATTERN.test(line)) {
        flush();
        blocks.push({ type: 'rule' });
        continue;
      }

      // 4. Heading
      const heading = line.match(HEADING_PATTERN);
      if (heading) {
        flush();
        blocks.push({ type: 'heading', level: heading[1].length, text: heading[2].trim() });
        continue;
      }

      // 5. Blockquote
      const quote = line.match(BLOCKQUOTE_PATTERN);
      if (quote) {
        if (state.kind !== 'blockquote') {
          flush();
          state = { kind: 'blockquote', lines: [] };
        }
        state.lines.push(quote[1].trim());
        continue;
      }

      // 6. List item
      const item = line.match(LIST_ITEM_PATTERN);
      if (item) {
        const listKind: ListKind = /^\d/.test(item[1]) ? 'ordered' : 'unordered';
        if (state.kind !== 'list' || state.listKind !== listKind) {
          flush();
          state = { kind: 'list', listKind, items: [] };
        }
        state.items.push(line.slice(item[0].length).trim());
        continue;
      }

      // 7. Paragraph text
      if (state.kind !== 'paragraph') {
        flush();
        state = { kind: 'paragraph', lines: [] };
      }
      state.lines.push(line);
    }

    flush();
    return blocks;
  }
}
