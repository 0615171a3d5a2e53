/**
 * HTML serialization for block elements
 *
 * @since 2026-10-19
 */

import { escapeHtml, renderInline } from '../inline/index.js';
import type { BlockElement, BlockParserOptions, TableRow } from './types.js';

function serializeRow(row: TableRow): string {
  const tag = row.isHeader ? 'th' : 'td';
  const cells = row.cells.map((cell) => `<${tag}>${renderInline(cell)}</${tag}>`).join('');
  return `<tr>${cells}</tr>`;
}

function serializeTable(rows: TableRow[]): string {
  const head = rows.filter((row) => row.isHeader);
  const body = rows.filter((row) => !row.isHeader);

  const parts = ['<table>'];
  if (head.length > 0) {
    parts.push('  <thead>', ...head.map((row) => `    ${serializeRow(row)}`), '  </thead>');
  }
  if (body.length > 0) {
    parts.push('  <tbody>', ...body.map((row) => `    ${serializeRow(row)}`), '  </tbody>');
  }
  parts.push('</table>');
  return parts.join('\n');
}

/**
 * Serialize one block element to HTML
 */
export function serializeBlock(block: BlockElement, options: BlockParserOptions = {}): string {
  switch (block.type) {
    case 'heading':
      return `<h${block.level}>${escapeHtml(block.text)}</h${block.level}>`;
    case 'blockquote': {
      const renderLine = options.inlineBlockquoteLinks ? renderInline : escapeHtml;
      const lines = block.lines.map((line) => `  <p>${renderLine(line)}</p>`);
      return ['<blockquote>', ...lines, '</blockquote>'].join('\n');
    }
    case 'list': {
      const tag = block.kind === 'ordered' ? 'ol' : 'ul';
      const items = block.items.map((item) => `  <li>${renderInline(item)}</li>`);
      return [`<${tag}>`, ...items, `</${tag}>`].join('\n');
    }
    case 'rule':
      return '<hr>';
    case 'paragraph':
      return `<p>${renderInline(block.text)}</p>`;
    case 'table':
      return serializeTable(block.rows);
  }
}
