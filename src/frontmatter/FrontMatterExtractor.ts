/**
 * Front-Matter Extractor
 *
 * Splits a raw note into metadata and body. Two syntaxes are read:
 * - a `---` delimited block of `key: value` lines at the top
 * - `> label: value` annotation lines anywhere in the body
 *
 * The delimited block wins; annotations only fill keys it left unset.
 *
 * @since 2026-10-19
 */

import { containsLabel, splitDelimited, splitLines } from '../base/text-utils.js';
import type {
  DocumentMeta,
  FrontMatterBlock,
  FrontMatterData,
  FrontMatterOptions,
  FrontMatterResult,
  FrontMatterValue,
  MetadataLabels,
} from './types.js';

const DELIMITER = '---';
const FIELD_PATTERN = /^([A-Za-z_][A-Za-z0-9_-]*):\s*(.+)$/;
const DATE_PATTERN = /\d{4}-\d{2}-\d{2}/;
const TITLE_HEADING_PREFIX = '# ';

export const DEFAULT_METADATA_LABELS: MetadataLabels = {
  date: ['日期', 'date'],
  tags: ['标签', 'tags'],
  summary: ['摘要', 'summary'],
};

/**
 * Parse a bracketed list value.
 *
 * Valid JSON arrays are used as-is (elements stringified). Anything else
 * loses its brackets and is split on `,` `，` `、`, which is what authors
 * usually mean by `[a, b]`.
 */
export function parseListValue(value: string): string[] {
  try {
    const parsed: unknown = JSON.parse(value);
    if (Array.isArray(parsed)) {
      return parsed.map((item) => (typeof item === 'string' ? item : JSON.stringify(item)));
    }
  } catch {
    // fall through to delimiter split
  }
  return splitDelimited(value.replace(/^[[\]]+|[[\]]+$/g, ''));
}

/**
 * Parse `key: value` lines. Keys are lowercased; unknown keys are kept.
 */
export function parseFrontMatterLines(lines: string[]): FrontMatterData {
  const data: FrontMatterData = {};

  for (const line of lines) {
    const match = line.trim().match(FIELD_PATTERN);
    if (!match) continue;

    const key = match[1].toLowerCase();
    if (key === '__proto__') continue;
    const value = match[2].trim();
    data[key] = value.startsWith('[') && value.endsWith(']') ? parseListValue(value) : value;
  }

  return data;
}

/**
 * Read the delimited block, if the first line opens one
 */
function readFrontMatterBlock(lines: string[]): FrontMatterBlock | undefined {
  if (lines.length === 0 || lines[0].trim() !== DELIMITER) {
    return undefined;
  }

  const closingIdx = lines.findIndex((line, idx) => idx > 0 && line.trim() === DELIMITER);
  const closed = closingIdx !== -1;
  const blockLines = lines.slice(1, closed ? closingIdx : lines.length);

  return {
    raw: blockLines.join('\n'),
    data: parseFrontMatterLines(blockLines),
    endLine: closed ? closingIdx + 1 : lines.length,
    closed,
  };
}

/**
 * Text after the first fullwidth or ASCII colon, or the whole line
 */
function valueAfterColon(text: string): string {
  const idx = text.search(/[：:]/);
  return idx === -1 ? text : text.slice(idx + 1);
}

/**
 * Fill unset date/tags/summary keys from `>` annotation lines
 */
function readAnnotations(bodyLines: string[], meta: FrontMatterData, labels: MetadataLabels): void {
  for (const line of bodyLines) {
    if (!line.trimStart().startsWith('>')) continue;

    const clean = line.replace(/^[\s>]+/, '');

    if (!('date' in meta) && containsLabel(clean, labels.date)) {
      const date = clean.match(DATE_PATTERN);
      if (date) {
        meta.date = date[0];
      }
    }
    if (!('tags' in meta) && containsLabel(clean, labels.tags)) {
      meta.tags = splitDelimited(valueAfterColon(clean));
    }
    if (!('summary' in meta) && containsLabel(clean, labels.summary)) {
      meta.summary = valueAfterColon(clean).trim();
    }
  }
}

function resolveTitle(meta: FrontMatterData, bodyLines: string[], fileStem: string): FrontMatterValue {
  const explicit = meta.title;
  if (explicit !== undefined) {
    return explicit;
  }
  const heading = bodyLines.find((line) => line.startsWith(TITLE_HEADING_PREFIX));
  return heading !== undefined ? heading.slice(TITLE_HEADING_PREFIX.length).trim() : fileStem;
}

/**
 * Split a raw document into metadata and body
 */
export function extractFrontMatter(
  text: string,
  fileStem: string,
  options: FrontMatterOptions = {}
): FrontMatterResult {
  const labels: MetadataLabels = { ...DEFAULT_METADATA_LABELS, ...options.labels };
  const lines = splitLines(text);

  const frontMatter = readFrontMatterBlock(lines);
  const data: FrontMatterData = { ...frontMatter?.data };
  const bodyLines = lines.slice(frontMatter?.endLine ?? 0);

  const title = resolveTitle(data, bodyLines, fileStem);
  readAnnotations(bodyLines, data, labels);

  const meta: DocumentMeta = {
    ...data,
    title,
    tags: data.tags ?? [],
  };

  return {
    meta,
    body: bodyLines.join('\n'),
    frontMatter,
  };
}
