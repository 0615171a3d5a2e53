/**
 * Note Engine
 *
 * Converts one source document into a note record:
 * front matter → metadata, body → HTML, title → slug, first paragraph →
 * summary when the author gave none.
 *
 * @since 2026-10-19
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type { MarkdownRenderer, RendererName } from '../base/MarkdownRenderer.js';
import { RendererRegistry } from '../base/RendererRegistry.js';
import { containsLabel, splitDelimited, splitLines } from '../base/text-utils.js';
import { DEFAULT_METADATA_LABELS, extractFrontMatter } from '../frontmatter/index.js';
import type { DocumentMeta, FrontMatterValue, MetadataLabels } from '../frontmatter/index.js';
import { MarkedRenderer, SimpleMarkdownRenderer } from '../markdown/index.js';
import type { BlockParserOptions } from '../markdown/index.js';
import { DEFAULT_SUMMARY_LENGTH, extractSummary } from '../summary/index.js';
import { slugify } from '../slug/index.js';
import { createNoteMetadata } from './NoteMetadata.js';
import type { NoteEngineOptions, NoteRecord, SourceDocument } from './types.js';

export const DEFAULT_CATEGORY = 'basics';
export const DEFAULT_UNDATED_LABEL = '未注明日期';
export const DEFAULT_TITLE_LABELS = ['标题', 'title'];

/** Front-matter keys with a dedicated metadata field */
const KNOWN_KEYS = new Set(['title', 'date', 'summary', 'tags', 'category']);

function asText(value: FrontMatterValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(', ') : value;
}

/**
 * `tags: a, b` and `tags: [a, b]` mean the same list
 */
function asTags(value: FrontMatterValue): string[] {
  return Array.isArray(value) ? [...value] : splitDelimited(value);
}

function extraFields(meta: DocumentMeta): Record<string, FrontMatterValue> {
  return Object.fromEntries(Object.entries(meta).filter(([key]) => !KNOWN_KEYS.has(key)));
}

/**
 * Note Engine
 */
export class NoteEngine {
  private readonly renderer: MarkdownRenderer;
  private readonly defaultCategory: string;
  private readonly undatedLabel: string;
  private readonly labels: MetadataLabels;
  private readonly annotationLabels: string[];
  private readonly summaryLength: number;

  constructor(options: NoteEngineOptions) {
    this.renderer = options.renderer;
    this.defaultCategory = options.defaultCategory ?? DEFAULT_CATEGORY;
    this.undatedLabel = options.undatedLabel ?? DEFAULT_UNDATED_LABEL;
    this.labels = { ...DEFAULT_METADATA_LABELS, ...options.labels };
    this.annotationLabels = [
      ...(options.titleLabels ?? DEFAULT_TITLE_LABELS),
      ...this.labels.date,
      ...this.labels.tags,
    ];
    this.summaryLength = options.summaryLength ?? DEFAULT_SUMMARY_LENGTH;
  }

  /**
   * Name of the renderer in use
   */
  get rendererName(): RendererName {
    return this.renderer.name;
  }

  /**
   * Convert a document. `sequence` only feeds the last slug fallback.
   */
  convert(document: SourceDocument, sequence: number): NoteRecord {
    const { meta, body } = extractFrontMatter(document.content, document.stem, {
      labels: this.labels,
    });

    const title = asText(meta.title) ?? document.stem;
    const explicitSummary = asText(meta.summary) ?? '';
    const summary = explicitSummary || extractSummary(body, { maxLength: this.summaryLength });

    const metadata = createNoteMetadata({
      title,
      dateDisplay: asText(meta.date) ?? this.undatedLabel,
      summary,
      tags: asTags(meta.tags),
      category: asText(meta.category) ?? this.defaultCategory,
      extra: extraFields(meta),
    });

    return Object.freeze({
      ...metadata,
      uuid: uuidv4(),
      file: document.file,
      hash: createHash('sha256').update(document.content).digest('hex').slice(0, 16),
      slug: slugify(title, document.stem, sequence),
      html: this.renderer.render(this.stripAnnotations(body)),
    });
  }

  /**
   * Drop `>` lines carrying title/date/tag annotations; the page shows those
   * from metadata.
   *
   * Labels are matched like the metadata labels: Chinese labels (`> 日期：…`)
   * are dropped too, and ASCII labels only as whole words, so `> updated`
   * stays. Bodies therefore differ from pages built with plain substring
   * matching on `date`/`tags`/`title`, which kept the Chinese lines.
   */
  private stripAnnotations(body: string): string {
    return splitLines(body)
      .filter((line) => {
        const stripped = line.trim();
        return !(stripped.startsWith('>') && containsLabel(stripped, this.annotationLabels));
      })
      .join('\n')
      .trim();
  }
}

export interface CreateNoteEngineOptions extends Omit<NoteEngineOptions, 'renderer'> {
  /** Preferred renderer (default `simple`) */
  renderer?: RendererName;

  /** Options for the built-in renderer */
  blockParser?: BlockParserOptions;
}

/**
 * Resolve the configured renderer once and build an engine around it.
 * Falls back to the built-in renderer when the preferred one cannot load.
 */
export async function createNoteEngine(options: CreateNoteEngineOptions = {}): Promise<NoteEngine> {
  const { renderer: preferred, blockParser, ...engineOptions } = options;

  const registry = new RendererRegistry(new SimpleMarkdownRenderer(blockParser));
  registry.register(new MarkedRenderer());

  const renderer = await registry.resolve(preferred);
  return new NoteEngine({ ...engineOptions, renderer });
}
