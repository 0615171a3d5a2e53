/**
 * Types for note records
 *
 * @since 2026-10-19
 */

import type { MarkdownRenderer } from '../base/MarkdownRenderer.js';
import type { FrontMatterValue, MetadataLabels } from '../frontmatter/types.js';

/**
 * One source file, as read by the caller
 */
export interface SourceDocument {
  /** File path (informational) */
  file: string;

  /** File name without extension; title and slug fallback */
  stem: string;

  /** Raw UTF-8 text */
  content: string;
}

/**
 * Sort position derived from the display date.
 * `oldest` sorts before every dated key.
 */
export type SortKey =
  | { kind: 'dated'; timestamp: number }
  | { kind: 'oldest' };

/**
 * Metadata record of a note
 */
export interface NoteMetadata {
  readonly title: string;

  /** Date as written by the author; not validated */
  readonly dateDisplay: string;

  readonly summary: string;

  /** Never absent; empty when the note has no tags */
  readonly tags: readonly string[];

  readonly category: string;

  /** Computed once from `dateDisplay` */
  readonly sortKey: SortKey;

  /** Front-matter keys with no dedicated field, verbatim */
  readonly extra: Readonly<Record<string, FrontMatterValue>>;
}

/**
 * Fields needed to build a metadata record
 */
export type NoteMetadataInput = Omit<NoteMetadata, 'sortKey' | 'extra'> & {
  extra?: Record<string, FrontMatterValue>;
};

/**
 * A converted note: metadata plus rendered body
 */
export interface NoteRecord extends NoteMetadata {
  /** Unique identifier for this conversion */
  readonly uuid: string;

  /** Source file path */
  readonly file: string;

  /** Content hash (sha256, first 16 hex chars) */
  readonly hash: string;

  readonly slug: string;

  /** Rendered body, safe to embed without further escaping */
  readonly html: string;
}

/**
 * Note engine options
 */
export interface NoteEngineOptions {
  /** Renderer used for note bodies */
  renderer: MarkdownRenderer;

  /** Category for notes that name none (default `basics`) */
  defaultCategory?: string;

  /** Shown instead of a date when the note has none (default `未注明日期`) */
  undatedLabel?: string;

  /** Annotation labels for `> label: value` lines */
  labels?: Partial<MetadataLabels>;

  /** Labels of title annotations, removed from the body with date and tag lines */
  titleLabels?: string[];

  /** Teaser length in code points (default 140) */
  summaryLength?: number;
}
