/**
 * Types for the front-matter extractor
 *
 * @since 2026-10-19
 */

/**
 * A metadata value: plain string, or an ordered list of strings
 */
export type FrontMatterValue = string | string[];

/**
 * Parsed key/value pairs, keys lowercased
 */
export type FrontMatterData = Record<string, FrontMatterValue>;

/**
 * Metadata after both passes. `title` and `tags` are always present.
 */
export type DocumentMeta = FrontMatterData & {
  title: FrontMatterValue;
  tags: FrontMatterValue;
};

/**
 * Delimited `---` block at the top of a document
 */
export interface FrontMatterBlock {
  /** Raw lines between the delimiters */
  raw: string;

  /** Parsed key/value pairs */
  data: FrontMatterData;

  /** Index of the first body line (0-based) */
  endLine: number;

  /** False when the closing delimiter was never found */
  closed: boolean;
}

/**
 * Labels recognized in `> label: value` annotation lines
 */
export interface MetadataLabels {
  date: string[];
  tags: string[];
  summary: string[];
}

export interface FrontMatterOptions {
  /** Override the annotation labels; matched case- and diacritic-insensitively */
  labels?: Partial<MetadataLabels>;
}

/**
 * Extraction result
 */
export interface FrontMatterResult {
  meta: DocumentMeta;

  /** Document text after the front-matter block */
  body: string;

  /** The delimited block, if the document had one */
  frontMatter?: FrontMatterBlock;
}
