/**
 * Site Builder
 *
 * Whole build: load config, convert notes, refresh each category listing,
 * write detail pages.
 *
 * @since 2026-10-19
 */

import { resolve } from 'path';
import type { RendererName } from '../base/MarkdownRenderer.js';
import { createNoteEngine } from '../notes/index.js';
import type { NoteRecord } from '../notes/index.js';
import { pathExists } from './fs-utils.js';
import { collectNotes } from './NoteCollector.js';
import { buildArticleList, loadTemplate, resolveCategory } from './PageRenderer.js';
import { writeNotePages, updateSection } from './PageWriter.js';
import { DEFAULT_CONFIG_FILE, loadSiteConfig } from './SiteConfig.js';
import type { SiteConfig } from './SiteConfig.js';

export interface BuildOptions {
  /** Site root; config, source and output paths resolve against it */
  root: string;

  /** Config file, relative to the root */
  configFile?: string;

  /** Print listings instead of writing anything */
  dryRun?: boolean;

  /** Overrides the renderer named in the config */
  renderer?: RendererName;
}

export interface BuildSummary {
  notes: number;
  byCategory: Record<string, number>;
  listingsUpdated: string[];
  written: string[];
  removed: string[];
  dryRun: boolean;
}

/**
 * Group notes by category, config order preserved. Notes in an unknown
 * category land in the default one.
 */
export function groupByCategory(notes: readonly NoteRecord[], config: SiteConfig): Map<string, NoteRecord[]> {
  const groups = new Map<string, NoteRecord[]>(
    Object.keys(config.categories).map((key): [string, NoteRecord[]] => [key, []])
  );
  for (const note of notes) {
    const { key } = resolveCategory(config, note.category);
    groups.get(key)?.push(note);
  }
  return groups;
}

/**
 * Run the build
 */
export async function buildSite(options: BuildOptions): Promise<BuildSummary> {
  const root = resolve(options.root);
  const dryRun = options.dryRun ?? false;
  const config = await loadSiteConfig(root, options.configFile ?? DEFAULT_CONFIG_FILE);

  const engine = await createNoteEngine({
    renderer: options.renderer ?? config.renderer,
    defaultCategory: config.defaultCategory,
    undatedLabel: config.undatedLabel,
  });

  const notes = await collectNotes(resolve(root, config.sourceDir), engine);
  const groups = groupByCategory(notes, config);

  const summary: BuildSummary = {
    notes: notes.length,
    byCategory: Object.fromEntries([...groups].map(([key, group]): [string, number] => [key, group.length])),
    listingsUpdated: [],
    written: [],
    removed: [],
    dryRun,
  };

  for (const [key, group] of groups) {
    const listing = buildArticleList(group, config.text, config.outputDir);

    if (dryRun) {
      console.log(`\n=== ${key} ===`);
      console.log(listing);
      continue;
    }

    const page = config.categories[key].page;
    const target = resolve(root, page);
    if (!(await pathExists(target))) {
      console.warn(`⚠️ Listing page ${page} not found, skipping`);
      continue;
    }
    await updateSection(target, config.placeholders.start, config.placeholders.end, listing);
    summary.listingsUpdated.push(page);
  }

  if (dryRun) {
    return summary;
  }

  const template = await loadTemplate(config, root);
  const { written, removed } = await writeNotePages(notes, resolve(root, config.outputDir), config, template);
  summary.written = written;
  summary.removed = removed;

  const stats = Object.entries(summary.byCategory)
    .map(([key, count]) => `${key}: ${count}`)
    .join(', ');
  console.log(`📊 Processed ${notes.length} notes with the ${engine.rendererName} renderer (${stats})`);

  return summary;
}
