/**
 * Page Writer
 *
 * Writes note detail pages and splices listings into existing pages
 * between placeholder comments.
 *
 * @since 2026-10-19
 */

import { mkdir, readdir, readFile, unlink, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { NoteRecord } from '../notes/index.js';
import { isNotFound, pathExists } from './fs-utils.js';
import { renderNotePage } from './PageRenderer.js';
import type { SiteConfig } from './SiteConfig.js';

export interface WriteResult {
  /** Pages written, by slug */
  written: string[];

  /** Stale pages removed, by slug */
  removed: string[];
}

/**
 * Write `<slug>.html` for every note and delete pages no note produces anymore
 */
export async function writeNotePages(
  notes: readonly NoteRecord[],
  outputDir: string,
  config: SiteConfig,
  template: string
): Promise<WriteResult> {
  await mkdir(outputDir, { recursive: true });

  const existing = (await readdir(outputDir))
    .filter((name) => extname(name) === '.html')
    .map((name) => basename(name, '.html'));

  const written: string[] = [];
  for (const note of notes) {
    await writeFile(join(outputDir, `${note.slug}.html`), renderNotePage(note, config, template), 'utf-8');
    written.push(note.slug);
  }

  const current = new Set(written);
  const removed: string[] = [];
  for (const stale of existing.filter((slug) => !current.has(slug))) {
    try {
      await unlink(join(outputDir, `${stale}.html`));
      removed.push(stale);
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  return { written, removed };
}

/**
 * Replace everything between `startMarker` and `endMarker` in `target`
 */
export async function updateSection(
  target: string,
  startMarker: string,
  endMarker: string,
  content: string
): Promise<void> {
  if (!(await pathExists(target))) {
    throw new Error(`Page file not found: ${target}`);
  }

  const html = await readFile(target, 'utf-8');
  const startIdx = html.indexOf(startMarker);
  const endIdx = html.indexOf(endMarker);

  if (startIdx === -1 || endIdx === -1 || endIdx < startIdx) {
    throw new Error(`${basename(target)} has no valid placeholder comments`);
  }

  const updated = `${html.slice(0, startIdx + startMarker.length)}\n${content}\n${html.slice(endIdx)}`;
  await writeFile(target, updated, 'utf-8');
}
