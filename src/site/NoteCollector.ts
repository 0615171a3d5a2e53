/**
 * Note Collector
 *
 * Reads every Markdown file in the source directory and converts it.
 * `.md` files come first, then `.markdown` files, each group sorted by name;
 * that order fixes the sequence numbers used by the last slug fallback.
 *
 * @since 2026-10-19
 */

import { readdir, readFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { compareNotes } from '../notes/index.js';
import type { NoteEngine, NoteRecord } from '../notes/index.js';
import { pathExists } from './fs-utils.js';

const EXTENSIONS = ['.md', '.markdown'];

/**
 * Markdown file names in conversion order
 */
export function orderSourceFiles(names: string[]): string[] {
  return EXTENSIONS.flatMap((ext) => names.filter((name) => extname(name) === ext).sort());
}

/**
 * Convert every note under `sourceDir`, newest first
 */
export async function collectNotes(sourceDir: string, engine: NoteEngine): Promise<NoteRecord[]> {
  if (!(await pathExists(sourceDir))) {
    throw new Error(`Markdown directory not found: ${sourceDir}`);
  }

  const files = orderSourceFiles(await readdir(sourceDir));
  const notes: NoteRecord[] = [];

  for (const [idx, name] of files.entries()) {
    const file = join(sourceDir, name);
    const content = await readFile(file, 'utf-8');
    notes.push(engine.convert({ file, stem: basename(name, extname(name)), content }, idx + 1));
  }

  return notes.sort(compareNotes);
}
