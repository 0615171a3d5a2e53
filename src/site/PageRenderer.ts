/**
 * Page Renderer
 *
 * Listing cards and note detail pages. Every value taken from a note is
 * escaped here, except the note body, which the engine already produced as
 * safe HTML.
 *
 * @since 2026-10-19
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { escapeHtml } from '../inline/index.js';
import type { NoteRecord } from '../notes/index.js';
import type { CategoryConfig, SiteConfig, SiteText } from './SiteConfig.js';

const CARD_INDENT = 8;
const BODY_INDENT = 8;

const BUNDLED_TEMPLATE = fileURLToPath(new URL('../../templates/note-page.html', import.meta.url));

/**
 * Prefix every non-blank line with `spaces` spaces
 */
export function indentLines(text: string, spaces: number): string {
  const indent = ' '.repeat(spaces);
  return text
    .split('\n')
    .map((line) => (line.trim() ? `${indent}${line}` : line))
    .join('\n');
}

/**
 * Replace `{{name}}` placeholders in one pass; unknown names stay as they are
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match: string, name: string) => values[name] ?? match);
}

/**
 * Load the configured page template, or the bundled one
 */
export async function loadTemplate(config: SiteConfig, root: string): Promise<string> {
  const path = config.template ? resolve(root, config.template) : BUNDLED_TEMPLATE;
  return readFile(path, 'utf-8');
}

/**
 * `date · tag1，tag2` line shown under titles
 */
export function formatMetaLine(note: NoteRecord, text: SiteText): string {
  const tags = note.tags.length > 0 ? note.tags.join('，') : text.noTags;
  return `${note.dateDisplay} · ${tags}`;
}

/**
 * One listing card
 */
export function renderNoteCard(note: NoteRecord, text: SiteText, notesPath: string): string {
  const slug = escapeHtml(note.slug);
  return [
    `<article class="article-card" id="${slug}">`,
    '  <header class="article-card__header">',
    `    <h3>${escapeHtml(note.title)}</h3>`,
    `    <p class="article-card__meta">${escapeHtml(formatMetaLine(note, text))}</p>`,
    '  </header>',
    `  <p class="article-card__summary">${escapeHtml(note.summary)}</p>`,
    '  <div class="article-card__actions">',
    `    <a class="article-card__link" href="${escapeHtml(notesPath)}/${slug}.html">${escapeHtml(text.readMore)}</a>`,
    '  </div>',
    '</article>',
  ].join('\n');
}

/**
 * All cards of one listing, indented for the placeholder region
 */
export function buildArticleList(notes: readonly NoteRecord[], text: SiteText, notesPath: string): string {
  if (notes.length === 0) {
    return indentLines(`<p class="empty-state">${escapeHtml(text.emptyState)}</p>`, CARD_INDENT);
  }
  return notes.map((note) => indentLines(renderNoteCard(note, text, notesPath), CARD_INDENT)).join('\n');
}

/**
 * Category of a note, falling back to the default one
 */
export function resolveCategory(config: SiteConfig, category: string): { key: string; info: CategoryConfig } {
  const key = Object.hasOwn(config.categories, category) ? category : config.defaultCategory;
  return { key, info: config.categories[key] };
}

function renderNav(config: SiteConfig, activeKey: string): string {
  return Object.entries(config.categories)
    .map(([key, info]) => {
      const active = key === activeKey ? ' class="active"' : '';
      return `      <a href="../${escapeHtml(info.page)}"${active}>${escapeHtml(info.title)}</a>`;
    })
    .join('\n');
}

/**
 * Date and tag paragraphs placed above the note body
 */
function renderMetaParagraphs(note: NoteRecord, config: SiteConfig): string[] {
  const lines: string[] = [];
  if (note.dateDisplay && note.dateDisplay !== config.undatedLabel) {
    lines.push(escapeHtml(`${config.text.dateLabel}${note.dateDisplay}`));
  }
  if (note.tags.length > 0) {
    lines.push(escapeHtml(`${config.text.tagsLabel}${note.tags.join('、')}`));
  }
  return lines.map((line) => `<p class="article-detail__meta">${line}</p>`);
}

/**
 * Full detail page for one note
 */
export function renderNotePage(note: NoteRecord, config: SiteConfig, template: string): string {
  const { key, info } = resolveCategory(config, note.category);
  const body = [...renderMetaParagraphs(note, config), note.html].join('\n');

  return fillTemplate(template, {
    title: escapeHtml(note.title),
    pageTitle: escapeHtml(info.title),
    heroClass: escapeHtml(info.heroClass),
    badge: escapeHtml(info.badge),
    listPage: escapeHtml(info.page),
    nav: renderNav(config, key),
    metaLine: escapeHtml(formatMetaLine(note, config.text)),
    siteTitle: escapeHtml(config.siteTitle),
    brandMark: escapeHtml(config.brandMark),
    homeLabel: escapeHtml(config.text.home),
    contactLabel: escapeHtml(config.text.contact),
    backLabel: escapeHtml(config.text.backToList),
    body: indentLines(body, BODY_INDENT),
  });
}
