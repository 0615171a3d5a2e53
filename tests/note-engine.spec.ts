/**
 * Tests for note conversion
 */
import { describe, it, expect } from 'vitest';
import { SimpleMarkdownRenderer } from '../src/markdown/index.js';
import { NoteEngine, createNoteEngine } from '../src/notes/index.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const FULL_NOTE = [
  '---',
  'title: Café Notes',
  'date: 2024-05-01',
  'category: papers',
  'source: lab',
  '---',
  '# Café Notes',
  '> 标签：免疫、衰老',
  '> 摘要：Short teaser',
  '',
  'Intro with [link](https://example.com).',
  '',
  '- one',
  '- two',
].join('\n');

describe('NoteEngine', () => {
  const engine = new NoteEngine({ renderer: new SimpleMarkdownRenderer() });

  it('should convert a fully annotated note', () => {
    const note = engine.convert({ file: 'notes/cafe.md', stem: 'cafe', content: FULL_NOTE }, 1);

    expect(note.title).toBe('Café Notes');
    expect(note.dateDisplay).toBe('2024-05-01');
    expect(note.sortKey).toEqual({ kind: 'dated', timestamp: Date.UTC(2024, 4, 1) });
    expect(note.tags).toEqual(['免疫', '衰老']);
    expect(note.summary).toBe('Short teaser');
    expect(note.category).toBe('papers');
    expect(note.extra).toEqual({ source: 'lab' });
    expect(note.slug).toBe('cafe-notes');
    expect(note.file).toBe('notes/cafe.md');
    expect(note.uuid).toMatch(UUID_PATTERN);
    expect(note.hash).toMatch(/^[0-9a-f]{16}$/);
    expect(note.html).toBe(
      [
        '<h1>Café Notes</h1>',
        '<blockquote>',
        '  <p>摘要：Short teaser</p>',
        '</blockquote>',
        '<p>Intro with <a href="https://example.com">link</a>.</p>',
        '<ul>',
        '  <li>one</li>',
        '  <li>two</li>',
        '</ul>',
      ].join('\n')
    );
    expect(Object.isFrozen(note)).toBe(true);
  });

  it('should read both tag list forms the same way', () => {
    const bracketed = engine.convert({ file: 'a.md', stem: 'a', content: '---\ntags: [a, b]\n---\ntext' }, 1);
    const plain = engine.convert({ file: 'b.md', stem: 'b', content: '---\ntags: a,b\n---\ntext' }, 2);

    expect(bracketed.tags).toEqual(['a', 'b']);
    expect(plain.tags).toEqual(['a', 'b']);
  });

  it('should fill defaults for a bare note', () => {
    const note = engine.convert({ file: 't.md', stem: 't', content: '# T\n\nFirst paragraph here.' }, 1);

    expect(note.title).toBe('T');
    expect(note.summary).toBe('First paragraph here.');
    expect(note.dateDisplay).toBe('未注明日期');
    expect(note.sortKey).toEqual({ kind: 'oldest' });
    expect(note.category).toBe('basics');
    expect(note.tags).toEqual([]);
    expect(note.extra).toEqual({});
  });

  it('should fall back to the stem and its bytes for title and slug', () => {
    const note = engine.convert({ file: '炎症笔记.md', stem: '炎症笔记', content: 'just text' }, 3);

    expect(note.title).toBe('炎症笔记');
    expect(note.slug).toBe('note-e7828ee7');
  });

  it('should drop date and tag annotations from the body', () => {
    const note = engine.convert({ file: 'd.md', stem: 'd', content: '> Date: 2024-01-01\n> Tags: x\n\nBody' }, 1);

    expect(note.dateDisplay).toBe('2024-01-01');
    expect(note.tags).toEqual(['x']);
    expect(note.html).toBe('<p>Body</p>');
  });

  it('should drop Chinese-labelled annotations and keep partial ASCII matches', () => {
    const content = '> 日期：2024-02-02\n> 标题：别名\n> updated weekly\n\nBody';
    const note = engine.convert({ file: 'z.md', stem: 'z', content }, 1);

    expect(note.dateDisplay).toBe('2024-02-02');
    expect(note.html).toBe('<blockquote>\n  <p>updated weekly</p>\n</blockquote>\n<p>Body</p>');
  });

  it('should hash identical content identically', () => {
    const a = engine.convert({ file: 'a.md', stem: 'a', content: 'same' }, 1);
    const b = engine.convert({ file: 'b.md', stem: 'b', content: 'same' }, 2);

    expect(a.hash).toBe(b.hash);
    expect(a.uuid).not.toBe(b.uuid);
  });

  it('should honour custom defaults and summary length', () => {
    const custom = new NoteEngine({
      renderer: new SimpleMarkdownRenderer(),
      defaultCategory: 'stories',
      undatedLabel: 'n/a',
      summaryLength: 4,
    });
    const note = custom.convert({ file: 'x.md', stem: 'x', content: 'abcdefg' }, 1);

    expect(note.category).toBe('stories');
    expect(note.dateDisplay).toBe('n/a');
    expect(note.summary).toBe('abcd…');
  });
});

describe('createNoteEngine', () => {
  it('should use the built-in renderer by default', async () => {
    const engine = await createNoteEngine();
    expect(engine.rendererName).toBe('simple');
  });

  it('should pass block parser options to the built-in renderer', async () => {
    const engine = await createNoteEngine({ blockParser: { inlineBlockquoteLinks: true } });
    const note = engine.convert({ file: 'q.md', stem: 'q', content: '> see [a](b)' }, 1);
    expect(note.html).toBe('<blockquote>\n  <p>see <a href="b">a</a></p>\n</blockquote>');
  });

  it('should render tables with the marked renderer', async () => {
    const engine = await createNoteEngine({ renderer: 'marked' });
    const note = engine.convert({ file: 't.md', stem: 't', content: '| A | B |\n| - | - |\n| 1 | 2 |' }, 1);

    expect(engine.rendererName).toBe('marked');
    expect(note.html).toContain('<th>A</th>');
    expect(note.html).toContain('<td>2</td>');
  });

  it('should escape raw HTML with the marked renderer', async () => {
    const engine = await createNoteEngine({ renderer: 'marked' });
    const note = engine.convert({ file: 's.md', stem: 's', content: '<script>alert(1)</script>' }, 1);

    expect(note.html).not.toContain('<script>');
    expect(note.html).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
  });
});
