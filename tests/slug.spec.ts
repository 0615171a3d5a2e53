/**
 * Tests for slug generation
 */
import { describe, it, expect } from 'vitest';
import { normalizeSlug, slugify } from '../src/slug/index.js';

const SLUG_SHAPE = /^[a-z0-9]+(-[a-z0-9]+)*$/;

describe('normalizeSlug', () => {
  it('should lowercase and hyphenate punctuation', () => {
    expect(normalizeSlug('Hello, World!')).toBe('hello-world');
  });

  it('should strip diacritics and expand compatibility forms', () => {
    expect(normalizeSlug('Café Crème')).toBe('cafe-creme');
    expect(normalizeSlug('ﬁle')).toBe('file');
  });

  it('should collapse and trim hyphens', () => {
    expect(normalizeSlug('  --Leading and trailing--  ')).toBe('leading-and-trailing');
  });

  it('should return an empty string when nothing survives', () => {
    expect(normalizeSlug('炎症衰老')).toBe('');
    expect(normalizeSlug('!!!')).toBe('');
  });
});

describe('slugify', () => {
  it('should prefer the primary seed', () => {
    expect(slugify('Inflammaging 101', 'file-name', 1)).toBe('inflammaging-101');
  });

  it('should fall back to the stem when the title has no ASCII', () => {
    expect(slugify('炎症衰老', 'inflammaging-notes', 1)).toBe('inflammaging-notes');
  });

  it('should fall back to the hex bytes of the stem', () => {
    expect(slugify('炎症', '笔记', 5)).toBe('note-e7ac94e8');
    expect(slugify('', '!!!', 5)).toBe('note-212121');
  });

  it('should fall back to the sequence number when both seeds are empty', () => {
    expect(slugify('', '', 7)).toBe('note-007');
    expect(slugify('!!!', '', 42)).toBe('note-042');
    expect(slugify('', '', 1234)).toBe('note-1234');
  });

  it('should normalize odd sequence numbers', () => {
    expect(slugify('', '', -3)).toBe('note-003');
    expect(slugify('', '', 2.7)).toBe('note-002');
    expect(slugify('', '', Number.NaN)).toBe('note-000');
  });

  it('should always produce a well-formed slug', () => {
    const seeds: Array<[string, string, number]> = [
      ['Hello', 'x', 1],
      ['炎症', '衰老', 2],
      ['---', '___', 3],
      ['', '', 0],
      ['Ünïcödé  Tïtle', '', 4],
      ['a--b', '', 5],
      ['  ', ' ', 6],
    ];
    for (const [primary, fallback, sequence] of seeds) {
      expect(slugify(primary, fallback, sequence)).toMatch(SLUG_SHAPE);
    }
  });
});
