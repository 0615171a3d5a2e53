/**
 * Full-featured renderer backed by `marked`
 *
 * Loaded on demand, so a build that sticks to the built-in renderer never
 * imports the library. Raw HTML in the source is escaped rather than passed
 * through, which keeps the output embeddable as-is.
 *
 * @since 2026-10-19
 */

import type { Marked } from 'marked';
import { BaseMarkdownRenderer } from '../base/MarkdownRenderer.js';
import { escapeHtml } from '../inline/index.js';

export class MarkedRenderer extends BaseMarkdownRenderer {
  readonly name = 'marked' as const;
  private marked: Marked | null = null;

  /**
   * Import `marked` and configure GFM rendering
   */
  async initialize(): Promise<void> {
    if (this.marked) return;

    const { Marked } = await import('marked');
    this.marked = new Marked({
      gfm: true,
      renderer: {
        html({ text }) {
          return escapeHtml(text);
        },
      },
    });
  }

  render(markdown: string): string {
    if (!this.marked) {
      throw new Error('MarkedRenderer.render() called before initialize()');
    }
    return this.marked.parse(markdown, { async: false });
  }
}
