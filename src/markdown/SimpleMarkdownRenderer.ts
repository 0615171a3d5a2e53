/**
 * Built-in renderer: block parser + HTML serializer
 */

import { BaseMarkdownRenderer } from '../base/MarkdownRenderer.js';
import { BlockParser } from './BlockParser.js';
import { serializeBlock } from './HtmlSerializer.js';
import type { BlockParserOptions } from './types.js';

export class SimpleMarkdownRenderer extends BaseMarkdownRenderer {
  readonly name = 'simple' as const;
  private readonly parser = new BlockParser();

  constructor(private readonly options: BlockParserOptions = {}) {
    super();
  }

  render(markdown: string): string {
    return this.parser
      .parse(markdown)
      .map((block) => serializeBlock(block, this.options))
      .join('\n');
  }
}
