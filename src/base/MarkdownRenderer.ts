/**
 * Markdown Renderer Interface
 *
 * Common interface for the strategies that turn a note body into an HTML
 * fragment. The built-in block parser and the `marked` adapter both
 * implement it; one of them is chosen once, at startup.
 */

export type RendererName = 'simple' | 'marked';

export interface MarkdownRenderer {
  /**
   * Name used to select this renderer from configuration
   */
  readonly name: RendererName;

  /**
   * Load whatever the renderer needs (libraries, options)
   */
  initialize(): Promise<void>;

  /**
   * Render a Markdown body to an HTML fragment that is safe to embed as-is
   */
  render(markdown: string): string;

  /**
   * Cleanup resources (optional)
   */
  dispose?(): Promise<void>;
}

/**
 * Abstract base class providing common functionality
 */
export abstract class BaseMarkdownRenderer implements MarkdownRenderer {
  abstract readonly name: RendererName;

  abstract render(markdown: string): string;

  /**
   * Default initialize does nothing
   */
  async initialize(): Promise<void> {
    // Override if needed
  }
}
