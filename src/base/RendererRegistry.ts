/**
 * Renderer Registry
 *
 * Holds the available Markdown renderers, initializes them on demand and
 * resolves the configured one. The built-in `simple` renderer is the
 * fallback whenever the preferred one is missing or fails to load.
 */

import type { MarkdownRenderer, RendererName } from './MarkdownRenderer.js';

export class RendererRegistry {
  private renderers = new Map<RendererName, MarkdownRenderer>();
  private initialized = new Set<RendererName>();

  constructor(private readonly fallback: MarkdownRenderer) {
    this.register(fallback);
  }

  /**
   * Register a renderer
   */
  register(renderer: MarkdownRenderer): void {
    if (this.renderers.has(renderer.name)) {
      console.warn(`Renderer ${renderer.name} already registered, overwriting`);
    }
    this.renderers.set(renderer.name, renderer);
    // Re-registering drops the initialized flag
    this.initialized.delete(renderer.name);
  }

  /**
   * Get a renderer by name
   */
  getRenderer(name: RendererName): MarkdownRenderer | null {
    return this.renderers.get(name) ?? null;
  }

  /**
   * Get all registered names
   */
  getNames(): RendererName[] {
    return Array.from(this.renderers.keys());
  }

  /**
   * Initialize a specific renderer
   */
  async initializeRenderer(name: RendererName): Promise<MarkdownRenderer> {
    const renderer = this.renderers.get(name);
    if (!renderer) {
      throw new Error(`No renderer registered under name: ${name}`);
    }

    if (!this.initialized.has(name)) {
      await renderer.initialize();
      this.initialized.add(name);
    }
    return renderer;
  }

  /**
   * Check if a renderer is initialized
   */
  isInitialized(name: RendererName): boolean {
    return this.initialized.has(name);
  }

  /**
   * Initialize and return the preferred renderer, or the fallback when it
   * is unknown or cannot be initialized
   */
  async resolve(preferred: RendererName = this.fallback.name): Promise<MarkdownRenderer> {
    if (preferred !== this.fallback.name) {
      try {
        return await this.initializeRenderer(preferred);
      } catch (error) {
        console.warn(
          `⚠️ Renderer "${preferred}" unavailable, falling back to "${this.fallback.name}":`,
          error instanceof Error ? error.message : error
        );
      }
    }
    return this.initializeRenderer(this.fallback.name);
  }

  /**
   * Cleanup all renderers
   */
  async dispose(): Promise<void> {
    const disposePromises = Array.from(this.renderers.values()).map(async (renderer) => {
      if (renderer.dispose) {
        await renderer.dispose();
      }
    });

    await Promise.all(disposePromises);
    this.initialized.clear();
  }
}
