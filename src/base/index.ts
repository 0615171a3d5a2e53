/**
 * Base renderer infrastructure
 *
 * Exports the renderer interface and the registry that picks one at startup
 */

export * from './MarkdownRenderer.js';
export * from './RendererRegistry.js';
