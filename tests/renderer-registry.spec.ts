/**
 * Tests for RendererRegistry
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BaseMarkdownRenderer } from '../src/base/MarkdownRenderer.js';
import { RendererRegistry } from '../src/base/RendererRegistry.js';
import { SimpleMarkdownRenderer } from '../src/markdown/index.js';

class FailingRenderer extends BaseMarkdownRenderer {
  readonly name = 'marked' as const;

  async initialize(): Promise<void> {
    throw new Error('library missing');
  }

  render(): string {
    return '';
  }
}

class CountingRenderer extends BaseMarkdownRenderer {
  readonly name = 'marked' as const;
  initializeCalls = 0;
  disposeCalls = 0;

  async initialize(): Promise<void> {
    this.initializeCalls++;
  }

  render(markdown: string): string {
    return `<pre>${markdown}</pre>`;
  }

  async dispose(): Promise<void> {
    this.disposeCalls++;
  }
}

describe('RendererRegistry', () => {
  let registry: RendererRegistry;

  beforeEach(() => {
    registry = new RendererRegistry(new SimpleMarkdownRenderer());
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register the fallback renderer', () => {
    expect(registry.getNames()).toEqual(['simple']);
    expect(registry.getRenderer('simple')?.name).toBe('simple');
    expect(registry.getRenderer('marked')).toBeNull();
  });

  it('should resolve the fallback by default', async () => {
    const renderer = await registry.resolve();
    expect(renderer.name).toBe('simple');
    expect(registry.isInitialized('simple')).toBe(true);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('should fall back when the preferred renderer is not registered', async () => {
    const renderer = await registry.resolve('marked');
    expect(renderer.name).toBe('simple');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should fall back when the preferred renderer fails to initialize', async () => {
    registry.register(new FailingRenderer());

    const renderer = await registry.resolve('marked');

    expect(renderer.name).toBe('simple');
    expect(registry.isInitialized('marked')).toBe(false);
    expect(console.warn).toHaveBeenCalledWith(
      '⚠️ Renderer "marked" unavailable, falling back to "simple":',
      'library missing'
    );
  });

  it('should initialize a renderer only once', async () => {
    const counting = new CountingRenderer();
    registry.register(counting);

    await registry.resolve('marked');
    const renderer = await registry.resolve('marked');

    expect(renderer).toBe(counting);
    expect(counting.initializeCalls).toBe(1);
  });

  it('should reject unknown names when initialized directly', async () => {
    await expect(registry.initializeRenderer('marked')).rejects.toThrow('No renderer registered under name: marked');
  });

  it('should warn when a name is registered twice', () => {
    registry.register(new CountingRenderer());
    registry.register(new CountingRenderer());
    expect(console.warn).toHaveBeenCalledWith('Renderer marked already registered, overwriting');
  });

  it('should dispose renderers and forget their state', async () => {
    const counting = new CountingRenderer();
    registry.register(counting);
    await registry.resolve('marked');

    await registry.dispose();

    expect(counting.disposeCalls).toBe(1);
    expect(registry.isInitialized('marked')).toBe(false);
  });
});
