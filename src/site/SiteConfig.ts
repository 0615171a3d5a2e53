/**
 * Site configuration
 *
 * Read from `site.config.json` at the site root and validated with zod.
 * Every field has a default, so a site without a config file still builds.
 *
 * @since 2026-10-19
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import { isNotFound } from './fs-utils.js';

export const DEFAULT_CONFIG_FILE = 'site.config.json';

const CategorySchema = z.object({
  /** Listing page, relative to the site root */
  page: z.string().min(1),
  /** Section title shown in the navigation */
  title: z.string().min(1),
  heroClass: z.string(),
  badge: z.string(),
});

const DEFAULT_CATEGORIES: Record<string, z.input<typeof CategorySchema>> = {
  basics: { page: 'basics.html', title: 'Basics｜基础概念', heroClass: 'hero-sub--basics', badge: 'Basics' },
  papers: { page: 'papers.html', title: 'Papers｜论文拆解', heroClass: 'hero-sub--papers', badge: 'Papers' },
  pathways: {
    page: 'pathways-methods.html',
    title: 'Pathways & Methods｜通路与方法区',
    heroClass: 'hero-sub--pathways',
    badge: 'Pathways',
  },
  stories: {
    page: 'stories-evolution.html',
    title: 'Stories & Evolution｜人类演化 & 疾病小随笔',
    heroClass: 'hero-sub--stories',
    badge: 'Stories',
  },
};

const TextSchema = z.object({
  emptyState: z.string().default('暂时还没有内容，欢迎稍后再来。'),
  noTags: z.string().default('暂无标签'),
  readMore: z.string().default('阅读全文'),
  backToList: z.string().default('← 返回列表'),
  home: z.string().default('首页'),
  contact: z.string().default('联系我'),
  dateLabel: z.string().default('日期：'),
  tagsLabel: z.string().default('标签：'),
});

export const SiteConfigSchema = z
  .object({
    siteTitle: z.string().default('炎症衰老研究笔记'),
    brandMark: z.string().default('IA'),
    sourceDir: z.string().min(1).default('markdown 文章'),
    outputDir: z.string().min(1).default('notes'),
    renderer: z.enum(['simple', 'marked']).default('simple'),
    defaultCategory: z.string().min(1).default('basics'),
    undatedLabel: z.string().default('未注明日期'),
    /** Page template; the bundled one when unset */
    template: z.string().min(1).optional(),
    placeholders: z
      .object({
        start: z.string().min(1).default('<!-- BEGIN:ARTICLE_LIST -->'),
        end: z.string().min(1).default('<!-- END:ARTICLE_LIST -->'),
      })
      .default({}),
    categories: z.record(CategorySchema).default(DEFAULT_CATEGORIES),
    text: TextSchema.default({}),
  })
  .refine((config) => Object.hasOwn(config.categories, config.defaultCategory), {
    message: 'defaultCategory must name one of the configured categories',
    path: ['defaultCategory'],
  });

export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type CategoryConfig = z.infer<typeof CategorySchema>;
export type SiteText = z.infer<typeof TextSchema>;

/**
 * Validate a raw config object
 */
export function parseSiteConfig(raw: unknown, source = 'site config'): SiteConfig {
  const result = SiteConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Load the config file under `root`; defaults when the file is absent
 */
export async function loadSiteConfig(root: string, configFile = DEFAULT_CONFIG_FILE): Promise<SiteConfig> {
  const configPath = resolve(root, configFile);

  let text: string;
  try {
    text = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return parseSiteConfig({});
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${configPath}: ${reason}`);
  }
  return parseSiteConfig(raw, configPath);
}
