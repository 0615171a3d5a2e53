export { slugify, normalizeSlug } from './SlugGenerator.js';
