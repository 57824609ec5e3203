// src/schema/index.ts

export * from './plan';

/**
 * Root directory the built-in news plan scaffolds.
 */
export const NEWS_PROJECT_ROOT = 'ai-driven-smart-news';
