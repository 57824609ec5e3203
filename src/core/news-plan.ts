// src/core/news-plan.ts

import { NEWS_PROJECT_ROOT } from '../schema';
import { definePlan } from './plan';

/**
 * Skeleton of the AI-driven smart news project: API handler, news
 * processor and Discord poster placeholders, plus configs, logging,
 * helpers, tests and CI. Every module directory gets an index.ts marker.
 */
export const NEWS_PROJECT_PLAN = definePlan({
   rootName: NEWS_PROJECT_ROOT,
   directories: ['logger', 'configs', 'core', 'tests', 'utils', '.github/workflows'],
   files: [
      'logger/index.ts',
      'configs/index.ts',
      'core/index.ts',
      'tests/index.ts',
      'utils/index.ts',
      'logger/logger_config.ts',
      'configs/api_config.json',
      'configs/discord_config.json',
      'core/api_handler.ts',
      'core/news_processor.ts',
      'core/discord_poster.ts',
      'utils/helpers.ts',
      'tests/test_api_handler.ts',
      'tests/test_news_processor.ts',
      'tests/test_discord_poster.ts',
      '.github/workflows/ci.yml',
      '.gitignore',
      'requirements.txt',
      'README.md',
      'setup.ts',
      'main.ts',
   ],
});
