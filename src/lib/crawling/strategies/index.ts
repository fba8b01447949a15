/**
 * Crawl Strategies
 * Export all strategy classes and factory functions
 */

import { ICrawlStrategy } from '../crawl.strategy';
import { CrawlStrategy } from '../crawling.types';
import { HomepageOnlyStrategy } from './homepage-only.strategy';
import { AllPagesStrategy } from './all-pages.strategy';
import { LimitedStrategy } from './limited.strategy';
import { IntelligentStrategy } from './intelligent.strategy';

export { HomepageOnlyStrategy } from './homepage-only.strategy';
export { AllPagesStrategy } from './all-pages.strategy';
export { LimitedStrategy } from './limited.strategy';
export { IntelligentStrategy, MAX_CANDIDATES } from './intelligent.strategy';

/**
 * Create a strategy instance
 */
export function createCrawlStrategy(strategy: CrawlStrategy): ICrawlStrategy {
  switch (strategy) {
    case CrawlStrategy.HOMEPAGE_ONLY:
      return new HomepageOnlyStrategy();

    case CrawlStrategy.ALL_PAGES:
      return new AllPagesStrategy();

    case CrawlStrategy.LIMITED:
      return new LimitedStrategy();

    case CrawlStrategy.INTELLIGENT:
      return new IntelligentStrategy();

    default:
      throw new Error(`Unknown crawl strategy: ${String(strategy)}`);
  }
}

/**
 * Get all available strategies
 */
export function getAvailableStrategies(): CrawlStrategy[] {
  return [
    CrawlStrategy.HOMEPAGE_ONLY,
    CrawlStrategy.ALL_PAGES,
    CrawlStrategy.LIMITED,
    CrawlStrategy.INTELLIGENT,
  ];
}
