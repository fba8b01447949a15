/**
 * Crawl Strategy
 * Base interface and abstract class for subpage selection strategies
 */

import { CrawlStrategy, StrategyContext } from './crawling.types';

/**
 * Crawl strategy interface
 */
export interface ICrawlStrategy {
  readonly type: CrawlStrategy;

  /**
   * Subpages to crawl after the main page, in crawl order
   */
  selectSubpages(context: StrategyContext): Promise<string[]>;

  getDescription(): string;
}

/**
 * Base crawl strategy class
 */
export abstract class BaseCrawlStrategy implements ICrawlStrategy {
  abstract readonly type: CrawlStrategy;

  abstract selectSubpages(context: StrategyContext): Promise<string[]>;

  abstract getDescription(): string;

  /**
   * First links up to the page budget, leaving one page for the main page
   */
  protected firstWithinBudget(links: string[], maxPages: number): string[] {
    return links.slice(0, Math.max(0, maxPages - 1));
  }
}
