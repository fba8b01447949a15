/**
 * All Pages Strategy
 * Every internal link found on the main page, ignoring the page budget
 */

import { BaseCrawlStrategy } from '../crawl.strategy';
import { CrawlStrategy, StrategyContext } from '../crawling.types';

export class AllPagesStrategy extends BaseCrawlStrategy {
  readonly type = CrawlStrategy.ALL_PAGES;

  async selectSubpages(context: StrategyContext): Promise<string[]> {
    return [...context.links];
  }

  getDescription(): string {
    return 'Main page and every internal link';
  }
}
