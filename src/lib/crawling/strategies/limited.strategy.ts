/**
 * Limited Strategy
 * First internal links in discovery order, within the page budget
 */

import { BaseCrawlStrategy } from '../crawl.strategy';
import { CrawlStrategy, StrategyContext } from '../crawling.types';

export class LimitedStrategy extends BaseCrawlStrategy {
  readonly type = CrawlStrategy.LIMITED;

  async selectSubpages(context: StrategyContext): Promise<string[]> {
    return this.firstWithinBudget(context.links, context.maxPages);
  }

  getDescription(): string {
    return 'Main page and the first internal links up to the page budget';
  }
}
