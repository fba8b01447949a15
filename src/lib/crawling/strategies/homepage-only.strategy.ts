/**
 * Homepage Only Strategy
 */

import { BaseCrawlStrategy } from '../crawl.strategy';
import { CrawlStrategy } from '../crawling.types';

export class HomepageOnlyStrategy extends BaseCrawlStrategy {
  readonly type = CrawlStrategy.HOMEPAGE_ONLY;

  async selectSubpages(): Promise<string[]> {
    return [];
  }

  getDescription(): string {
    return 'Main page only';
  }
}
