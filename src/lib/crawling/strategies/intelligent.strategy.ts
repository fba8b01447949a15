/**
 * Intelligent Strategy
 * Asks the LLM to rank candidate subpages by relevance to the criteria.
 * Any failure degrades to the limited selection.
 */

import { BaseCrawlStrategy } from '../crawl.strategy';
import { CrawlStrategy, StrategyContext } from '../crawling.types';
import { titleFromUrl } from '../url-title';
import { errorMessage } from '../../errors';
import type { SubpageCandidate } from '../../llm';

export const MAX_CANDIDATES = 50;

export class IntelligentStrategy extends BaseCrawlStrategy {
  readonly type = CrawlStrategy.INTELLIGENT;

  async selectSubpages(context: StrategyContext): Promise<string[]> {
    const { llmClient, criteriaNames, links, maxPages } = context;

    if (!llmClient || criteriaNames.length === 0) {
      console.log('[Crawler] No LLM client or criteria available, using limited selection');
      return this.firstWithinBudget(links, maxPages);
    }

    const budget = Math.max(0, maxPages - 1);
    if (links.length === 0 || budget === 0) {
      return [];
    }

    const candidates: SubpageCandidate[] = links
      .slice(0, MAX_CANDIDATES)
      .map((url) => ({ url, title: titleFromUrl(url) }));

    try {
      const response = await llmClient.selectSubpages(
        {
          organizationName: context.organizationName,
          baseUrl: context.baseUrl,
          candidates,
          criteriaNames,
          maxPages: budget,
        },
        context.signal
      );

      const allowed = new Set(candidates.map((candidate) => candidate.url));
      const selected = Array.from(new Set(response.selectedUrls.filter((url) => allowed.has(url)))).slice(
        0,
        budget
      );

      if (selected.length === 0) {
        console.warn(`[Crawler] LLM selected no usable subpages for ${context.baseUrl}, using limited selection`);
        return this.firstWithinBudget(links, maxPages);
      }

      console.log(`[Crawler] LLM selected ${selected.length} of ${links.length} subpages: ${response.reasoning}`);
      return selected;
    } catch (error) {
      if (context.signal?.aborted) {
        throw error;
      }
      console.warn(
        `[Crawler] LLM selection failed for ${context.baseUrl}, falling back to first ${budget} pages: ${errorMessage(error)}`
      );
      return this.firstWithinBudget(links, maxPages);
    }
  }

  getDescription(): string {
    return 'Main page and the subpages an LLM ranks most relevant to the criteria';
  }
}
