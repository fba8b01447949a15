/**
 * Crawl Orchestrator
 * Crawls one organization: main page, subpage selection, polite sequential fetching.
 * Never throws; every failure ends up in the result.
 */

import { env } from '../../config/env';
import { errorMessage } from '../errors';
import type { PageFetcher, PageResult } from '../fetching';
import type { LLMClient } from '../llm';
import {
  CrawlFailure,
  CrawlingConfig,
  CrawlStrategy,
  isCrawlStrategy,
  OrganizationCrawlResult,
  RobotsChecker,
  Sleep,
  StatusCallback,
} from './crawling.types';
import { classifyLinks } from './link-classifier';
import { checkRobotsTxt } from './robots';
import { sleep } from './sleep';
import { createCrawlStrategy } from './strategies';
import { pageName } from './url-title';

export interface CrawlOrchestratorDeps {
  fetcher: PageFetcher;
  llmClient?: LLMClient;
  sleep?: Sleep;
  robots?: RobotsChecker;
}

export interface CrawlRequest {
  organizationName: string;
  baseUrl: string;

  /**
   * Criterion names passed to the intelligent strategy
   */
  criteriaNames?: string[];
  config?: Partial<CrawlingConfig>;
  onStatus?: StatusCallback;
  signal?: AbortSignal;
}

export function defaultCrawlingConfig(): CrawlingConfig {
  return {
    strategy: isCrawlStrategy(env.CRAWL_STRATEGY) ? env.CRAWL_STRATEGY : CrawlStrategy.INTELLIGENT,
    maxPages: env.MAX_PAGES_PER_SITE,
    intraDomainDelay: env.INTRA_DOMAIN_DELAY_MS,
    respectRobotsTxt: env.RESPECT_ROBOTS_TXT,
  };
}

export class CrawlOrchestrator {
  private readonly fetcher: PageFetcher;
  private readonly llmClient?: LLMClient;
  private readonly sleep: Sleep;
  private readonly robots: RobotsChecker;

  constructor(
    deps: CrawlOrchestratorDeps,
    private readonly defaults: CrawlingConfig = defaultCrawlingConfig()
  ) {
    this.fetcher = deps.fetcher;
    this.llmClient = deps.llmClient;
    this.sleep = deps.sleep ?? sleep;
    this.robots = deps.robots ?? checkRobotsTxt;
  }

  /**
   * Crawl an organization's website
   */
  async crawlOrganization(request: CrawlRequest): Promise<OrganizationCrawlResult> {
    const { organizationName, baseUrl, signal } = request;
    const config: CrawlingConfig = { ...this.defaults, ...request.config };
    const startTime = Date.now();
    const pages: PageResult[] = [];
    const errors: CrawlFailure[] = [];

    const notify = (message: string): void => {
      if (!request.onStatus) {
        return;
      }
      try {
        request.onStatus(message);
      } catch (error) {
        console.warn(`[Crawler] Status callback failed: ${errorMessage(error)}`);
      }
    };

    const finish = (cancelled: boolean): OrganizationCrawlResult => {
      if (cancelled) {
        console.log(`[Crawler] Crawl of ${organizationName} cancelled after ${pages.length} page(s)`);
      }
      return buildCrawlResult({
        organizationName,
        baseUrl,
        pages,
        errors,
        strategy: config.strategy,
        durationMs: Date.now() - startTime,
        cancelled,
      });
    };

    try {
      if (signal?.aborted) {
        return finish(true);
      }

      notify(`Crawling main page of ${organizationName}: ${baseUrl}`);
      const mainPage = await this.fetcher.fetchPage(baseUrl, signal);
      if (signal?.aborted) {
        return finish(true);
      }
      pages.push(mainPage);

      if (!mainPage.success) {
        errors.push({
          url: baseUrl,
          error: `Failed to crawl main page: ${mainPage.errorMessage ?? 'unknown error'}`,
        });
        notify(`Main page of ${organizationName} could not be loaded`);
        return finish(false);
      }

      let delay = config.intraDomainDelay;
      if (config.respectRobotsTxt) {
        try {
          const robots = await this.robots(baseUrl, signal);
          if (robots.crawlDelay !== null) {
            delay = Math.max(delay, robots.crawlDelay * 1000);
          }
        } catch (error) {
          if (signal?.aborted) {
            return finish(true);
          }
          console.warn(`[Crawler] robots.txt lookup for ${baseUrl} failed: ${errorMessage(error)}`);
        }
      }

      const links = classifyLinks(baseUrl, mainPage.links);
      const strategy = createCrawlStrategy(config.strategy);
      const subpages = await strategy.selectSubpages({
        organizationName,
        baseUrl,
        links,
        maxPages: config.maxPages,
        criteriaNames: request.criteriaNames ?? [],
        llmClient: this.llmClient,
        signal,
      });

      const total = subpages.length + 1;
      notify(`${strategy.getDescription()}: ${total} page(s) of ${links.length + 1} found`);

      for (const [index, url] of subpages.entries()) {
        if (signal?.aborted) {
          return finish(true);
        }
        await this.sleep(delay, signal);

        notify(`Crawling page ${index + 2}/${total}: ${pageName(url)}`);
        const page = await this.fetcher.fetchPage(url, signal);
        if (signal?.aborted) {
          return finish(true);
        }

        pages.push(page);
        if (!page.success) {
          errors.push({ url, error: page.errorMessage ?? 'Unknown error' });
        }
        notify(`${page.success ? 'Crawled' : 'Failed'} page ${index + 2}/${total}: ${pageName(url)}`);
      }

      const result = finish(false);
      notify(`Crawl of ${organizationName} finished: ${result.successfulPages}/${result.totalPages} pages`);
      return result;
    } catch (error) {
      if (signal?.aborted) {
        return finish(true);
      }
      console.error(`[Crawler] Crawling ${baseUrl} failed:`, error);
      errors.push({ url: baseUrl, error: `Crawling failed: ${errorMessage(error)}` });
      return finish(false);
    }
  }
}

export function buildCrawlResult(fields: {
  organizationName: string;
  baseUrl: string;
  pages: PageResult[];
  errors: CrawlFailure[];
  strategy: CrawlStrategy;
  durationMs: number;
  cancelled: boolean;
}): OrganizationCrawlResult {
  return Object.freeze({
    organizationName: fields.organizationName,
    baseUrl: fields.baseUrl,
    pages: Object.freeze([...fields.pages]),
    totalPages: fields.pages.length,
    successfulPages: fields.pages.filter((page) => page.success).length,
    durationMs: fields.durationMs,
    errors: Object.freeze(fields.errors.map((failure) => ({ ...failure }))),
    strategy: fields.strategy,
    cancelled: fields.cancelled,
  });
}
