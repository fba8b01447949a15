/**
 * Crawling Types
 * Type definitions for organization crawling
 */

import type { PageResult } from '../fetching';
import type { LLMClient } from '../llm';

/**
 * How the set of pages to crawl is chosen
 */
export enum CrawlStrategy {
  HOMEPAGE_ONLY = 'homepage_only',
  ALL_PAGES = 'all_pages',
  LIMITED = 'limited',
  INTELLIGENT = 'intelligent',
}

/**
 * Crawling configuration interface
 */
export interface CrawlingConfig {
  strategy: CrawlStrategy;

  /**
   * Page budget including the main page
   */
  maxPages: number;

  /**
   * Delay in milliseconds between requests to the same site
   */
  intraDomainDelay: number;

  /**
   * Whether to look up robots.txt and honour its Crawl-delay
   */
  respectRobotsTxt: boolean;
}

export interface CrawlFailure {
  url: string;
  error: string;
}

export interface OrganizationCrawlResult {
  readonly organizationName: string;
  readonly baseUrl: string;
  readonly pages: readonly PageResult[];
  readonly totalPages: number;
  readonly successfulPages: number;
  readonly durationMs: number;
  readonly errors: readonly CrawlFailure[];
  readonly strategy: CrawlStrategy;
  readonly cancelled: boolean;
}

/**
 * Push-only progress hook
 */
export type StatusCallback = (message: string) => void;

/**
 * Input for choosing the subpages of one organization
 */
export interface StrategyContext {
  organizationName: string;
  baseUrl: string;

  /**
   * Classified internal links of the main page, in discovery order
   */
  links: string[];
  maxPages: number;
  criteriaNames: string[];
  llmClient?: LLMClient;
  signal?: AbortSignal;
}

export interface RobotsInfo {
  exists: boolean;
  content: string;

  /**
   * Crawl-delay in seconds, if advertised
   */
  crawlDelay: number | null;
}

export type RobotsChecker = (baseUrl: string, signal?: AbortSignal) => Promise<RobotsInfo>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function isCrawlStrategy(value: string): value is CrawlStrategy {
  return Object.values<string>(CrawlStrategy).includes(value);
}
