/**
 * Assessment Types
 * Type definitions for batch assessments of organizations
 */

import type { CrawlingConfig, OrganizationCrawlResult } from '../crawling';
import type { OrganizationEvaluation } from '../evaluation';

export interface Organization {
  name: string;
  url: string;
}

export interface AssessmentSettings extends CrawlingConfig {
  interDomainDelay: number;
  confidenceThreshold: number;
}

/**
 * Result for one organization; evaluation is absent when it could not be assessed
 */
export interface OrganizationOutcome {
  organization: Organization;
  crawl: OrganizationCrawlResult | null;
  evaluation: OrganizationEvaluation | null;

  /**
   * LLM summary of the evaluation, when a summarizer is configured
   */
  summary?: string;
  error?: string;
}

export interface AssessmentRunResult {
  outcomes: OrganizationOutcome[];
  cancelled: boolean;
  durationMs: number;
}

export type ProgressSink = (message: string) => void;
