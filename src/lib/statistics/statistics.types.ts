/**
 * Statistics Types
 */

import type { ConfidenceBands } from '../evaluation';

export type ErrorCategory = 'timeout' | 'connection' | 'http' | 'other';

export interface CrawlingStats {
  totalOrganizations: number;
  successfulCrawls: number;
  failedCrawls: number;
  totalPagesCrawled: number;
  averagePagesPerOrganization: number;
  totalDurationMs: number;
  averageDurationMs: number;
  errorTypes: Record<ErrorCategory, number>;
}

export interface CriteriaStats {
  evaluatedOrganizations: number;
  fulfillmentRate: number;
  averageConfidence: number;

  /**
   * Percentage of organizations fulfilling each criterion, by criterion id
   */
  criterionHitRate: Record<string, number>;
  criterionAverageConfidence: Record<string, number>;
  confidenceBands: ConfidenceBands;
  manualReviewNeeded: number;

  /**
   * Fulfilled results per evidence tag and criterion name
   */
  patternHits: Record<string, Record<string, number>>;
}

export interface OrganizationRanking {
  organization: string;
  fulfillmentPercentage: number;
}

export interface ComparisonStats {
  topPerformers: OrganizationRanking[];
  bottomPerformers: OrganizationRanking[];
  dimensionPerformance: Record<string, number>;
  strongestDimension: string;
  weakestDimension: string;
}

export interface StatisticsSummary {
  totalOrganizations: number;
  successRatePercentage: number;
  averageFulfillmentPercentage: number;
  averageConfidence: number;
  highConfidenceEvaluations: number;
  manualReviewRequired: number;
  topPerformingOrganization: string;
  strongestDimension: string;
  totalCrawlingMinutes: number;
}

export interface AssessmentStatistics {
  catalogName: string;
  generatedAt: string;
  crawling: CrawlingStats;
  criteria: CriteriaStats;
  comparison: ComparisonStats;
  summary: StatisticsSummary;
}

export type ReportFormat = 'json' | 'markdown' | 'csv';

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'markdown', 'csv'];
