/**
 * Statistics Collector
 * Crawl, criteria and comparison statistics over one assessment
 */

import { classifyError, CrawlErrorType } from '../errors';
import { confidenceBand } from '../evaluation';
import type { CriterionEvaluation, OrganizationEvaluation } from '../evaluation';
import type { OrganizationOutcome } from '../assessment/assessment.types';
import {
  AssessmentStatistics,
  ComparisonStats,
  CrawlingStats,
  CriteriaStats,
  ErrorCategory,
  OrganizationRanking,
  StatisticsSummary,
} from './statistics.types';

const RANKING_SIZE = 10;
const MANUAL_REVIEW_BELOW = 0.3;

function average(total: number, count: number): number {
  return count > 0 ? total / count : 0;
}

export function categorizeError(message: string): ErrorCategory {
  switch (classifyError(message).type) {
    case CrawlErrorType.TIMEOUT:
      return 'timeout';
    case CrawlErrorType.NETWORK_ERROR:
      return 'connection';
    case CrawlErrorType.HTTP_ERROR:
      return 'http';
    default:
      return 'other';
  }
}

export class StatisticsCollector {
  collect(
    outcomes: readonly OrganizationOutcome[],
    catalogName: string,
    generatedAt: Date = new Date()
  ): AssessmentStatistics {
    console.log(`[Statistics] Collecting statistics for ${outcomes.length} organization(s)`);

    const evaluations = outcomes.flatMap((outcome) => (outcome.evaluation ? [outcome.evaluation] : []));
    const crawling = this.collectCrawlingStats(outcomes);
    const criteria = this.collectCriteriaStats(evaluations);
    const comparison = this.collectComparisonStats(evaluations);

    return {
      catalogName,
      generatedAt: generatedAt.toISOString(),
      crawling,
      criteria,
      comparison,
      summary: this.createSummary(crawling, criteria, comparison),
    };
  }

  collectCrawlingStats(outcomes: readonly OrganizationOutcome[]): CrawlingStats {
    const errorTypes: Record<ErrorCategory, number> = { timeout: 0, connection: 0, http: 0, other: 0 };
    let successfulCrawls = 0;
    let totalPagesCrawled = 0;
    let totalDurationMs = 0;
    let crawls = 0;

    for (const outcome of outcomes) {
      if (outcome.error) {
        errorTypes[categorizeError(outcome.error)] += 1;
      }
      if (!outcome.crawl) {
        continue;
      }

      crawls += 1;
      totalPagesCrawled += outcome.crawl.totalPages;
      totalDurationMs += outcome.crawl.durationMs;
      if (outcome.crawl.successfulPages > 0) {
        successfulCrawls += 1;
      }
      for (const failure of outcome.crawl.errors) {
        errorTypes[categorizeError(failure.error)] += 1;
      }
    }

    return {
      totalOrganizations: outcomes.length,
      successfulCrawls,
      failedCrawls: outcomes.length - successfulCrawls,
      totalPagesCrawled,
      averagePagesPerOrganization: average(totalPagesCrawled, successfulCrawls),
      totalDurationMs,
      averageDurationMs: average(totalDurationMs, crawls),
      errorTypes,
    };
  }

  collectCriteriaStats(evaluations: readonly OrganizationEvaluation[]): CriteriaStats {
    const results: CriterionEvaluation[] = evaluations.flatMap((evaluation) => evaluation.criteriaResults);
    const perCriterion = new Map<string, { hits: number; total: number; confidenceSum: number }>();
    const patternHits: Record<string, Record<string, number>> = {};
    const confidenceBands = { high: 0, medium: 0, low: 0 };
    let fulfilled = 0;
    let confidenceSum = 0;
    let manualReviewNeeded = 0;

    for (const result of results) {
      const entry = perCriterion.get(result.criterionId) ?? { hits: 0, total: 0, confidenceSum: 0 };
      entry.total += 1;
      entry.confidenceSum += result.confidence;
      confidenceSum += result.confidence;
      confidenceBands[confidenceBand(result.confidence)] += 1;

      if (result.confidence < MANUAL_REVIEW_BELOW) {
        manualReviewNeeded += 1;
      }

      if (result.evaluation) {
        entry.hits += 1;
        fulfilled += 1;
        if (result.patternType) {
          const hits = (patternHits[result.patternType] ??= {});
          hits[result.criterionName] = (hits[result.criterionName] ?? 0) + 1;
        }
      }
      perCriterion.set(result.criterionId, entry);
    }

    const criterionHitRate: Record<string, number> = {};
    const criterionAverageConfidence: Record<string, number> = {};
    for (const [criterionId, entry] of perCriterion) {
      criterionHitRate[criterionId] = average(entry.hits, entry.total) * 100;
      criterionAverageConfidence[criterionId] = average(entry.confidenceSum, entry.total);
    }

    return {
      evaluatedOrganizations: evaluations.length,
      fulfillmentRate: average(fulfilled, results.length) * 100,
      averageConfidence: average(confidenceSum, results.length),
      criterionHitRate,
      criterionAverageConfidence,
      confidenceBands,
      manualReviewNeeded,
      patternHits,
    };
  }

  collectComparisonStats(evaluations: readonly OrganizationEvaluation[]): ComparisonStats {
    const ranking: OrganizationRanking[] = evaluations
      .map((evaluation) => ({
        organization: evaluation.organizationName,
        fulfillmentPercentage: evaluation.fulfillmentPercentage,
      }))
      .sort((a, b) => b.fulfillmentPercentage - a.fulfillmentPercentage);

    const totals = new Map<string, { fulfilled: number; total: number }>();
    for (const evaluation of evaluations) {
      for (const [dimension, stats] of Object.entries(evaluation.summary.byDimension)) {
        const entry = totals.get(dimension) ?? { fulfilled: 0, total: 0 };
        entry.fulfilled += stats.fulfilled;
        entry.total += stats.total;
        totals.set(dimension, entry);
      }
    }

    const dimensionPerformance: Record<string, number> = {};
    let strongestDimension = '';
    let weakestDimension = '';
    for (const [dimension, entry] of totals) {
      if (entry.total === 0) {
        continue;
      }
      const percentage = (entry.fulfilled / entry.total) * 100;
      dimensionPerformance[dimension] = percentage;
      if (!strongestDimension || percentage > dimensionPerformance[strongestDimension]) {
        strongestDimension = dimension;
      }
      if (!weakestDimension || percentage < dimensionPerformance[weakestDimension]) {
        weakestDimension = dimension;
      }
    }

    return {
      topPerformers: ranking.slice(0, RANKING_SIZE),
      bottomPerformers: ranking.slice(-RANKING_SIZE),
      dimensionPerformance,
      strongestDimension,
      weakestDimension,
    };
  }

  private createSummary(crawling: CrawlingStats, criteria: CriteriaStats, comparison: ComparisonStats): StatisticsSummary {
    return {
      totalOrganizations: crawling.totalOrganizations,
      successRatePercentage: average(crawling.successfulCrawls, crawling.totalOrganizations) * 100,
      averageFulfillmentPercentage: criteria.fulfillmentRate,
      averageConfidence: criteria.averageConfidence,
      highConfidenceEvaluations: criteria.confidenceBands.high,
      manualReviewRequired: criteria.manualReviewNeeded,
      topPerformingOrganization: comparison.topPerformers[0]?.organization ?? '',
      strongestDimension: comparison.strongestDimension,
      totalCrawlingMinutes: crawling.totalDurationMs / 60000,
    };
  }
}
