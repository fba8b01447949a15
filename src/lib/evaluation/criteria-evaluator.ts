/**
 * Criteria Evaluator
 * Best-evidence selection per criterion over all crawled pages, then aggregation.
 * Evidence strategies run in priority order; a stage with runBelowConfidence
 * only runs while the best confidence so far is below that value.
 */

import { env } from '../../config/env';
import { CancelledError } from '../errors';
import type { OrganizationCrawlResult } from '../crawling';
import type { LLMClient } from '../llm';
import { createEvaluationSummary } from './evaluation-summary';
import { IEvidenceStrategy } from './evidence.strategy';
import { CriterionDefinition, CriterionEvaluation, EvidenceMatch, OrganizationEvaluation } from './evaluation.types';
import { LLMCriterionAnalyzer, PatternEvidenceStrategy, PatternMatcher } from './strategies';

/**
 * Pattern matching only runs while no evidence at least this strong was found
 */
export const PATTERN_FALLBACK_BELOW = 0.3;

export interface EvaluationStage {
  strategy: IEvidenceStrategy;
  runBelowConfidence?: number;
}

export interface CriteriaEvaluatorOptions {
  confidenceThreshold: number;
  caseSensitive: boolean;
  llmClient: LLMClient | null;

  /**
   * Replaces the default LLM-then-pattern stages
   */
  stages?: EvaluationStage[];
}

export interface EvaluateOptions {
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number, criterion: CriterionEvaluation) => void;
}

export function createDefaultStages(llmClient: LLMClient | null, caseSensitive: boolean): EvaluationStage[] {
  const stages: EvaluationStage[] = [];
  if (llmClient) {
    stages.push({ strategy: new LLMCriterionAnalyzer(llmClient) });
  }
  stages.push({
    strategy: new PatternEvidenceStrategy(new PatternMatcher({ caseSensitive })),
    runBelowConfidence: PATTERN_FALLBACK_BELOW,
  });
  return stages;
}

export class CriteriaEvaluator {
  private readonly confidenceThreshold: number;
  private readonly stages: EvaluationStage[];

  constructor(
    private readonly criteria: readonly CriterionDefinition[],
    options: Partial<CriteriaEvaluatorOptions> = {}
  ) {
    this.confidenceThreshold = options.confidenceThreshold ?? env.CONFIDENCE_THRESHOLD;
    this.stages =
      options.stages ?? createDefaultStages(options.llmClient ?? null, options.caseSensitive ?? env.CASE_SENSITIVE);
    console.log(`[Evaluator] Initialized with ${criteria.length} criteria`);
  }

  get criteriaNames(): string[] {
    return this.criteria.map((criterion) => criterion.name);
  }

  /**
   * Evaluate an organization against all criteria
   */
  async evaluateOrganization(
    crawlResult: OrganizationCrawlResult,
    options: EvaluateOptions = {}
  ): Promise<OrganizationEvaluation> {
    const { signal, onProgress } = options;
    console.log(`[Evaluator] Evaluating ${crawlResult.organizationName} against ${this.criteria.length} criteria`);

    const results: CriterionEvaluation[] = [];
    for (const criterion of this.criteria) {
      if (signal?.aborted) {
        throw new CancelledError(`Evaluation of ${crawlResult.organizationName} cancelled`);
      }
      const result = await this.evaluateCriterion(criterion, crawlResult, signal);
      results.push(result);
      onProgress?.(results.length, this.criteria.length, result);
    }

    const evaluation = aggregateEvaluation(crawlResult.organizationName, crawlResult.baseUrl, this.criteria, results);
    console.log(
      `[Evaluator] ${crawlResult.organizationName}: ${evaluation.fulfilledCriteria}/${evaluation.totalCriteria} criteria fulfilled (${evaluation.fulfillmentPercentage.toFixed(1)}%)`
    );
    return evaluation;
  }

  /**
   * Evaluate a single criterion against crawl results
   */
  async evaluateCriterion(
    criterion: CriterionDefinition,
    crawlResult: OrganizationCrawlResult,
    signal?: AbortSignal
  ): Promise<CriterionEvaluation> {
    let best: EvidenceMatch | null = null;

    for (const page of crawlResult.pages) {
      if (!page.success) {
        continue;
      }

      for (const stage of this.stages) {
        const bestConfidence = best?.confidence ?? 0;
        if (stage.runBelowConfidence !== undefined && bestConfidence >= stage.runBelowConfidence) {
          continue;
        }
        if (!stage.strategy.isAvailable()) {
          continue;
        }

        const match = await stage.strategy.evaluate(criterion, page, signal);
        if (match && match.confidence > bestConfidence) {
          best = match;
        }
      }
    }

    const threshold = criterion.confidenceThreshold ?? this.confidenceThreshold;

    if (best && best.confidence >= threshold) {
      return {
        criterionId: criterion.id,
        criterionName: criterion.name,
        evaluation: true,
        confidence: best.confidence,
        justification: `Evidence found via ${best.patternType} match: ${best.evidence}`,
        sourceUrl: best.sourceUrl,
        evidenceText: best.evidence,
        patternType: best.patternType,
      };
    }

    return {
      criterionId: criterion.id,
      criterionName: criterion.name,
      evaluation: false,
      confidence: best?.confidence ?? 0,
      justification: 'No sufficient evidence found',
      sourceUrl: crawlResult.baseUrl,
      evidenceText: '',
      patternType: '',
    };
  }
}

export function aggregateEvaluation(
  organizationName: string,
  baseUrl: string,
  criteria: readonly CriterionDefinition[],
  results: CriterionEvaluation[]
): OrganizationEvaluation {
  const totalCriteria = results.length;
  const fulfilledCriteria = results.filter((result) => result.evaluation).length;
  const confidenceSum = results.reduce((sum, result) => sum + result.confidence, 0);

  return {
    organizationName,
    baseUrl,
    criteriaResults: results,
    totalCriteria,
    fulfilledCriteria,
    fulfillmentPercentage: totalCriteria > 0 ? (fulfilledCriteria / totalCriteria) * 100 : 0,
    averageConfidence: totalCriteria > 0 ? confidenceSum / totalCriteria : 0,
    summary: createEvaluationSummary(criteria, results),
  };
}
