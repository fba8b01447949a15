/**
 * Evaluation aggregation
 */

import {
  ConfidenceBands,
  CriterionDefinition,
  CriterionEvaluation,
  EvaluationSummary,
} from './evaluation.types';

export function confidenceBand(confidence: number): keyof ConfidenceBands {
  if (confidence > 0.8) {
    return 'high';
  }
  if (confidence >= 0.5) {
    return 'medium';
  }
  return 'low';
}

export function createEvaluationSummary(
  criteria: readonly CriterionDefinition[],
  results: readonly CriterionEvaluation[]
): EvaluationSummary {
  const summary: EvaluationSummary = {
    byDimension: {},
    byConfidence: { high: 0, medium: 0, low: 0 },
    byPatternType: {},
    fulfilledByType: { operational: 0, strategic: 0 },
    totalByType: { operational: 0, strategic: 0 },
  };

  const definitions = new Map(criteria.map((criterion) => [criterion.id, criterion]));

  for (const result of results) {
    const criterion = definitions.get(result.criterionId);

    if (criterion) {
      const dimension = (summary.byDimension[criterion.dimension] ??= { total: 0, fulfilled: 0, percentage: 0 });
      dimension.total += 1;
      summary.totalByType[criterion.type] += 1;
      if (result.evaluation) {
        dimension.fulfilled += 1;
        summary.fulfilledByType[criterion.type] += 1;
      }
    }

    summary.byConfidence[confidenceBand(result.confidence)] += 1;

    if (result.patternType) {
      summary.byPatternType[result.patternType] = (summary.byPatternType[result.patternType] ?? 0) + 1;
    }
  }

  for (const dimension of Object.values(summary.byDimension)) {
    dimension.percentage = dimension.total > 0 ? (dimension.fulfilled / dimension.total) * 100 : 0;
  }

  return summary;
}
