/**
 * Evaluation Summary Tests
 */

import { confidenceBand, createEvaluationSummary } from '../evaluation-summary';
import type { CriterionEvaluation } from '../evaluation.types';
import { criterion } from '../../../__tests__/helpers/fixtures';

function result(overrides: Partial<CriterionEvaluation>): CriterionEvaluation {
  return {
    criterionId: 'transparenz_finanzen_jahresbericht',
    criterionName: 'Jahresbericht',
    evaluation: false,
    confidence: 0,
    justification: 'No sufficient evidence found',
    sourceUrl: 'https://verein.example.org/',
    evidenceText: '',
    patternType: '',
    ...overrides,
  };
}

describe('confidenceBand', () => {
  it.each([
    [0.95, 'high'],
    [0.8, 'medium'],
    [0.5, 'medium'],
    [0.49, 'low'],
    [0, 'low'],
  ])('should place %p in the %s band', (confidence, band) => {
    expect(confidenceBand(confidence)).toBe(band);
  });
});

describe('createEvaluationSummary', () => {
  it('should count by pattern type and skip unknown criterion ids for dimensions', () => {
    const summary = createEvaluationSummary(
      [criterion()],
      [
        result({ evaluation: true, confidence: 0.9, patternType: 'llm' }),
        result({ criterionId: 'unbekannt', evaluation: true, confidence: 0.7, patternType: 'url' }),
      ]
    );

    expect(summary.byDimension).toEqual({ Transparenz: { total: 1, fulfilled: 1, percentage: 100 } });
    expect(summary.byConfidence).toEqual({ high: 1, medium: 1, low: 0 });
    expect(summary.byPatternType).toEqual({ llm: 1, url: 1 });
    expect(summary.totalByType).toEqual({ operational: 1, strategic: 0 });
  });
});
