/**
 * LLM Criterion Analyzer
 * Semantic check of one page against one criterion. Failures are an absent signal.
 */

import type { PageResult } from '../../fetching';
import { errorMessage } from '../../errors';
import { truncateContent } from '../../llm';
import type { LLMClient } from '../../llm';
import { BaseEvidenceStrategy } from '../evidence.strategy';
import { CriterionDefinition, EvidenceMatch, EvidenceStrategyType } from '../evaluation.types';

export class LLMCriterionAnalyzer extends BaseEvidenceStrategy {
  name = 'LLM analysis';
  type = EvidenceStrategyType.LLM;

  constructor(private readonly client: LLMClient | null) {
    super();
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async evaluate(criterion: CriterionDefinition, page: PageResult, signal?: AbortSignal): Promise<EvidenceMatch | null> {
    if (!this.client) {
      return null;
    }

    const patterns = Object.values(criterion.patterns).flat();
    if (patterns.length === 0) {
      return null;
    }

    try {
      const analysis = await this.client.analyzeCriterion(
        {
          content: truncateContent(page.content),
          criterionName: criterion.name,
          criterionDescription: criterion.description,
          patterns,
          sourceUrl: page.url,
        },
        signal
      );

      if (!analysis.fulfilled) {
        return null;
      }

      const evidence = analysis.evidence.join('; ') || analysis.justification || 'LLM analysis found evidence';
      const match = this.createMatch(analysis.confidence, 'llm', evidence, page.url);
      console.log(`[Evaluator] LLM evidence for ${criterion.name}: confidence=${match.confidence.toFixed(2)}`);
      return match;
    } catch (error) {
      console.error(`[Evaluator] LLM evaluation failed for ${criterion.name}: ${errorMessage(error)}`);
      return null;
    }
  }
}
