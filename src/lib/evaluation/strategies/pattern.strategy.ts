/**
 * Pattern Evidence Strategy
 * Runs the pattern matcher for every pattern type of a criterion
 */

import type { PageResult } from '../../fetching';
import { BaseEvidenceStrategy } from '../evidence.strategy';
import { CriterionDefinition, EvidenceMatch, EvidenceStrategyType } from '../evaluation.types';
import { PatternMatcher } from './pattern-matcher';

export class PatternEvidenceStrategy extends BaseEvidenceStrategy {
  name = 'Pattern matching';
  type = EvidenceStrategyType.PATTERN;

  constructor(private readonly matcher: PatternMatcher = new PatternMatcher()) {
    super();
  }

  isAvailable(): boolean {
    return true;
  }

  /**
   * Strongest match across pattern types, earlier types winning ties
   */
  async evaluate(criterion: CriterionDefinition, page: PageResult): Promise<EvidenceMatch | null> {
    let best: EvidenceMatch | null = null;

    for (const [patternType, patterns] of Object.entries(criterion.patterns)) {
      if (patterns.length === 0) {
        continue;
      }
      const match = this.matcher.match(patternType, patterns, page);
      if (match && (!best || match.confidence > best.confidence)) {
        best = match;
      }
    }

    return best ? this.createMatch(best.confidence, best.patternType, best.evidence, best.sourceUrl) : null;
  }
}
